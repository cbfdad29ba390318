/**
 * @treehash/merkle — Merkle tree over an injected hasher.
 *
 * Pure, synchronous, no I/O. Callers hand in ordered byte blocks and get
 * raw digests and proofs back; hex and JSON exist only for display and
 * proof documents.
 */

// Tree + proofs
export { MerkleTree, verifyMerkleProof } from "./merkle.js";
export { canonicalConcat, combineDigests } from "./combine.js";
export type {
  Digest,
  Hasher,
  MerkleNode,
  MerkleTreeOptions,
  TraceLogger,
} from "./types.js";

// Hashers
export {
  sha256Hasher,
  sha256FastHasher,
  nobleSha256Hasher,
  HASHERS,
  HASHER_NAMES,
  isHasherName,
  hasherByName,
  type HasherName,
} from "./hashers.js";

// Proof documents
export {
  proofDocument,
  parseProofDocument,
  proofFromDocument,
} from "./proof-document.js";

// Blocks
export { chunkBytes } from "./chunker.js";

// Bytes
export { toHex, fromHex, compareBytes, equalBytes, concatBytes } from "./bytes.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
