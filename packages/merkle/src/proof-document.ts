/**
 * Proof documents — MerkleProofV1 in and out.
 *
 * proofDocument():      tree + index → JSON-ready document
 * parseProofDocument(): unknown JSON → validated document (throws)
 * proofFromDocument():  document → raw sibling digests + root
 */

import { Value } from "@sinclair/typebox/value";
import { fromHex, toHex } from "./bytes.js";
import { PROOF_DOCUMENT_VERSION } from "./constants.js";
import type { MerkleTree } from "./merkle.js";
import { MerkleProofV1 } from "./schemas/proof.js";
import type { Digest } from "./types.js";

/**
 * Build a proof document for one leaf.
 * Returns null if the index is out of range or the tree is empty.
 */
export function proofDocument(
  tree: MerkleTree,
  leafIndex: number,
  hasherName: string,
): MerkleProofV1 | null {
  const siblings = tree.generateProof(leafIndex);
  const root = tree.root();
  if (siblings === null || root === null) return null;

  return {
    version: PROOF_DOCUMENT_VERSION,
    hasher: hasherName,
    leaf_index: leafIndex,
    leaf_count: tree.leafCount,
    siblings: siblings.map(toHex),
    root: toHex(root),
  };
}

/** Validate an untrusted value (typically parsed JSON) as MerkleProofV1. */
export function parseProofDocument(value: unknown): MerkleProofV1 {
  if (!Value.Check(MerkleProofV1, value)) {
    const first = Value.Errors(MerkleProofV1, value).First();
    const detail = first ? `${first.path || "/"} ${first.message}` : "invalid document";
    throw new Error(`parseProofDocument: ${detail}`);
  }
  if (value.leaf_index >= value.leaf_count) {
    throw new Error(
      `parseProofDocument: leaf_index ${value.leaf_index} out of range for ${value.leaf_count} leaves`,
    );
  }
  return value;
}

export function proofFromDocument(doc: MerkleProofV1): {
  siblings: Digest[];
  root: Digest;
} {
  return {
    siblings: doc.siblings.map(fromHex),
    root: fromHex(doc.root),
  };
}
