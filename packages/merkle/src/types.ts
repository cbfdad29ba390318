/**
 * Merkle tree types — hasher capability, nodes, trace hook.
 */

/** Fixed-length hash output. 32 bytes for SHA-256. */
export type Digest = Uint8Array;

/**
 * Any deterministic byte hasher with a fixed output length.
 * The tree never assumes which algorithm sits behind it.
 */
export interface Hasher {
  hash(input: Uint8Array): Digest;
}

export interface MerkleNode {
  digest: Digest;
  /** null on leaves. */
  left: MerkleNode | null;
  /** null on leaves. Same object as `left` when an odd level pairs its last node with itself. */
  right: MerkleNode | null;
}

/**
 * Structured debug sink. A pino logger satisfies this as-is.
 * Never consulted for control flow.
 */
export interface TraceLogger {
  debug(obj: Record<string, unknown>, msg: string): void;
}

export interface MerkleTreeOptions {
  logger?: TraceLogger;
}
