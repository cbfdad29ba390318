/**
 * Sibling combination rule.
 *
 *   parent = H(min(a, b) || max(a, b))     (byte-lexicographic order)
 *
 * Commutative, so proofs carry no left/right position bits.
 */

import { compareBytes, concatBytes } from "./bytes.js";
import type { Digest, Hasher } from "./types.js";

/** Concatenate two digests, smaller first. */
export function canonicalConcat(a: Digest, b: Digest): Uint8Array {
  return compareBytes(a, b) <= 0 ? concatBytes(a, b) : concatBytes(b, a);
}

/** Parent digest of a sibling pair. */
export function combineDigests(hasher: Hasher, a: Digest, b: Digest): Digest {
  return hasher.hash(canonicalConcat(a, b));
}
