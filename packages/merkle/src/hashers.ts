/**
 * Concrete hashers. All three compute SHA-256 and are interchangeable;
 * the name travels in proof documents so a verifier can pick one.
 */

import { sha256 as nobleSha256 } from "@noble/hashes/sha256";
import { sha256, sha256Fast } from "@treehash/sha256";
import type { Hasher } from "./types.js";

/** Reference engine (materialized padding, readable rounds). */
export const sha256Hasher: Hasher = {
  hash: (input) => sha256(input),
};

/** Optimized engine. Byte-identical to sha256Hasher. */
export const sha256FastHasher: Hasher = {
  hash: (input) => sha256Fast(input),
};

/** Independent implementation, used to cross-check the engine. */
export const nobleSha256Hasher: Hasher = {
  hash: (input) => nobleSha256(input),
};

export const HASHERS = {
  reference: sha256Hasher,
  fast: sha256FastHasher,
  noble: nobleSha256Hasher,
} as const satisfies Record<string, Hasher>;

export type HasherName = keyof typeof HASHERS;

export const HASHER_NAMES: readonly HasherName[] = ["reference", "fast", "noble"];

export function isHasherName(name: string): name is HasherName {
  return Object.prototype.hasOwnProperty.call(HASHERS, name);
}

/** Look up a hasher by name. Throws on unknown names. */
export function hasherByName(name: string): Hasher {
  if (!isHasherName(name)) {
    throw new Error(
      `hasherByName: unknown hasher "${name}" (expected one of ${HASHER_NAMES.join(", ")})`,
    );
  }
  return HASHERS[name];
}
