/**
 * @treehash/sha256 — from-scratch SHA-256.
 *
 * Pure functions over fully materialized byte buffers.
 * ZERO runtime dependencies. No I/O, no state across calls.
 */

export {
  sha256,
  padMessage,
  messageSchedule,
  compress,
  stateToDigest,
  smallSigma0,
  smallSigma1,
} from "./sha256.js";
export { sha256Fast } from "./fast.js";
export {
  SHA256_BLOCK_LENGTH,
  SHA256_DIGEST_LENGTH,
  SHA256_H0,
  SHA256_K,
} from "./constants.js";
