/**
 * SHA-256 reference path.
 * FIPS 180-4 §5.1.1 (padding), §6.2.2 (schedule + compression)
 *
 *   padded = message || 0x80 || 0x00… || bit_length_u64be
 *   for each 64-byte block: state += compress(state, schedule(block))
 *   digest = state[0..8] as u32be
 *
 * Works on a fully materialized padded copy. Written for readability;
 * sha256Fast() in fast.ts is the hot path and must agree byte-for-byte.
 */

import {
  SHA256_BLOCK_LENGTH,
  SHA256_DIGEST_LENGTH,
  SHA256_H0,
  SHA256_K,
} from "./constants.js";

// ── 32-bit word helpers ────────────────────────────────────────────

function rotr(x: number, n: number): number {
  return ((x >>> n) | (x << (32 - n))) >>> 0;
}

/** Sum mod 2^32. */
function add32(...words: number[]): number {
  let sum = 0;
  for (const w of words) sum = (sum + w) >>> 0;
  return sum;
}

export function smallSigma0(x: number): number {
  return (rotr(x, 7) ^ rotr(x, 18) ^ (x >>> 3)) >>> 0;
}

export function smallSigma1(x: number): number {
  return (rotr(x, 17) ^ rotr(x, 19) ^ (x >>> 10)) >>> 0;
}

function bigSigma0(x: number): number {
  return (rotr(x, 2) ^ rotr(x, 13) ^ rotr(x, 22)) >>> 0;
}

function bigSigma1(x: number): number {
  return (rotr(x, 6) ^ rotr(x, 11) ^ rotr(x, 25)) >>> 0;
}

function ch(e: number, f: number, g: number): number {
  return ((e & f) ^ (~e & g)) >>> 0;
}

function maj(a: number, b: number, c: number): number {
  return ((a & b) ^ (a & c) ^ (b & c)) >>> 0;
}

// ── Padding ────────────────────────────────────────────────────────

/**
 * Append 0x80, zero-fill to 56 mod 64, then the message length in bits
 * as a 64-bit big-endian integer. Result is a whole number of blocks.
 */
export function padMessage(message: Uint8Array): Uint8Array {
  const paddedLength =
    Math.ceil((message.length + 9) / SHA256_BLOCK_LENGTH) * SHA256_BLOCK_LENGTH;
  const padded = new Uint8Array(paddedLength);
  padded.set(message, 0);
  padded[message.length] = 0x80;

  // 64-bit length split into two u32 words (bit length can exceed 2^32)
  const view = new DataView(padded.buffer);
  view.setUint32(paddedLength - 8, Math.floor(message.length / 0x20000000), false);
  view.setUint32(paddedLength - 4, (message.length * 8) >>> 0, false);

  return padded;
}

// ── Message schedule ───────────────────────────────────────────────

/**
 * Expand one 64-byte block into the 64-word schedule:
 * w[0..16] read big-endian, w[i] = w[i-16] + σ0(w[i-15]) + w[i-7] + σ1(w[i-2]).
 */
export function messageSchedule(block: Uint8Array): Uint32Array {
  if (block.length !== SHA256_BLOCK_LENGTH) {
    throw new Error(
      `messageSchedule: block must be ${SHA256_BLOCK_LENGTH} bytes, got ${block.length}`,
    );
  }

  const w = new Uint32Array(64);
  const view = new DataView(block.buffer, block.byteOffset, block.byteLength);

  for (let i = 0; i < 16; i++) {
    w[i] = view.getUint32(i * 4, false);
  }
  for (let i = 16; i < 64; i++) {
    w[i] = add32(w[i - 16]!, smallSigma0(w[i - 15]!), w[i - 7]!, smallSigma1(w[i - 2]!));
  }

  return w;
}

// ── Compression ────────────────────────────────────────────────────

/**
 * Fold one 64-byte block into the 8-word running state (in place).
 */
export function compress(state: Uint32Array, block: Uint8Array): void {
  const w = messageSchedule(block);

  let a = state[0]!;
  let b = state[1]!;
  let c = state[2]!;
  let d = state[3]!;
  let e = state[4]!;
  let f = state[5]!;
  let g = state[6]!;
  let h = state[7]!;

  for (let i = 0; i < 64; i++) {
    const temp1 = add32(h, bigSigma1(e), ch(e, f, g), SHA256_K[i]!, w[i]!);
    const temp2 = add32(bigSigma0(a), maj(a, b, c));

    h = g;
    g = f;
    f = e;
    e = add32(d, temp1);
    d = c;
    c = b;
    b = a;
    a = add32(temp1, temp2);
  }

  state[0] = add32(state[0]!, a);
  state[1] = add32(state[1]!, b);
  state[2] = add32(state[2]!, c);
  state[3] = add32(state[3]!, d);
  state[4] = add32(state[4]!, e);
  state[5] = add32(state[5]!, f);
  state[6] = add32(state[6]!, g);
  state[7] = add32(state[7]!, h);
}

/** Serialize the 8-word state big-endian. */
export function stateToDigest(state: Uint32Array): Uint8Array {
  const digest = new Uint8Array(SHA256_DIGEST_LENGTH);
  const view = new DataView(digest.buffer);
  for (let i = 0; i < 8; i++) {
    view.setUint32(i * 4, state[i]!, false);
  }
  return digest;
}

/**
 * SHA-256 of arbitrary bytes → 32-byte digest.
 * Total: defined for every input, including zero length.
 */
export function sha256(input: Uint8Array): Uint8Array {
  const state = Uint32Array.from(SHA256_H0);
  const padded = padMessage(input);

  for (let offset = 0; offset < padded.length; offset += SHA256_BLOCK_LENGTH) {
    compress(state, padded.subarray(offset, offset + SHA256_BLOCK_LENGTH));
  }

  return stateToDigest(state);
}
