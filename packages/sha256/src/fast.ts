/**
 * SHA-256 hot path.
 *
 * Same algorithm as sha256.ts, arranged for throughput:
 *   - full blocks are read in place from the input (no padded copy)
 *   - only the final 1–2 blocks are staged in a tail buffer
 *   - one module-level schedule buffer, round functions inlined
 *   - int32 arithmetic (`| 0`); Uint32Array stores normalize to u32
 *
 * Output MUST be byte-identical to sha256() for every input.
 */

import {
  SHA256_BLOCK_LENGTH,
  SHA256_H0,
  SHA256_K,
} from "./constants.js";
import { stateToDigest } from "./sha256.js";

const K = Uint32Array.from(SHA256_K);

// Scratch schedule. Safe to share: processBlock never yields.
const W = new Uint32Array(64);

function processBlock(state: Uint32Array, view: DataView, offset: number): void {
  for (let i = 0; i < 16; i++) {
    W[i] = view.getUint32(offset + i * 4, false);
  }
  for (let i = 16; i < 64; i++) {
    const w15 = W[i - 15]!;
    const w2 = W[i - 2]!;
    const s0 = ((w15 >>> 7) | (w15 << 25)) ^ ((w15 >>> 18) | (w15 << 14)) ^ (w15 >>> 3);
    const s1 = ((w2 >>> 17) | (w2 << 15)) ^ ((w2 >>> 19) | (w2 << 13)) ^ (w2 >>> 10);
    W[i] = (W[i - 16]! + s0 + W[i - 7]! + s1) | 0;
  }

  let a = state[0]!;
  let b = state[1]!;
  let c = state[2]!;
  let d = state[3]!;
  let e = state[4]!;
  let f = state[5]!;
  let g = state[6]!;
  let h = state[7]!;

  for (let i = 0; i < 64; i++) {
    const S1 = ((e >>> 6) | (e << 26)) ^ ((e >>> 11) | (e << 21)) ^ ((e >>> 25) | (e << 7));
    const ch = (e & f) ^ (~e & g);
    const t1 = (h + S1 + ch + K[i]! + W[i]!) | 0;
    const S0 = ((a >>> 2) | (a << 30)) ^ ((a >>> 13) | (a << 19)) ^ ((a >>> 22) | (a << 10));
    const maj = (a & b) ^ (a & c) ^ (b & c);
    const t2 = (S0 + maj) | 0;

    h = g;
    g = f;
    f = e;
    e = (d + t1) | 0;
    d = c;
    c = b;
    b = a;
    a = (t1 + t2) | 0;
  }

  state[0] = (state[0]! + a) | 0;
  state[1] = (state[1]! + b) | 0;
  state[2] = (state[2]! + c) | 0;
  state[3] = (state[3]! + d) | 0;
  state[4] = (state[4]! + e) | 0;
  state[5] = (state[5]! + f) | 0;
  state[6] = (state[6]! + g) | 0;
  state[7] = (state[7]! + h) | 0;
}

/**
 * SHA-256 of arbitrary bytes → 32-byte digest, without materializing
 * the padded message.
 */
export function sha256Fast(input: Uint8Array): Uint8Array {
  const state = Uint32Array.from(SHA256_H0);
  const fullBlocks = Math.floor(input.length / SHA256_BLOCK_LENGTH);
  const view = new DataView(input.buffer, input.byteOffset, input.byteLength);

  for (let block = 0; block < fullBlocks; block++) {
    processBlock(state, view, block * SHA256_BLOCK_LENGTH);
  }

  // Tail: leftover bytes + 0x80 + length. Spills into a second block
  // when fewer than 9 bytes remain in the first.
  const consumed = fullBlocks * SHA256_BLOCK_LENGTH;
  const remainder = input.length - consumed;
  const tailLength = remainder < 56 ? SHA256_BLOCK_LENGTH : SHA256_BLOCK_LENGTH * 2;
  const tail = new Uint8Array(tailLength);
  tail.set(input.subarray(consumed), 0);
  tail[remainder] = 0x80;

  const tailView = new DataView(tail.buffer);
  tailView.setUint32(tailLength - 8, Math.floor(input.length / 0x20000000), false);
  tailView.setUint32(tailLength - 4, (input.length * 8) >>> 0, false);

  processBlock(state, tailView, 0);
  if (tailLength > SHA256_BLOCK_LENGTH) {
    processBlock(state, tailView, SHA256_BLOCK_LENGTH);
  }

  return stateToDigest(state);
}
