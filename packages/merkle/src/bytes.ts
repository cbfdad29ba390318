/**
 * Byte helpers shared by the tree and proof layers.
 *
 * Hex is display/wire only: digests travel as raw bytes everywhere else.
 */

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

/** Convert bytes to lowercase hex. */
export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

/** Convert hex string to bytes. Throws on odd length or non-hex characters. */
export function fromHex(hex: string): Uint8Array {
  try {
    return hexToBytes(hex);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`fromHex: ${reason}`);
  }
}

/**
 * Lexicographic byte comparison: first differing byte decides,
 * otherwise the shorter sequence sorts first.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    if (a[i] !== b[i]) return a[i]! - b[i]!;
  }
  return a.length - b.length;
}

export function equalBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && compareBytes(a, b) === 0;
}

export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLen = arrays.reduce((sum, a) => sum + a.length, 0);
  const result = new Uint8Array(totalLen);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}
