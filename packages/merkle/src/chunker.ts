/**
 * Byte chunker — split one buffer into ordered tree blocks.
 *
 *   blocks = bytes[0..n), bytes[n..2n), …   (last block may be short)
 *
 * Empty input yields a single empty block, so every file has a leaf.
 */

import { CHUNK_SIZE_DEFAULT } from "./constants.js";

export function chunkBytes(
  bytes: Uint8Array,
  chunkSize: number = CHUNK_SIZE_DEFAULT,
): Uint8Array[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new Error(`chunkBytes: chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const blocks: Uint8Array[] = [];
  for (let offset = 0; offset < bytes.length; offset += chunkSize) {
    blocks.push(bytes.slice(offset, Math.min(offset + chunkSize, bytes.length)));
  }

  if (blocks.length === 0) {
    blocks.push(new Uint8Array(0));
  }

  return blocks;
}
