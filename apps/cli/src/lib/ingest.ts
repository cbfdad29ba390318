/**
 * Ingestion — turn files and directories into ordered tree blocks.
 *
 * File:      bytes split into chunkSize blocks (empty file → one empty block)
 * Directory: one block per regular file, recursive, ordered by
 *            "/"-separated relative path
 * Several paths contribute in argument order.
 */

import { readFile, readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { chunkBytes } from "@treehash/merkle";

export interface IngestedBlock {
  /** Where the bytes came from: "file#chunk" or "dir/relative/path". */
  source: string;
  bytes: Uint8Array;
}

/** Relative paths of every regular file under `dir`, sorted. */
export async function listFiles(dir: string, prefix = ""): Promise<string[]> {
  const entries = await readdir(join(dir, prefix), { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(dir, rel)));
    } else if (entry.isFile()) {
      files.push(rel);
    }
  }

  return files.sort();
}

async function ingestPath(path: string, chunkSize: number): Promise<IngestedBlock[]> {
  const info = await stat(path);

  if (info.isDirectory()) {
    const files = await listFiles(path);
    const blocks: IngestedBlock[] = [];
    for (const rel of files) {
      const bytes = await readFile(join(path, rel));
      blocks.push({ source: `${path}/${rel}`, bytes: new Uint8Array(bytes) });
    }
    return blocks;
  }

  if (!info.isFile()) {
    throw new Error(`ingest: ${path} is neither a file nor a directory`);
  }

  const bytes = new Uint8Array(await readFile(path));
  return chunkBytes(bytes, chunkSize).map((chunk, i) => ({
    source: `${path}#${i}`,
    bytes: chunk,
  }));
}

/** Read every path into blocks, in argument order. */
export async function ingestPaths(
  paths: readonly string[],
  chunkSize: number,
): Promise<IngestedBlock[]> {
  const blocks: IngestedBlock[] = [];
  for (const path of paths) {
    blocks.push(...(await ingestPath(path, chunkSize)));
  }
  return blocks;
}
