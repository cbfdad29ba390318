/**
 * treehash verify <proof-file> (--leaf text | --leaf-file path) [--root hex]
 *
 * Recompute the root from the leaf bytes and the proof's siblings.
 * The expected root defaults to the one recorded in the document, and the
 * hasher is always the one the document names.
 */

import { readFile } from "node:fs/promises";
import {
  fromHex,
  hasherByName,
  isHasherName,
  parseProofDocument,
  proofFromDocument,
  toHex,
  verifyMerkleProof,
  type TraceLogger,
} from "@treehash/merkle";

interface VerifyOptions {
  leaf?: string;
  leafFile?: string;
  root?: string;
}

export async function verifyCommand(
  proofPath: string,
  opts: VerifyOptions,
  logger?: TraceLogger,
): Promise<boolean> {
  if ((opts.leaf === undefined) === (opts.leafFile === undefined)) {
    throw new Error("Give exactly one leaf: --leaf <text> or --leaf-file <path>");
  }

  const raw = await readFile(proofPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`Invalid proof file ${proofPath}: not valid JSON`);
  }

  const doc = parseProofDocument(parsed);
  if (!isHasherName(doc.hasher)) {
    throw new Error(`verify: unknown hasher "${doc.hasher}" in ${proofPath}`);
  }
  const hasherName = doc.hasher;
  const { siblings, root: documentRoot } = proofFromDocument(doc);
  const expectedRoot = opts.root !== undefined ? fromHex(opts.root.toLowerCase()) : documentRoot;

  const leaf =
    opts.leafFile !== undefined
      ? new Uint8Array(await readFile(opts.leafFile))
      : new TextEncoder().encode(opts.leaf);

  const valid = verifyMerkleProof(hasherByName(hasherName), leaf, siblings, expectedRoot, logger);

  console.log(valid ? "valid" : "invalid");
  console.log(`  leaf:   ${doc.leaf_index} of ${doc.leaf_count}`);
  console.log(`  root:   ${toHex(expectedRoot)}`);
  console.log(`  hasher: ${hasherName}`);

  return valid;
}
