/**
 * treehash proof <index> <paths...> [-o file]
 *
 * Build the tree and emit a MerkleProofV1 document for one leaf.
 * Leaf order is the ingestion order (see lib/ingest.ts).
 */

import { writeFile } from "node:fs/promises";
import { proofDocument, type MerkleProofV1, type TraceLogger } from "@treehash/merkle";
import type { CliConfig } from "../lib/config.js";
import { buildTreeFromPaths } from "./root.js";

interface ProofOptions {
  output?: string;
}

function parseIndex(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`index must be a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

export async function proofCommand(
  indexArg: string,
  paths: readonly string[],
  config: CliConfig,
  opts: ProofOptions,
  logger?: TraceLogger,
): Promise<MerkleProofV1> {
  const index = parseIndex(indexArg);
  const { tree, blocks } = await buildTreeFromPaths(paths, config, logger);

  const doc = proofDocument(tree, index, config.engine);
  if (!doc) {
    throw new Error(`Leaf index ${index} out of range (${tree.leafCount} leaves)`);
  }

  const json = JSON.stringify(doc, null, 2);
  if (opts.output) {
    await writeFile(opts.output, json + "\n", "utf-8");
    console.log(`Proof for ${blocks[index]?.source ?? `leaf ${index}`} written: ${opts.output}`);
  } else {
    console.log(json);
  }

  return doc;
}
