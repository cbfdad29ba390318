/**
 * treehash root <paths...>
 *
 * Ingest → build → print root and leaf count.
 */

import { MerkleTree, hasherByName, toHex, type TraceLogger } from "@treehash/merkle";
import type { CliConfig } from "../lib/config.js";
import { ingestPaths, type IngestedBlock } from "../lib/ingest.js";

export interface BuiltTree {
  tree: MerkleTree;
  blocks: IngestedBlock[];
}

/** Shared by root/proof: read the paths and build a tree over them. */
export async function buildTreeFromPaths(
  paths: readonly string[],
  config: CliConfig,
  logger?: TraceLogger,
): Promise<BuiltTree> {
  const blocks = await ingestPaths(paths, config.chunkSize);
  const tree = new MerkleTree(hasherByName(config.engine), { logger });
  tree.build(blocks.map((b) => b.bytes));
  return { tree, blocks };
}

export async function rootCommand(
  paths: readonly string[],
  config: CliConfig,
  logger?: TraceLogger,
): Promise<{ root: string | null; leafCount: number }> {
  const { tree } = await buildTreeFromPaths(paths, config, logger);
  const rootDigest = tree.root();
  const root = rootDigest ? toHex(rootDigest) : null;

  console.log(`root:   ${root ?? "(empty)"}`);
  console.log(`leaves: ${tree.leafCount}`);
  console.log(`engine: ${config.engine}`);

  return { root, leafCount: tree.leafCount };
}
