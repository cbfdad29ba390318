/**
 * treehash CLI program — SHA-256 digests and Merkle inclusion proofs for files.
 *
 * Commands:
 *   hash [file] [-s text]            Digest of a file or a string
 *   root <paths...>                  Merkle root over files / directories
 *   proof <index> <paths...> [-o f]  MerkleProofV1 document for one leaf
 *   verify <proof-file> --leaf …     Check a leaf against a proof
 *   bench                            Reference vs optimized engine throughput
 *   config                           Show/set CLI configuration
 *
 * Global (before the command): --engine <reference|fast|noble> overrides
 * the configured hasher.
 *
 * Exit codes: 0 success, 1 on a rejected command or an invalid proof.
 */

import { Command, CommanderError } from "commander";
import {
  applyOverrides,
  loadConfig,
  parsePositiveInt,
  type CliConfig,
} from "./lib/config.js";
import { createLogger } from "./lib/logger.js";
import { hashCommand } from "./commands/hash.js";
import { rootCommand } from "./commands/root.js";
import { proofCommand } from "./commands/proof.js";
import { verifyCommand } from "./commands/verify.js";
import { benchCommand } from "./commands/bench.js";
import { configCommand } from "./commands/config-cmd.js";

/** Outcome a command reports without throwing (e.g. a proof that fails). */
export interface RunState {
  exitCode: number;
}

export function createProgram(state: RunState): Command {
  const program = new Command();

  program
    .name("treehash")
    .description("SHA-256 digests and Merkle inclusion proofs")
    .version("0.1.0")
    .enablePositionalOptions()
    .exitOverride()
    .option("-e, --engine <name>", "Hasher: reference | fast | noble");

  /** Config with command-line flags applied on top. */
  async function resolveConfig(overrides: { chunkSize?: string } = {}): Promise<CliConfig> {
    const { engine } = program.opts<{ engine?: string }>();
    return applyOverrides(await loadConfig(), { engine, chunkSize: overrides.chunkSize });
  }

  // ── hash ──────────────────────────────────────────────────────────

  program
    .command("hash")
    .description("Print the SHA-256 digest of a file or string")
    .argument("[file]", "File to hash")
    .option("-s, --string <text>", "Hash this UTF-8 string instead of a file")
    .action(async (file: string | undefined, opts: { string?: string }) => {
      const config = await resolveConfig();
      await hashCommand(file, config, opts);
    });

  // ── root ──────────────────────────────────────────────────────────

  program
    .command("root")
    .description("Build a Merkle tree over files/directories and print its root")
    .argument("<paths...>", "Files (chunked) and directories (one leaf per file)")
    .option("--chunk-size <bytes>", "Leaf size when splitting a file")
    .action(async (paths: string[], opts: { chunkSize?: string }) => {
      const config = await resolveConfig(opts);
      await rootCommand(paths, config, createLogger(config.logLevel));
    });

  // ── proof ─────────────────────────────────────────────────────────

  program
    .command("proof")
    .description("Emit an inclusion proof (MerkleProofV1 JSON) for one leaf")
    .argument("<index>", "Leaf index (0-based, ingestion order)")
    .argument("<paths...>", "Same inputs as `root`")
    .option("-o, --output <file>", "Write the proof to a file instead of stdout")
    .option("--chunk-size <bytes>", "Leaf size when splitting a file")
    .action(
      async (index: string, paths: string[], opts: { output?: string; chunkSize?: string }) => {
        const config = await resolveConfig(opts);
        await proofCommand(index, paths, config, opts, createLogger(config.logLevel));
      },
    );

  // ── verify ────────────────────────────────────────────────────────

  program
    .command("verify")
    .description("Verify a leaf against a proof document")
    .argument("<proof-file>", "MerkleProofV1 JSON file")
    .option("--leaf <text>", "Leaf data as a UTF-8 string")
    .option("--leaf-file <path>", "Leaf data from a file")
    .option("--root <hex>", "Trusted root (default: the document's root)")
    .action(async (proofFile: string, opts: { leaf?: string; leafFile?: string; root?: string }) => {
      const config = await resolveConfig();
      const valid = await verifyCommand(proofFile, opts, createLogger(config.logLevel));
      if (!valid) state.exitCode = 1;
    });

  // ── bench ─────────────────────────────────────────────────────────

  program
    .command("bench")
    .description("Compare reference and optimized SHA-256 throughput")
    .option("--size <bytes>", "Input size", "1024")
    .option("--iterations <n>", "Digests per engine", "10000")
    .action((opts: { size: string; iterations: string }) => {
      benchCommand({
        size: parsePositiveInt(opts.size, "--size"),
        iterations: parsePositiveInt(opts.iterations, "--iterations"),
      });
    });

  // ── config ────────────────────────────────────────────────────────

  program
    .command("config")
    .description("Show or update CLI configuration")
    .option("--engine <name>", "Set default hasher")
    .option("--chunk-size <bytes>", "Set default leaf size for files")
    .option("--log-level <level>", "Set log level (debug shows tree traces)")
    .action(async (opts: { engine?: string; chunkSize?: string; logLevel?: string }) => {
      await configCommand(opts);
    });

  return program;
}

/**
 * Parse argv (node-style: [node, script, ...args]) and run one command.
 * Resolves to the process exit code; never rejects.
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  const state: RunState = { exitCode: 0 };
  try {
    await createProgram(state).parseAsync(argv);
  } catch (err) {
    // Commander has already printed usage errors, help and version
    if (err instanceof CommanderError) return err.exitCode;
    console.error(`\nError: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  return state.exitCode;
}
