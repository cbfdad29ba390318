/**
 * treehash hash [file] [-s text]
 *
 * Print the SHA-256 digest of one file or one string.
 */

import { readFile } from "node:fs/promises";
import { hasherByName, toHex } from "@treehash/merkle";
import type { CliConfig } from "../lib/config.js";

interface HashOptions {
  string?: string;
}

export async function hashCommand(
  file: string | undefined,
  config: CliConfig,
  opts: HashOptions,
): Promise<string> {
  if ((file === undefined) === (opts.string === undefined)) {
    throw new Error("Give exactly one input: a file path or --string <text>");
  }

  const bytes =
    file !== undefined
      ? new Uint8Array(await readFile(file))
      : new TextEncoder().encode(opts.string);

  const digest = toHex(hasherByName(config.engine).hash(bytes));
  console.log(digest);
  return digest;
}
