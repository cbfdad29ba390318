#!/usr/bin/env node
/**
 * treehash CLI entry. Commands live in program.ts.
 */

import { runCli } from "./program.js";

process.exitCode = await runCli(process.argv);
