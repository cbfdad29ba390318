/**
 * treehash config [--engine e] [--chunk-size n] [--log-level l]
 *
 * Show or update CLI configuration.
 */

import {
  loadConfig,
  saveConfig,
  getConfigPath,
  parseEngine,
  parseLogLevel,
  parsePositiveInt,
  type CliConfig,
} from "../lib/config.js";

interface ConfigOptions {
  engine?: string;
  chunkSize?: string;
  logLevel?: string;
}

export async function configCommand(opts: ConfigOptions): Promise<CliConfig> {
  const config = await loadConfig();
  let changed = false;

  if (opts.engine) {
    config.engine = parseEngine(opts.engine, "--engine");
    changed = true;
  }
  if (opts.chunkSize) {
    config.chunkSize = parsePositiveInt(opts.chunkSize, "--chunk-size");
    changed = true;
  }
  if (opts.logLevel) {
    config.logLevel = parseLogLevel(opts.logLevel, "--log-level");
    changed = true;
  }

  if (changed) {
    await saveConfig(config);
    console.log(`Config saved to ${getConfigPath()}`);
  }

  console.log(`\nCurrent config:`);
  console.log(`  engine:    ${config.engine}`);
  console.log(`  chunkSize: ${config.chunkSize}`);
  console.log(`  logLevel:  ${config.logLevel}`);

  return config;
}
