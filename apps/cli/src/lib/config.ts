/**
 * CLI configuration — loads from ~/.treehash/config.json + env overrides.
 *
 * Priority: command-line flag > env vars > config file > defaults.
 * TREEHASH_HOME relocates the config directory (tests, sandboxes).
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  CHUNK_SIZE_DEFAULT,
  HASHER_NAMES,
  isHasherName,
  type HasherName,
} from "@treehash/merkle";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CliConfig {
  /** Hasher used for leaves and inner nodes. */
  engine: HasherName;
  /** Block size when a single file is split into leaves. */
  chunkSize: number;
  logLevel: LogLevel;
}

const CliConfigFile = Type.Object(
  {
    engine: Type.Optional(Type.Union(HASHER_NAMES.map((name) => Type.Literal(name)))),
    chunkSize: Type.Optional(Type.Integer({ minimum: 1 })),
    logLevel: Type.Optional(Type.Union(LOG_LEVELS.map((level) => Type.Literal(level)))),
  },
  { additionalProperties: false },
);

type CliConfigFile = Static<typeof CliConfigFile>;

const DEFAULTS: CliConfig = {
  engine: "fast",
  chunkSize: CHUNK_SIZE_DEFAULT,
  logLevel: "info",
};

export function getConfigDir(): string {
  return process.env["TREEHASH_HOME"] ?? join(homedir(), ".treehash");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

export async function ensureConfigDir(): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseEngine(value: string, source: string): HasherName {
  if (!isHasherName(value)) {
    throw new Error(`${source} must be one of ${HASHER_NAMES.join(", ")}, got "${value}"`);
  }
  return value;
}

export function parseLogLevel(value: string, source: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new Error(`${source} must be one of ${LOG_LEVELS.join(", ")}, got "${value}"`);
  }
  return value;
}

export function parsePositiveInt(value: string, source: string): number {
  const n = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new Error(`${source} must be a positive integer, got "${value}"`);
  }
  return n;
}

async function readConfigFile(path: string): Promise<CliConfigFile> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return {}; // No config file yet: defaults
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`Invalid config at ${path}: not valid JSON`);
  }

  if (!Value.Check(CliConfigFile, parsed)) {
    const first = Value.Errors(CliConfigFile, parsed).First();
    const detail = first ? `${first.path || "/"} ${first.message}` : "unexpected shape";
    throw new Error(`Invalid config at ${path}: ${detail}`);
  }
  return parsed;
}

/** Load config, merging env overrides on top. */
export async function loadConfig(): Promise<CliConfig> {
  const fileConfig = await readConfigFile(getConfigPath());

  const envEngine = process.env["TREEHASH_ENGINE"];
  const envChunkSize = process.env["TREEHASH_CHUNK_SIZE"];
  const envLogLevel = process.env["TREEHASH_LOG_LEVEL"];

  return {
    engine: envEngine
      ? parseEngine(envEngine, "TREEHASH_ENGINE")
      : fileConfig.engine ?? DEFAULTS.engine,
    chunkSize: envChunkSize
      ? parsePositiveInt(envChunkSize, "TREEHASH_CHUNK_SIZE")
      : fileConfig.chunkSize ?? DEFAULTS.chunkSize,
    logLevel: envLogLevel
      ? parseLogLevel(envLogLevel, "TREEHASH_LOG_LEVEL")
      : fileConfig.logLevel ?? DEFAULTS.logLevel,
  };
}

export interface ConfigOverrides {
  engine?: string;
  chunkSize?: string;
}

/** Command-line flags win over everything loadConfig() merged. */
export function applyOverrides(config: CliConfig, overrides: ConfigOverrides): CliConfig {
  return {
    ...config,
    engine: overrides.engine ? parseEngine(overrides.engine, "--engine") : config.engine,
    chunkSize: overrides.chunkSize
      ? parsePositiveInt(overrides.chunkSize, "--chunk-size")
      : config.chunkSize,
  };
}

/** Save config to disk. */
export async function saveConfig(config: CliConfig): Promise<void> {
  await ensureConfigDir();
  const toSave: CliConfigFile = {
    engine: config.engine,
    chunkSize: config.chunkSize,
    logLevel: config.logLevel,
  };
  await writeFile(getConfigPath(), JSON.stringify(toSave, null, 2) + "\n", "utf-8");
}
