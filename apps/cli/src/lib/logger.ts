/**
 * CLI logger — pino, written to stderr so stdout stays pipeable.
 * At `debug` the Merkle tree's trace records show up here.
 */

import pino, { type DestinationStream, type Logger } from "pino";
import type { LogLevel } from "./config.js";

export function createLogger(
  level: LogLevel,
  destination: DestinationStream = pino.destination(2),
): Logger {
  return pino({ name: "treehash", level, base: undefined }, destination);
}
