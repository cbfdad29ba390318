/**
 * treehash bench [--size bytes] [--iterations n]
 *
 * Throughput of the reference and optimized SHA-256 paths on a
 * zero-filled buffer. Consumes the engine's digest functions only.
 */

import { sha256, sha256Fast } from "@treehash/sha256";

interface BenchOptions {
  size: number;
  iterations: number;
}

export interface BenchResult {
  engine: string;
  totalMs: number;
  opsPerSec: number;
  mibPerSec: number;
}

const ENGINES: ReadonlyArray<[string, (input: Uint8Array) => Uint8Array]> = [
  ["reference", sha256],
  ["fast", sha256Fast],
];

export function benchCommand(opts: BenchOptions): BenchResult[] {
  const data = new Uint8Array(opts.size);
  const results: BenchResult[] = [];

  console.log(`SHA-256 over ${opts.size} B × ${opts.iterations}`);

  for (const [engine, digest] of ENGINES) {
    digest(data); // warm-up

    const start = performance.now();
    for (let i = 0; i < opts.iterations; i++) {
      digest(data);
    }
    const totalMs = performance.now() - start;
    const seconds = Math.max(totalMs, 1e-3) / 1000;

    const result: BenchResult = {
      engine,
      totalMs,
      opsPerSec: opts.iterations / seconds,
      mibPerSec: (opts.size * opts.iterations) / (1024 * 1024) / seconds,
    };
    results.push(result);

    console.log(
      `  ${engine.padEnd(10)} ${result.opsPerSec.toFixed(0).padStart(10)} ops/s ` +
        `${result.mibPerSec.toFixed(1).padStart(8)} MiB/s`,
    );
  }

  return results;
}
