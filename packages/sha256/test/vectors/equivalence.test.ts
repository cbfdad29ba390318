/**
 * Reference path ≡ hot path ≡ independent implementation.
 *
 * sha256Fast() reads full blocks in place and stages only the tail, so
 * the interesting inputs sit around block boundaries and non-zero
 * byteOffsets.
 */

import { describe, it, expect } from "vitest";
import { sha256 as nobleSha256 } from "@noble/hashes/sha256";
import { sha256 } from "../../src/sha256.js";
import { sha256Fast } from "../../src/fast.js";

/** Deterministic filler bytes (LCG), so failures reproduce. */
function patternBytes(length: number, seed = 1): Uint8Array {
  const out = new Uint8Array(length);
  let x = seed >>> 0;
  for (let i = 0; i < length; i++) {
    x = (Math.imul(x, 1664525) + 1013904223) >>> 0;
    out[i] = x >>> 24;
  }
  return out;
}

describe("sha256Fast ≡ sha256", () => {
  it("empty input", () => {
    const empty = new Uint8Array(0);
    expect(sha256Fast(empty)).toEqual(sha256(empty));
  });

  it("every length from 0 to 200 bytes", () => {
    for (let len = 0; len <= 200; len++) {
      const input = patternBytes(len, len + 1);
      expect(sha256Fast(input), `length ${len}`).toEqual(sha256(input));
    }
  });

  it("block boundaries", () => {
    for (const len of [55, 56, 63, 64, 65, 119, 120, 128, 129]) {
      const input = patternBytes(len, 7);
      expect(sha256Fast(input), `length ${len}`).toEqual(sha256(input));
    }
  });

  it("multi-kilobyte inputs", () => {
    for (const len of [1024, 4096, 10_000, 65_537]) {
      const input = patternBytes(len, 42);
      expect(sha256Fast(input), `length ${len}`).toEqual(sha256(input));
    }
  });

  it("views with a non-zero byteOffset", () => {
    const backing = patternBytes(400, 9);
    for (const [start, end] of [[1, 1], [7, 157], [3, 131], [64, 400]] as const) {
      const view = backing.subarray(start, end);
      expect(sha256Fast(view), `[${start}, ${end})`).toEqual(sha256(view));
    }
  });

  it("repeated calls share no state", () => {
    const a = patternBytes(100, 1);
    const b = patternBytes(300, 2);
    const first = sha256Fast(a);
    sha256Fast(b);
    expect(sha256Fast(a)).toEqual(first);
  });
});

describe("agreement with @noble/hashes", () => {
  it("both paths match an independent implementation", () => {
    for (const len of [0, 1, 3, 55, 56, 64, 100, 1000, 5000]) {
      const input = patternBytes(len, 3);
      const expected = nobleSha256(input);
      expect(sha256(input), `reference, length ${len}`).toEqual(expected);
      expect(sha256Fast(input), `fast, length ${len}`).toEqual(expected);
    }
  });
});
