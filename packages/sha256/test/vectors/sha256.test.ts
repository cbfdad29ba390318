/**
 * Golden test vectors — SHA-256 reference path.
 * FIPS 180-4 / NIST CSHA known answers. These vectors are FROZEN.
 */

import { describe, it, expect } from "vitest";
import { bytesToHex } from "@noble/hashes/utils";
import {
  sha256,
  padMessage,
  messageSchedule,
  compress,
  stateToDigest,
  smallSigma1,
} from "../../src/sha256.js";
import { SHA256_H0 } from "../../src/constants.js";

const utf8 = (s: string) => new TextEncoder().encode(s);
const hex = (input: Uint8Array) => bytesToHex(sha256(input));

describe("sha256 known answers", () => {
  it("empty input", () => {
    expect(hex(new Uint8Array(0))).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  it("'abc' (one block)", () => {
    expect(hex(utf8("abc"))).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });

  it("448-bit message (two blocks)", () => {
    expect(
      hex(utf8("abcdbcdecdefdefgefghfghighijhijkijkljklmklmnlmnomnopnopq")),
    ).toBe("248d6a61d20638b8e5c026930c3e6039a33ce45964ff2167f6ecedd419db06c1");
  });

  it("single character", () => {
    expect(hex(utf8("a"))).toBe(
      "ca978112ca1bbdcafac231b39a23dc4da786eff8147c4e72b9807785afee48bb",
    );
  });

  it("'hello world'", () => {
    expect(hex(utf8("hello world"))).toBe(
      "b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9",
    );
  });

  it("one million 'a'", () => {
    const input = new Uint8Array(1_000_000).fill(0x61);
    expect(hex(input)).toBe(
      "cdc76e5c9914fb9281a1c7e284d73e67f1809a48a497200e046d39ccc7112cd0",
    );
  });

  it("digest is always 32 bytes", () => {
    for (const len of [0, 1, 55, 56, 63, 64, 65, 127, 128, 1000]) {
      expect(sha256(new Uint8Array(len))).toHaveLength(32);
    }
  });

  it("does not mutate its input", () => {
    const input = utf8("leave me alone");
    const copy = input.slice();
    sha256(input);
    expect(input).toEqual(copy);
  });
});

describe("padMessage", () => {
  it("empty message → one block: 0x80 then zeros", () => {
    const padded = padMessage(new Uint8Array(0));
    expect(padded).toHaveLength(64);
    expect(padded[0]).toBe(0x80);
    expect(padded.subarray(1).every((b) => b === 0)).toBe(true);
  });

  it("'abc' → marker after message, bit length 24 at the end", () => {
    const padded = padMessage(utf8("abc"));
    expect(padded).toHaveLength(64);
    expect(Array.from(padded.subarray(0, 4))).toEqual([0x61, 0x62, 0x63, 0x80]);
    expect(padded[62]).toBe(0x00);
    expect(padded[63]).toBe(0x18);
  });

  it("55 bytes fit one block, 56 need two", () => {
    expect(padMessage(new Uint8Array(55))).toHaveLength(64);
    expect(padMessage(new Uint8Array(56))).toHaveLength(128);
    expect(padMessage(new Uint8Array(64))).toHaveLength(128);
    expect(padMessage(new Uint8Array(119))).toHaveLength(128);
    expect(padMessage(new Uint8Array(120))).toHaveLength(192);
  });

  it("length field is big-endian bits", () => {
    // 70 bytes = 560 bits = 0x0230
    const padded = padMessage(new Uint8Array(70));
    expect(padded).toHaveLength(128);
    expect(padded[70]).toBe(0x80);
    expect(Array.from(padded.subarray(120))).toEqual([0, 0, 0, 0, 0, 0, 0x02, 0x30]);
  });
});

describe("messageSchedule", () => {
  it("first 16 words are the block read big-endian", () => {
    const w = messageSchedule(padMessage(utf8("abc")));
    expect(w[0]).toBe(0x61626380);
    expect(w[1]).toBe(0);
    expect(w[15]).toBe(0x18);
  });

  it("expands words 16..63", () => {
    const w = messageSchedule(padMessage(utf8("abc")));
    // w16 = w0 + σ0(w1) + w9 + σ1(w14), all but w0 zero
    expect(w[16]).toBe(0x61626380);
    // w17 = w1 + σ0(w2) + w10 + σ1(w15 = 0x18)
    expect(smallSigma1(0x18)).toBe(0x000f0000);
    expect(w[17]).toBe(0x000f0000);
    expect(w).toHaveLength(64);
  });

  it("rejects a block that is not 64 bytes", () => {
    expect(() => messageSchedule(new Uint8Array(63))).toThrow(
      "block must be 64 bytes",
    );
  });
});

describe("compress", () => {
  it("one block from the initial state gives the 'abc' digest", () => {
    const state = Uint32Array.from(SHA256_H0);
    compress(state, padMessage(utf8("abc")));
    expect(state[0]).toBe(0xba7816bf);
    expect(bytesToHex(stateToDigest(state))).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });
});
