/**
 * MerkleProofV1 documents — build, validate, decode, verify.
 */

import { describe, it, expect } from "vitest";
import { MerkleTree, verifyMerkleProof } from "../../src/merkle.js";
import { sha256FastHasher, hasherByName, isHasherName, HASHER_NAMES } from "../../src/hashers.js";
import { toHex } from "../../src/bytes.js";
import {
  proofDocument,
  parseProofDocument,
  proofFromDocument,
} from "../../src/proof-document.js";

const utf8 = (s: string) => new TextEncoder().encode(s);
const blocks = ["alpha", "beta", "gamma"].map(utf8);

function tree(): MerkleTree {
  const t = new MerkleTree(sha256FastHasher);
  t.build(blocks);
  return t;
}

describe("proofDocument", () => {
  it("describes one leaf's proof in hex", () => {
    const t = tree();
    const doc = proofDocument(t, 1, "fast");

    expect(doc).toEqual({
      version: 1,
      hasher: "fast",
      leaf_index: 1,
      leaf_count: 3,
      siblings: (t.generateProof(1) ?? []).map(toHex),
      root: toHex(t.root() ?? new Uint8Array(0)),
    });
  });

  it("null for out-of-range index or empty tree", () => {
    expect(proofDocument(tree(), 3, "fast")).toBeNull();
    expect(proofDocument(new MerkleTree(sha256FastHasher), 0, "fast")).toBeNull();
  });

  it("survives JSON and verifies", () => {
    const doc = proofDocument(tree(), 2, "fast");
    const parsed = parseProofDocument(JSON.parse(JSON.stringify(doc)));
    const { siblings, root } = proofFromDocument(parsed);

    expect(
      verifyMerkleProof(hasherByName(parsed.hasher), utf8("gamma"), siblings, root),
    ).toBe(true);
    expect(
      verifyMerkleProof(hasherByName(parsed.hasher), utf8("delta"), siblings, root),
    ).toBe(false);
  });
});

describe("parseProofDocument", () => {
  const valid = {
    version: 1,
    hasher: "reference",
    leaf_index: 0,
    leaf_count: 2,
    siblings: ["ab".repeat(32)],
    root: "cd".repeat(32),
  };

  it("accepts a well-formed document", () => {
    expect(parseProofDocument(valid)).toEqual(valid);
  });

  it("rejects a missing field", () => {
    const { root: _root, ...rest } = valid;
    expect(() => parseProofDocument(rest)).toThrow("parseProofDocument:");
  });

  it("rejects uppercase or odd-length hex", () => {
    expect(() => parseProofDocument({ ...valid, root: "CD".repeat(32) })).toThrow(
      "parseProofDocument: /root",
    );
    expect(() => parseProofDocument({ ...valid, siblings: ["abc"] })).toThrow(
      "parseProofDocument: /siblings/0",
    );
  });

  it("rejects unknown versions and extra fields", () => {
    expect(() => parseProofDocument({ ...valid, version: 2 })).toThrow("parseProofDocument:");
    expect(() => parseProofDocument({ ...valid, extra: true })).toThrow("parseProofDocument:");
  });

  it("rejects a leaf index beyond the leaf count", () => {
    expect(() => parseProofDocument({ ...valid, leaf_index: 2 })).toThrow(
      "leaf_index 2 out of range for 2 leaves",
    );
  });

  it("rejects non-objects", () => {
    expect(() => parseProofDocument(null)).toThrow("parseProofDocument:");
    expect(() => parseProofDocument("proof")).toThrow("parseProofDocument:");
  });
});

describe("hasher names", () => {
  it("lists every registered hasher", () => {
    expect(HASHER_NAMES).toEqual(["reference", "fast", "noble"]);
    for (const name of HASHER_NAMES) {
      expect(isHasherName(name)).toBe(true);
    }
  });

  it("all registered hashers agree", () => {
    const input = utf8("same bytes");
    const [first, ...rest] = HASHER_NAMES.map((name) => hasherByName(name).hash(input));
    for (const digest of rest) {
      expect(digest).toEqual(first);
    }
  });

  it("unknown names throw", () => {
    expect(isHasherName("md5")).toBe(false);
    expect(isHasherName("toString")).toBe(false);
    expect(() => hasherByName("md5")).toThrow('unknown hasher "md5"');
  });
});
