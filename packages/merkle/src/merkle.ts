/**
 * Binary Merkle tree over ordered data blocks.
 *
 *   leaf   = H(block)
 *   parent = H(canonical(left, right))     see combine.ts
 *   root   = last remaining node
 *
 * Odd level: the last node is paired with itself (duplicated, not promoted).
 * Empty input: no root.
 *
 * Lifecycle: construct with a hasher → build() → query any number of times.
 * build() replaces all previous state; there is no incremental insert.
 */

import { equalBytes, toHex } from "./bytes.js";
import { canonicalConcat, combineDigests } from "./combine.js";
import type {
  Digest,
  Hasher,
  MerkleNode,
  MerkleTreeOptions,
  TraceLogger,
} from "./types.js";

export class MerkleTree {
  /** levels[0] = leaves, last level = [root]. Empty when built from zero blocks. */
  private levelNodes: MerkleNode[][] = [];

  constructor(
    private readonly hasher: Hasher,
    private readonly options: MerkleTreeOptions = {},
  ) {}

  /**
   * Build the tree from ordered blocks, replacing any previous tree.
   * Throws if the hasher's digest length changes mid-build; the previous
   * tree is kept in that case.
   */
  build(blocks: readonly Uint8Array[]): void {
    let digestLength: number | null = null;
    const hash = (input: Uint8Array): Digest => {
      const digest = this.hasher.hash(input);
      if (digestLength === null) {
        digestLength = digest.length;
      } else if (digest.length !== digestLength) {
        throw new Error(
          `MerkleTree.build: hasher returned ${digest.length}-byte digest, expected ${digestLength}`,
        );
      }
      return digest;
    };

    const leaves: MerkleNode[] = blocks.map((block) => ({
      digest: hash(block),
      left: null,
      right: null,
    }));

    const levels: MerkleNode[][] = leaves.length > 0 ? [leaves] : [];
    let level = leaves;

    while (level.length > 1) {
      const next: MerkleNode[] = [];
      for (let i = 0; i < level.length; i += 2) {
        const left = level[i]!;
        // Odd count: last node pairs with itself
        const right = i + 1 < level.length ? level[i + 1]! : left;
        next.push({
          digest: hash(canonicalConcat(left.digest, right.digest)),
          left,
          right,
        });
      }
      levels.push(next);
      level = next;
    }

    this.levelNodes = levels;
    this.options.logger?.debug(
      { leaves: leaves.length, levels: levels.length },
      "merkle tree built",
    );
  }

  /** Root digest, or null if the tree has no leaves. */
  root(): Digest | null {
    const top = this.levelNodes[this.levelNodes.length - 1];
    return top ? top[0]!.digest.slice() : null;
  }

  get leafCount(): number {
    return this.levelNodes[0]?.length ?? 0;
  }

  /** Leaf digest at index, or null if out of range. */
  leafDigest(index: number): Digest | null {
    if (!this.inRange(index)) return null;
    return this.levelNodes[0]![index]!.digest.slice();
  }

  /** Digests level by level, leaves first, root last. */
  levels(): Digest[][] {
    return this.levelNodes.map((level) => level.map((node) => node.digest.slice()));
  }

  /**
   * Sibling digests from the leaf at `index` up to (excluding) the root,
   * leaf-to-root. Null if `index` is out of range or the tree is empty.
   *
   * Pairing per level matches build(): even ↔ index+1, odd ↔ index-1,
   * last node of an odd level ↔ itself.
   */
  generateProof(index: number): Digest[] | null {
    if (!this.inRange(index)) return null;

    const { logger } = this.options;
    const proof: Digest[] = [];
    let position = index;

    for (let depth = 0; depth < this.levelNodes.length - 1; depth++) {
      const level = this.levelNodes[depth]!;
      const siblingIndex =
        position % 2 === 0 ? Math.min(position + 1, level.length - 1) : position - 1;
      const sibling = level[siblingIndex]!.digest;

      proof.push(sibling.slice());
      logger?.debug(
        { level: depth, index: position, sibling: toHex(sibling) },
        "merkle proof step",
      );
      position = Math.floor(position / 2);
    }

    return proof;
  }

  /**
   * Verify a proof against an expected root using this tree's hasher.
   * Does not consult the tree's own state.
   */
  verifyProof(leafData: Uint8Array, proof: readonly Digest[], expectedRoot: Digest): boolean {
    return verifyMerkleProof(this.hasher, leafData, proof, expectedRoot, this.options.logger);
  }

  private inRange(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.leafCount;
  }
}

/**
 * Verify an inclusion proof without a tree instance.
 *
 * Starts from H(leafData), folds each sibling with the canonical rule,
 * and compares the result with `expectedRoot`. Never throws for
 * well-typed input: an empty proof, wrong-length entries or a wrong-length
 * root simply fail to match.
 */
export function verifyMerkleProof(
  hasher: Hasher,
  leafData: Uint8Array,
  proof: readonly Digest[],
  expectedRoot: Digest,
  logger?: TraceLogger,
): boolean {
  let current = hasher.hash(leafData);

  proof.forEach((sibling, step) => {
    current = combineDigests(hasher, current, sibling);
    logger?.debug({ step, digest: toHex(current) }, "merkle verify step");
  });

  const valid = equalBytes(current, expectedRoot);
  logger?.debug({ valid, steps: proof.length }, "merkle proof verified");
  return valid;
}
