/**
 * MerkleProofV1 — portable inclusion proof.
 *
 * Everything a verifier needs besides the leaf bytes: the sibling path,
 * the root it should reach, and which hasher produced them.
 */

import { Type, type Static } from "@sinclair/typebox";

const Hex = Type.String({ pattern: "^(?:[0-9a-f]{2})+$" });

export const MerkleProofV1 = Type.Object(
  {
    version: Type.Literal(1),
    hasher: Type.String({ minLength: 1 }),
    leaf_index: Type.Integer({ minimum: 0 }),
    leaf_count: Type.Integer({ minimum: 1 }),
    siblings: Type.Array(Hex),
    root: Hex,
  },
  { additionalProperties: false },
);

export type MerkleProofV1 = Static<typeof MerkleProofV1>;
