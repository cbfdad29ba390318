/**
 * Schema barrel export.
 */

export { MerkleProofV1 } from "./proof.js";
