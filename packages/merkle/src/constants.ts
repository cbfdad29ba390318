/**
 * Tree and proof-document constants.
 */

export const CHUNK_SIZE_DEFAULT = 262_144; // 256 KiB
export const PROOF_DOCUMENT_VERSION = 1;
