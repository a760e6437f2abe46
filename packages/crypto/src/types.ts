/** Raw digest bytes produced by a hash strategy. */
export type Digest = Uint8Array;

/** Lowercase hex encoding of a digest. */
export type HashHex = string;

/** Names of the built-in hash strategies. */
export type HashAlgorithm = 'sha256' | 'keccak256';

/**
 * A pluggable digest primitive.
 *
 * Any object of this shape can be handed to the Merkle tree; the built-in
 * strategies are thin wrappers around `@noble/hashes`.
 */
export interface HashStrategy {
  /** Identifier recorded in proofs and log output. */
  readonly name: string;
  /** Digest size in bytes. */
  readonly outputLength: number;
  /** Hash `data` and return a fresh byte array. Must be deterministic. */
  digest(data: Uint8Array): Digest;
}
