/**
 * Hash strategy registry.
 *
 * A strategy selects the digest primitive a Merkle tree uses for its
 * internal nodes. Callers pass either a built-in name or their own object
 * implementing {@link HashStrategy}.
 *
 * @packageDocumentation
 */

import { ArborError, ArborErrorCode, assertNever } from '@arbor/types';

import { keccak256, sha256 } from './hash';
import type { HashAlgorithm, HashStrategy } from './types';

/** SHA-256 (FIPS 180-4), 32-byte digests. */
export const SHA256_STRATEGY: HashStrategy = Object.freeze({
  name: 'sha256',
  outputLength: 32,
  digest: (data: Uint8Array) => sha256(data),
});

/** Keccak-256 as used by Ethereum, 32-byte digests. */
export const KECCAK256_STRATEGY: HashStrategy = Object.freeze({
  name: 'keccak256',
  outputLength: 32,
  digest: (data: Uint8Array) => keccak256(data),
});

/** Algorithm used when none is configured. */
export const DEFAULT_HASH_ALGORITHM: HashAlgorithm = 'sha256';

const ALGORITHMS: readonly HashAlgorithm[] = ['sha256', 'keccak256'];

/** Names accepted by {@link getHashStrategy}. */
export function listHashAlgorithms(): readonly HashAlgorithm[] {
  return ALGORITHMS;
}

/** Whether `name` is one of the built-in algorithm names. */
export function isHashAlgorithm(name: string): name is HashAlgorithm {
  return ALGORITHMS.some((algorithm) => algorithm === name);
}

/**
 * Look up a built-in strategy by name.
 *
 * @throws {ArborError} `UNKNOWN_HASH_ALGORITHM` for any other name.
 *
 * @example
 * ```typescript
 * getHashStrategy('keccak256').outputLength; // 32
 * ```
 */
export function getHashStrategy(name: string): HashStrategy {
  if (!isHashAlgorithm(name)) {
    throw new ArborError(
      ArborErrorCode.UNKNOWN_HASH_ALGORITHM,
      `Unknown hash algorithm "${name}"`,
      {
        hint: `Use one of ${ALGORITHMS.join(', ')} or pass a HashStrategy object.`,
        context: { name },
      }
    );
  }
  switch (name) {
    case 'sha256':
      return SHA256_STRATEGY;
    case 'keccak256':
      return KECCAK256_STRATEGY;
    default:
      return assertNever(name);
  }
}

/**
 * Structural check for a caller-supplied strategy.
 */
export function isHashStrategy(value: unknown): value is HashStrategy {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'outputLength' in value &&
    typeof value.outputLength === 'number' &&
    'digest' in value &&
    typeof value.digest === 'function'
  );
}

/**
 * Normalize a strategy option: a name is looked up, an object is used
 * as-is and `undefined` selects SHA-256.
 */
export function resolveHashStrategy(strategy?: HashStrategy | string): HashStrategy {
  if (strategy === undefined) {
    return getHashStrategy(DEFAULT_HASH_ALGORITHM);
  }
  if (typeof strategy === 'string') {
    return getHashStrategy(strategy);
  }
  if (!isHashStrategy(strategy)) {
    throw new ArborError(
      ArborErrorCode.UNKNOWN_HASH_ALGORITHM,
      'hashStrategy must be an algorithm name or an object with name, outputLength and digest()',
    );
  }
  return strategy;
}
