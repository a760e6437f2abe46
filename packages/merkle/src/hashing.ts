import { concatBytes } from '@arbor/crypto';
import type { Digest, HashStrategy } from '@arbor/crypto';
import { ArborError, ArborErrorCode, describeError, isByteArray } from '@arbor/types';

import type { Content } from './types';

/**
 * Ask a content item for its digest. The result is a copy the tree owns,
 * never the buffer the item returned.
 *
 * @throws {ArborError} `HASH_FAILURE` when `calculateHash()` throws or does
 *   not return bytes.
 */
export function digestContent(content: Content, index: number): Digest {
  let digest: unknown;
  try {
    digest = content.calculateHash();
  } catch (err) {
    throw new ArborError(
      ArborErrorCode.HASH_FAILURE,
      `Content at index ${index} failed to compute its digest: ${describeError(err)}`,
      { cause: err, context: { index } }
    );
  }
  if (!isByteArray(digest)) {
    throw new ArborError(
      ArborErrorCode.HASH_FAILURE,
      `Content at index ${index} returned a ${typeof digest} instead of a Uint8Array digest`,
      { context: { index }, hint: 'calculateHash() must return a Uint8Array.' }
    );
  }
  return digest.slice();
}

/**
 * Parent digest of two children: `H(left ++ right)`, never reordered.
 *
 * @throws {ArborError} `HASH_FAILURE` when the strategy throws or does not
 *   return bytes.
 */
export function hashPair(strategy: HashStrategy, left: Digest, right: Digest): Digest {
  let digest: unknown;
  try {
    digest = strategy.digest(concatBytes(left, right));
  } catch (err) {
    throw new ArborError(
      ArborErrorCode.HASH_FAILURE,
      `Hash strategy "${strategy.name}" failed: ${describeError(err)}`,
      { cause: err, context: { algorithm: strategy.name } }
    );
  }
  if (!isByteArray(digest)) {
    throw new ArborError(
      ArborErrorCode.HASH_FAILURE,
      `Hash strategy "${strategy.name}" returned a ${typeof digest} instead of a Uint8Array`,
      { context: { algorithm: strategy.name } }
    );
  }
  return digest.slice();
}
