/**
 * Audit paths: extraction from a built tree and verification without one.
 *
 * A verifier holding only a claimed root needs the leaf digest and the
 * sibling digests along the path, O(log n) of them, to confirm inclusion.
 *
 * @packageDocumentation
 */

import { constantTimeEqual, getHashStrategy, isHashAlgorithm } from '@arbor/crypto';
import type { Digest, HashStrategy } from '@arbor/crypto';
import { assertNever, isByteArray } from '@arbor/types';

import { hashPair } from './hashing';
import type { MerklePath, MerkleProof, ProofStep } from './types';

/**
 * Collect the sibling of `leafIndex` on every level below the root.
 *
 * `levels` runs from the leaves to the root and every level except the last
 * has an even node count, so each node has a sibling at `index ^ 1`.
 */
export function extractPath(
  levels: readonly (readonly { readonly digest: Digest }[])[],
  leafIndex: number,
): ProofStep[] {
  const steps: ProofStep[] = [];
  let index = leafIndex;
  for (let level = 0; level < levels.length - 1; level++) {
    const isLeft = index % 2 === 0;
    const sibling = levels[level][isLeft ? index + 1 : index - 1];
    steps.push({
      digest: sibling.digest.slice(),
      position: isLeft ? 'right' : 'left',
    });
    index = index >> 1;
  }
  return steps;
}

/**
 * Fold `path` onto `leafDigest` and return the resulting root.
 *
 * @throws {ArborError} `HASH_FAILURE` when the strategy fails.
 */
export function computeRootFromPath(leafDigest: Digest, path: MerklePath, strategy: HashStrategy): Digest {
  let current = leafDigest;
  for (const step of path) {
    switch (step.position) {
      case 'left':
        current = hashPair(strategy, step.digest, current);
        break;
      case 'right':
        current = hashPair(strategy, current, step.digest);
        break;
      default:
        return assertNever(step.position);
    }
  }
  return current;
}

/** Structural check for a path received from outside the process. */
export function isMerklePath(value: unknown): value is MerklePath {
  if (!Array.isArray(value)) {
    return false;
  }
  return value.every((step: unknown) =>
    typeof step === 'object' &&
    step !== null &&
    'digest' in step &&
    isByteArray(step.digest) &&
    'position' in step &&
    (step.position === 'left' || step.position === 'right'),
  );
}

/**
 * Check that `path` leads from `leafDigest` to `root`.
 *
 * Malformed input yields `false`; only a failing hash strategy throws.
 *
 * @example
 * ```typescript
 * const path = tree.getMerklePath(item);
 * verifyMerklePath(item.calculateHash(), path, tree.merkleRoot(), SHA256_STRATEGY); // true
 * ```
 */
export function verifyMerklePath(
  leafDigest: Digest,
  path: MerklePath,
  root: Digest,
  strategy: HashStrategy,
): boolean {
  if (!isByteArray(leafDigest) || !isByteArray(root) || !isMerklePath(path)) {
    return false;
  }
  return constantTimeEqual(computeRootFromPath(leafDigest, path, strategy), root);
}

/**
 * Whether the sibling positions in `path` are the ones a leaf at
 * `leafIndex` would have: bit k of the index is 0 when the sibling at
 * step k is on the right.
 */
export function pathMatchesIndex(path: MerklePath, leafIndex: number): boolean {
  if (!Number.isInteger(leafIndex) || leafIndex < 0 || leafIndex >= 2 ** path.length) {
    return false;
  }
  let index = leafIndex;
  for (const step of path) {
    const expected = index % 2 === 0 ? 'right' : 'left';
    if (step.position !== expected) {
      return false;
    }
    index = Math.floor(index / 2);
  }
  return true;
}

/**
 * Verify a self-contained proof.
 *
 * The strategy defaults to the built-in one named by `proof.algorithm`; a
 * proof naming any other algorithm is rejected unless a strategy of that
 * name is supplied. Besides the root, the sibling positions must agree with
 * `proof.leafIndex`.
 *
 * The proof does not carry the leaf count, so the padding slot of an odd
 * level is indistinguishable from a real leaf: in a 3-item tree a proof for
 * the last item also verifies with `leafIndex` 3. Callers that know the
 * count should check `leafIndex < leafCount` themselves.
 *
 * @throws {ArborError} `HASH_FAILURE` when the strategy fails.
 */
export function verifyProof(proof: MerkleProof, strategy?: HashStrategy): boolean {
  if (typeof proof !== 'object' || proof === null || typeof proof.algorithm !== 'string') {
    return false;
  }
  let resolved: HashStrategy;
  if (strategy !== undefined) {
    resolved = strategy;
  } else if (isHashAlgorithm(proof.algorithm)) {
    resolved = getHashStrategy(proof.algorithm);
  } else {
    return false;
  }
  if (resolved.name !== proof.algorithm) {
    return false;
  }
  if (!isMerklePath(proof.path) || !pathMatchesIndex(proof.path, proof.leafIndex)) {
    return false;
  }
  return verifyMerklePath(proof.leafDigest, proof.path, proof.root, resolved);
}
