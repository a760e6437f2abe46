/**
 * Bottom-up construction of the node levels.
 *
 * Every level with more than one node is padded to an even count by
 * appending one duplicate of its last node, so pairing `(2i, 2i + 1)` is
 * always exact. A single leaf is its own root and is never padded.
 *
 * @packageDocumentation
 */

import type { HashStrategy } from '@arbor/crypto';
import { ArborError, ArborErrorCode } from '@arbor/types';

import { digestContent, hashPair } from './hashing';
import type { Content, InternalNode, LeafNode, MerkleNode } from './types';

/** Node storage of a built tree. */
export interface TreeLevels<C> {
  /** Level 0, padding duplicate included. */
  readonly leaves: LeafNode<C>[];
  /** Levels 1..n; the last one holds only the root. Empty for a single leaf. */
  readonly internal: InternalNode[][];
}

function duplicateLeaf<C>(last: LeafNode<C>): LeafNode<C> {
  return {
    kind: 'leaf',
    level: 0,
    index: last.index + 1,
    digest: last.digest.slice(),
    content: undefined,
    isDuplicate: true,
  };
}

function duplicateInternal(last: InternalNode): InternalNode {
  return {
    ...last,
    index: last.index + 1,
    digest: last.digest.slice(),
    isDuplicate: true,
  };
}

/**
 * Digest every content item into a leaf, in input order.
 *
 * @throws {ArborError} `EMPTY_INPUT` for an empty list, `HASH_FAILURE` when
 *   any item fails to digest. Nothing is retained on failure.
 */
export function buildLeaves<C extends Content<C>>(contents: readonly C[]): LeafNode<C>[] {
  if (contents.length === 0) {
    throw new ArborError(
      ArborErrorCode.EMPTY_INPUT,
      'Cannot build a Merkle tree from an empty content list',
      { hint: 'Pass at least one content item.' }
    );
  }

  const leaves = contents.map((content, index): LeafNode<C> => ({
    kind: 'leaf',
    level: 0,
    index,
    digest: digestContent(content, index),
    content,
    isDuplicate: false,
  }));

  if (leaves.length > 1 && leaves.length % 2 === 1) {
    leaves.push(duplicateLeaf(leaves[leaves.length - 1]));
  }
  return leaves;
}

function pairLevel<C>(below: readonly MerkleNode<C>[], level: number, strategy: HashStrategy): InternalNode[] {
  const nodes: InternalNode[] = [];
  for (let i = 0; i < below.length; i += 2) {
    const left = below[i];
    const right = below[i + 1];
    nodes.push({
      kind: 'internal',
      level,
      index: i / 2,
      digest: hashPair(strategy, left.digest, right.digest),
      left: i,
      right: i + 1,
      isDuplicate: left.isDuplicate && right.isDuplicate,
    });
  }
  if (nodes.length > 1 && nodes.length % 2 === 1) {
    nodes.push(duplicateInternal(nodes[nodes.length - 1]));
  }
  return nodes;
}

/**
 * Hash leaves pairwise, level by level, until one node remains.
 */
export function buildInternalLevels<C>(leaves: readonly LeafNode<C>[], strategy: HashStrategy): InternalNode[][] {
  const internal: InternalNode[][] = [];
  let below: readonly MerkleNode<C>[] = leaves;
  while (below.length > 1) {
    const next = pairLevel(below, internal.length + 1, strategy);
    internal.push(next);
    below = next;
  }
  return internal;
}

/**
 * Build all node levels for `contents`. Either the whole tree is returned
 * or an {@link ArborError} is thrown.
 */
export function buildLevels<C extends Content<C>>(contents: readonly C[], strategy: HashStrategy): TreeLevels<C> {
  const leaves = buildLeaves(contents);
  return { leaves, internal: buildInternalLevels(leaves, strategy) };
}
