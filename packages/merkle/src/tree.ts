/**
 * Binary Merkle tree over an ordered list of content items.
 *
 * @packageDocumentation
 */

import { constantTimeEqual, resolveHashStrategy, toHex } from '@arbor/crypto';
import type { Digest, HashHex, HashStrategy } from '@arbor/crypto';
import {
  ArborError,
  ArborErrorCode,
  createDebugLogger,
  createSilentLogger,
  describeError,
  isArborError,
} from '@arbor/types';
import type { Logger } from '@arbor/types';

import { buildLevels } from './builder';
import type { TreeLevels } from './builder';
import { isContent } from './content';
import { renderLevels } from './display';
import { digestContent, hashPair } from './hashing';
import { computeRootFromPath, extractPath } from './proof';
import type {
  Content,
  DisplayOptions,
  InternalNode,
  LeafNode,
  MerkleNode,
  MerklePath,
  MerkleProof,
  MerkleTreeOptions,
  NodePosition,
  TreeInspection,
} from './types';

const dbg = createDebugLogger('arbor:merkle');

/**
 * A binary hash tree committing to an ordered list of content items.
 *
 * Leaves keep input order. Levels with an odd node count are padded with a
 * duplicate of their last node; a one-item tree's root is that item's
 * digest. Parent digests are `H(left ++ right)` with the strategy chosen at
 * construction.
 *
 * All methods are synchronous. Any number of readers may share a tree, but
 * `rebuildTree()` and `rebuildTreeWith()` replace the node storage and must
 * not run while another caller reads the same instance; serializing them is
 * the caller's responsibility.
 *
 * Usage:
 * ```ts
 * const items = ['Hello', 'Hi', 'Hey', 'Hola'].map((s) => new StringContent(s));
 * const tree = MerkleTree.build(items);
 *
 * tree.verifyTree();                 // true
 * tree.verifyContent(items[2]);      // true
 * const path = tree.getMerklePath(items[2]);
 * verifyMerklePath(items[2].calculateHash(), path, tree.merkleRoot(), tree.hashStrategy); // true
 * ```
 */
export class MerkleTree<C extends Content<C>> {
  /** Strategy used for every internal node. */
  readonly hashStrategy: HashStrategy;
  private readonly log: Logger;
  private contents: readonly C[];
  private leaves: LeafNode<C>[];
  private internal: InternalNode[][];

  /**
   * Build a tree over `contents`.
   *
   * @throws {ArborError} `EMPTY_INPUT` for an empty list, `HASH_FAILURE` when
   *   any digest cannot be computed, `UNKNOWN_HASH_ALGORITHM` for an
   *   unrecognized strategy name.
   */
  constructor(contents: readonly C[], options?: MerkleTreeOptions) {
    this.hashStrategy = resolveHashStrategy(options?.hashStrategy);
    this.log = (options?.logger ?? createSilentLogger()).child('merkle', {
      algorithm: this.hashStrategy.name,
    });

    const snapshot = [...contents];
    const built = this.build(snapshot, 'build');
    this.contents = snapshot;
    this.leaves = built.leaves;
    this.internal = built.internal;
  }

  /** Same as `new MerkleTree(contents, options)`. */
  static build<C extends Content<C>>(contents: readonly C[], options?: MerkleTreeOptions): MerkleTree<C> {
    return new MerkleTree(contents, options);
  }

  // ── Accessors ───────────────────────────────────────────────────────────────

  /** Name of the hash strategy. */
  get algorithm(): string {
    return this.hashStrategy.name;
  }

  /** Number of content items, padding excluded. */
  get leafCount(): number {
    return this.contents.length;
  }

  /** Number of hashing levels above the leaves; 0 for a single item. */
  get depth(): number {
    return this.internal.length;
  }

  /** A copy of the root digest. No recomputation. */
  merkleRoot(): Digest {
    return this.root().digest.slice();
  }

  merkleRootHex(): HashHex {
    return toHex(this.root().digest);
  }

  /** The content items in leaf order. */
  getContents(): readonly C[] {
    return this.contents;
  }

  /** Level 0, padding duplicate included. The nodes are the tree's own storage. */
  getLeaves(): readonly LeafNode<C>[] {
    return this.leaves;
  }

  /** All levels from the leaves to the root. The nodes are the tree's own storage. */
  getLevels(): readonly (readonly MerkleNode<C>[])[] {
    return [this.leaves, ...this.internal];
  }

  // ── Verification ────────────────────────────────────────────────────────────

  /**
   * Recompute every internal digest from the stored leaf digests and check
   * that each one, the root included, matches what is stored. Leaves are
   * not re-hashed from their content.
   *
   * @returns `false` when the stored structure is inconsistent.
   * @throws {ArborError} `HASH_FAILURE` when hashing fails.
   */
  verifyTree(): boolean {
    return this.inspect().valid;
  }

  /**
   * Like {@link verifyTree}, also reporting the first inconsistent node.
   */
  inspect(): TreeInspection {
    let below: Digest[] = this.leaves.map((leaf) => leaf.digest);
    let brokenAt: NodePosition | undefined;

    for (const nodes of this.internal) {
      const recomputed: Digest[] = [];
      for (const node of nodes) {
        const digest = hashPair(this.hashStrategy, below[node.left], below[node.right]);
        if (brokenAt === undefined && !constantTimeEqual(digest, node.digest)) {
          brokenAt = { level: node.level, index: node.index };
        }
        recomputed.push(digest);
      }
      below = recomputed;
    }

    if (brokenAt !== undefined) {
      this.log.warn('tree verification failed', { brokenAt });
      return { valid: false, brokenAt };
    }
    return { valid: true };
  }

  /**
   * Check that `content` is in the tree and still hashes to what was stored.
   *
   * The first leaf whose content `equals` the argument is re-hashed from
   * its content; the fresh digest must match the stored leaf digest and,
   * folded with the stored siblings, reproduce the stored root.
   *
   * @returns `false` when not found, or when either comparison fails.
   * @throws {ArborError} `HASH_FAILURE` when hashing fails, `TYPE_MISMATCH`
   *   when `content` cannot be compared with the stored items.
   */
  verifyContent(content: C): boolean {
    const index = this.indexOf(content);
    if (index < 0) {
      this.log.debug('content not found');
      return false;
    }

    const leaf = this.leaves[index];
    const fresh = digestContent(leaf.content ?? content, index);
    if (!constantTimeEqual(fresh, leaf.digest)) {
      this.log.warn('content digest mismatch', { index });
      return false;
    }

    const root = computeRootFromPath(fresh, extractPath(this.getLevels(), index), this.hashStrategy);
    if (!constantTimeEqual(root, this.root().digest)) {
      this.log.warn('content root mismatch', { index });
      return false;
    }
    return true;
  }

  // ── Proofs ──────────────────────────────────────────────────────────────────

  /**
   * Index of the first leaf whose content equals `content`, or -1.
   *
   * @throws {ArborError} `TYPE_MISMATCH` when `content` is not a content
   *   value or a stored item's `equals()` rejects it.
   */
  indexOf(content: C): number {
    const candidate: unknown = content;
    if (!isContent(candidate)) {
      throw new ArborError(
        ArborErrorCode.TYPE_MISMATCH,
        `Expected a content value with calculateHash() and equals(), got ${candidate === null ? 'null' : typeof candidate}`,
      );
    }
    for (let index = 0; index < this.contents.length; index++) {
      let equal: boolean;
      try {
        equal = this.contents[index].equals(content);
      } catch (err) {
        throw new ArborError(
          ArborErrorCode.TYPE_MISMATCH,
          `Content at index ${index} cannot be compared with the given value: ${describeError(err)}`,
          { cause: err, context: { index } }
        );
      }
      if (equal) {
        return index;
      }
    }
    return -1;
  }

  /**
   * Sibling digests and positions from the leaf holding `content` up to,
   * but excluding, the root. When several leaves are equal, the first one
   * is used.
   *
   * @throws {ArborError} `CONTENT_NOT_FOUND` when no leaf matches.
   */
  getMerklePath(content: C): MerklePath {
    return extractPath(this.getLevels(), this.requireIndex(content));
  }

  /** Self-contained inclusion proof for `content`. */
  getProof(content: C): MerkleProof {
    return this.getProofByIndex(this.requireIndex(content));
  }

  /**
   * Self-contained inclusion proof for the leaf at `leafIndex`.
   *
   * @throws {ArborError} `INDEX_OUT_OF_RANGE` unless
   *   `0 <= leafIndex < leafCount`.
   */
  getProofByIndex(leafIndex: number): MerkleProof {
    if (!Number.isInteger(leafIndex) || leafIndex < 0 || leafIndex >= this.leafCount) {
      throw new ArborError(
        ArborErrorCode.INDEX_OUT_OF_RANGE,
        `Leaf index ${leafIndex} is outside the tree (0..${this.leafCount - 1})`,
        { context: { leafIndex, leafCount: this.leafCount } }
      );
    }
    return {
      algorithm: this.hashStrategy.name,
      leafIndex,
      leafDigest: this.leaves[leafIndex].digest.slice(),
      path: extractPath(this.getLevels(), leafIndex),
      root: this.merkleRoot(),
    };
  }

  // ── Rebuild ─────────────────────────────────────────────────────────────────

  /**
   * Re-hash the current content items and replace every node. Heals a tree
   * whose stored digests were corrupted, and picks up content mutated in
   * place.
   *
   * The rebuild is atomic: on failure the previous nodes stay in place and
   * the error is rethrown.
   */
  rebuildTree(): void {
    const built = this.build(this.contents, 'rebuild');
    this.leaves = built.leaves;
    this.internal = built.internal;
  }

  /**
   * Replace the dataset with `contents` and rebuild. Atomic like
   * {@link rebuildTree}.
   */
  rebuildTreeWith(contents: readonly C[]): void {
    const snapshot = [...contents];
    const built = this.build(snapshot, 'rebuild');
    this.contents = snapshot;
    this.leaves = built.leaves;
    this.internal = built.internal;
  }

  // ── Display ─────────────────────────────────────────────────────────────────

  /** Every level's digests in hex, for diagnostics. */
  toDisplayString(options?: DisplayOptions): string {
    const header = `MerkleTree(${this.hashStrategy.name}, leaves=${this.leafCount}, depth=${this.depth})`;
    return renderLevels(header, this.getLevels(), options);
  }

  toString(): string {
    return this.toDisplayString();
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private root(): MerkleNode<C> {
    const top = this.internal[this.internal.length - 1];
    return top === undefined ? this.leaves[0] : top[0];
  }

  private requireIndex(content: C): number {
    const index = this.indexOf(content);
    if (index < 0) {
      throw new ArborError(
        ArborErrorCode.CONTENT_NOT_FOUND,
        'Content is not present in the tree',
        { hint: 'Membership is decided by equals(); check that the value matches a stored item.' }
      );
    }
    return index;
  }

  private build(contents: readonly C[], operation: 'build' | 'rebuild'): TreeLevels<C> {
    const stop = dbg.time(operation);
    let built: TreeLevels<C>;
    try {
      built = buildLevels(contents, this.hashStrategy);
    } catch (err) {
      this.log.error(`tree ${operation} failed`, {
        code: isArborError(err) ? err.code : undefined,
        error: describeError(err),
      });
      throw err;
    } finally {
      stop();
    }

    const top = built.internal[built.internal.length - 1];
    const root = top === undefined ? built.leaves[0] : top[0];
    this.log.debug(`tree ${operation === 'build' ? 'built' : 'rebuilt'}`, {
      leaves: contents.length,
      depth: built.internal.length,
      root: toHex(root.digest),
    });
    return built;
  }
}
