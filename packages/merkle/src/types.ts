import type { Digest, HashAlgorithm, HashStrategy } from '@arbor/crypto';
import type { Logger } from '@arbor/types';

/**
 * The capability a value needs to be stored in a Merkle tree.
 *
 * `calculateHash()` digests the value's own bytes; `equals()` decides
 * whether two values are the same entry, independently of their digests.
 */
export interface Content<C = unknown> {
  calculateHash(): Uint8Array;
  equals(other: C): boolean;
}

interface NodeBase {
  /** 0 for leaves, increasing towards the root. */
  readonly level: number;
  /** Position within the level. */
  readonly index: number;
  readonly digest: Digest;
  /**
   * Set on the synthetic node appended to pad an odd level, and on internal
   * nodes whose children are both duplicates. Duplicates are hashed normally.
   */
  readonly isDuplicate: boolean;
}

/** A node on level 0, one per content item plus at most one padding duplicate. */
export interface LeafNode<C> extends NodeBase {
  readonly kind: 'leaf';
  /** `undefined` on a padding duplicate. */
  readonly content: C | undefined;
}

/**
 * A node above level 0. `left` and `right` index into the level below;
 * the parent sits at `index >> 1` on the level above.
 */
export interface InternalNode extends NodeBase {
  readonly kind: 'internal';
  readonly left: number;
  readonly right: number;
}

export type MerkleNode<C> = LeafNode<C> | InternalNode;

/** Side of the running digest on which a proof sibling is concatenated. */
export type SiblingPosition = 'left' | 'right';

/**
 * One step of an audit path: `left` means the next digest is
 * `H(digest ++ current)`, `right` means `H(current ++ digest)`.
 */
export interface ProofStep {
  readonly digest: Digest;
  readonly position: SiblingPosition;
}

/** Sibling steps from a leaf up to, but excluding, the root. */
export type MerklePath = readonly ProofStep[];

/** A self-contained inclusion proof. */
export interface MerkleProof {
  /** Name of the hash strategy the tree was built with. */
  readonly algorithm: string;
  readonly leafIndex: number;
  readonly leafDigest: Digest;
  readonly path: MerklePath;
  readonly root: Digest;
}

/** Location of a node in the tree. */
export interface NodePosition {
  readonly level: number;
  readonly index: number;
}

/** Outcome of a full consistency check. */
export interface TreeInspection {
  readonly valid: boolean;
  /** First node, scanning leaves-up, whose stored digest disagrees with its children. */
  readonly brokenAt?: NodePosition;
}

/** Construction options for {@link MerkleTree}. */
export interface MerkleTreeOptions {
  /** Digest primitive for internal nodes. Defaults to `'sha256'`. */
  hashStrategy?: HashStrategy | HashAlgorithm;
  /** Receives build, rebuild and verification events under component `merkle`. */
  logger?: Logger;
}

/** Options for {@link MerkleTree.toDisplayString}. */
export interface DisplayOptions {
  /** Leave padding duplicates out of the dump. */
  hideDuplicates?: boolean;
}
