/**
 * @arbor/merkle - binary Merkle trees with inclusion proofs.
 *
 * @packageDocumentation
 */

export { MerkleTree } from './tree';

export { StringContent, BytesContent, JsonContent, isContent } from './content';

export {
  extractPath,
  computeRootFromPath,
  verifyMerklePath,
  verifyProof,
  pathMatchesIndex,
  isMerklePath,
} from './proof';

export { serializeProof, deserializeProof, encodeProof, decodeProof } from './codec';
export type { SerializedProof, SerializedProofStep } from './codec';

export { buildLeaves, buildInternalLevels, buildLevels } from './builder';
export type { TreeLevels } from './builder';

export type {
  Content,
  LeafNode,
  InternalNode,
  MerkleNode,
  SiblingPosition,
  ProofStep,
  MerklePath,
  MerkleProof,
  NodePosition,
  TreeInspection,
  MerkleTreeOptions,
  DisplayOptions,
} from './types';
