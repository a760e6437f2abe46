/**
 * Hex/JSON wire form of inclusion proofs.
 *
 * Digests travel as lowercase hex so a proof can be stored or sent as plain
 * JSON and checked later with {@link verifyProof}.
 *
 * @packageDocumentation
 */

import { fromHex, toHex } from '@arbor/crypto';
import type { HashHex } from '@arbor/crypto';
import { ArborError, ArborErrorCode, describeError, isPlainObject } from '@arbor/types';

import type { MerkleProof, ProofStep, SiblingPosition } from './types';

/** JSON-safe form of one {@link ProofStep}. */
export interface SerializedProofStep {
  digest: HashHex;
  position: SiblingPosition;
}

/** JSON-safe form of a {@link MerkleProof}. */
export interface SerializedProof {
  algorithm: string;
  leafIndex: number;
  leafDigest: HashHex;
  path: SerializedProofStep[];
  root: HashHex;
}

export function serializeProof(proof: MerkleProof): SerializedProof {
  return {
    algorithm: proof.algorithm,
    leafIndex: proof.leafIndex,
    leafDigest: toHex(proof.leafDigest),
    path: proof.path.map((step) => ({ digest: toHex(step.digest), position: step.position })),
    root: toHex(proof.root),
  };
}

function invalid(message: string): ArborError {
  return new ArborError(ArborErrorCode.INVALID_PROOF, message, {
    hint: 'Expected the output of serializeProof() or encodeProof().',
  });
}

function readHex(value: unknown, field: string): Uint8Array {
  if (typeof value !== 'string') {
    throw invalid(`Proof field "${field}" must be a hex string`);
  }
  return fromHex(value);
}

function readStep(value: unknown, index: number): ProofStep {
  if (!isPlainObject(value)) {
    throw invalid(`Proof step ${index} must be an object`);
  }
  const position = value.position;
  if (position !== 'left' && position !== 'right') {
    throw invalid(`Proof step ${index} has position ${JSON.stringify(position)}; expected "left" or "right"`);
  }
  return { digest: readHex(value.digest, `path[${index}].digest`), position };
}

/**
 * Rebuild a proof from its serialized form.
 *
 * Only the shape is checked; whether the proof holds is for
 * {@link verifyProof}.
 *
 * @throws {ArborError} `INVALID_PROOF` on a missing or mistyped field,
 *   `INVALID_HEX` on a malformed digest.
 */
export function deserializeProof(value: unknown): MerkleProof {
  if (!isPlainObject(value)) {
    throw invalid('Proof must be an object');
  }
  const { algorithm, leafIndex, path } = value;
  if (typeof algorithm !== 'string' || algorithm.length === 0) {
    throw invalid('Proof field "algorithm" must be a non-empty string');
  }
  if (typeof leafIndex !== 'number' || !Number.isInteger(leafIndex) || leafIndex < 0) {
    throw invalid('Proof field "leafIndex" must be a non-negative integer');
  }
  if (!Array.isArray(path)) {
    throw invalid('Proof field "path" must be an array');
  }
  return {
    algorithm,
    leafIndex,
    leafDigest: readHex(value.leafDigest, 'leafDigest'),
    path: path.map((step: unknown, index) => readStep(step, index)),
    root: readHex(value.root, 'root'),
  };
}

/** `serializeProof` as JSON text. */
export function encodeProof(proof: MerkleProof): string {
  return JSON.stringify(serializeProof(proof));
}

/**
 * Parse JSON text produced by {@link encodeProof}.
 *
 * @throws {ArborError} `INVALID_PROOF` when the text is not JSON or not a
 *   proof, `INVALID_HEX` on a malformed digest.
 */
export function decodeProof(text: string): MerkleProof {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ArborError(ArborErrorCode.INVALID_PROOF, `Proof is not valid JSON: ${describeError(err)}`, { cause: err });
  }
  return deserializeProof(parsed);
}
