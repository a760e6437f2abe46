/**
 * @arbor/crypto - digest primitives, byte codecs and hash strategies.
 *
 * @packageDocumentation
 */

import { concatBytes as nobleConcatBytes, utf8ToBytes as nobleUtf8ToBytes } from '@noble/hashes/utils';
import { ArborError, ArborErrorCode, isPlainObject, isValidHex } from '@arbor/types';

export type { Digest, HashHex, HashAlgorithm, HashStrategy } from './types';
export { sha256, keccak256 } from './hash';

import type { HashHex } from './types';

/** Encode a string as UTF-8 bytes. */
export function utf8ToBytes(data: string): Uint8Array {
  return nobleUtf8ToBytes(data);
}

/** Concatenate byte arrays in order into a new array. */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  return nobleConcatBytes(...parts);
}

/**
 * Deterministic JSON serialization with recursively sorted object keys.
 *
 * Two structurally equal values always serialize identically regardless of
 * key insertion order. `undefined` object members are dropped.
 *
 * @example
 * ```typescript
 * canonicalizeJson({ z: 1, a: 2 }); // '{"a":2,"z":1}'
 * ```
 */
export function canonicalizeJson(obj: unknown): string {
  return JSON.stringify(sortKeys(obj));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isPlainObject(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const v = value[key];
      if (v !== undefined) {
        sorted[key] = sortKeys(v);
      }
    }
    return sorted;
  }
  return value;
}

/**
 * Encode a byte array to a lowercase hex string.
 *
 * @example
 * ```typescript
 * toHex(new Uint8Array([255, 0])); // 'ff00'
 * ```
 */
export function toHex(data: Uint8Array): HashHex {
  if (!(data instanceof Uint8Array)) {
    throw new ArborError(
      ArborErrorCode.INVALID_HEX,
      `toHex() expects a Uint8Array, got ${typeof data}`,
      { hint: 'Pass a Uint8Array to toHex().' }
    );
  }
  let hex = '';
  for (let i = 0; i < data.length; i++) {
    hex += data[i].toString(16).padStart(2, '0');
  }
  return hex;
}

/**
 * Decode a hex string (optionally `0x`-prefixed) to a byte array.
 *
 * @throws {ArborError} `INVALID_HEX` on odd length or non-hex characters.
 *
 * @example
 * ```typescript
 * fromHex('ff00'); // Uint8Array [255, 0]
 * ```
 */
export function fromHex(hex: string): Uint8Array {
  if (typeof hex !== 'string') {
    throw new ArborError(
      ArborErrorCode.INVALID_HEX,
      `fromHex() expects a string, got ${typeof hex}`,
      { hint: 'Pass a hexadecimal string (e.g. "a1b2c3") to fromHex().' }
    );
  }
  const clean = hex.startsWith('0x') || hex.startsWith('0X') ? hex.slice(2) : hex;
  if (!isValidHex(clean)) {
    throw new ArborError(
      ArborErrorCode.INVALID_HEX,
      clean.length % 2 !== 0
        ? `Invalid hex string: odd length (${clean.length})`
        : 'Invalid hex string: contains non-hexadecimal characters',
      { hint: 'Hex strings must have even length and only contain 0-9 and a-f.' }
    );
  }
  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < clean.length; i += 2) {
    bytes[i / 2] = parseInt(clean.substring(i, i + 2), 16);
  }
  return bytes;
}

/**
 * Constant-time comparison of two byte arrays.
 *
 * Examines every byte even after a mismatch; only the length check returns
 * early.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

// ─── Hash strategies ──────────────────────────────────────────────────────────

export {
  SHA256_STRATEGY,
  KECCAK256_STRATEGY,
  DEFAULT_HASH_ALGORITHM,
  getHashStrategy,
  resolveHashStrategy,
  listHashAlgorithms,
  isHashAlgorithm,
  isHashStrategy,
} from './strategy';
