/**
 * Ready-made {@link Content} implementations for common payloads.
 *
 * Each hashes its own bytes with a chosen strategy (SHA-256 unless told
 * otherwise) and compares by value.
 *
 * @packageDocumentation
 */

import {
  canonicalizeJson,
  constantTimeEqual,
  resolveHashStrategy,
  utf8ToBytes,
} from '@arbor/crypto';
import type { Digest, HashAlgorithm, HashStrategy } from '@arbor/crypto';
import { ArborError, ArborErrorCode, isPlainObject } from '@arbor/types';

import type { Content } from './types';

/**
 * Runtime check for the content capability, for values arriving from
 * untyped callers.
 */
export function isContent(value: unknown): value is Content {
  return (
    typeof value === 'object' &&
    value !== null &&
    'calculateHash' in value &&
    typeof value.calculateHash === 'function' &&
    'equals' in value &&
    typeof value.equals === 'function'
  );
}

/**
 * A UTF-8 string.
 *
 * @example
 * ```typescript
 * const tree = MerkleTree.build(['a', 'b'].map((s) => new StringContent(s)));
 * ```
 */
export class StringContent implements Content<StringContent> {
  readonly value: string;
  private readonly strategy: HashStrategy;

  constructor(value: string, hashStrategy?: HashStrategy | HashAlgorithm) {
    this.value = value;
    this.strategy = resolveHashStrategy(hashStrategy);
  }

  calculateHash(): Digest {
    return this.strategy.digest(utf8ToBytes(this.value));
  }

  equals(other: StringContent): boolean {
    return other instanceof StringContent && other.value === this.value;
  }

  toString(): string {
    return this.value;
  }
}

/** An opaque byte string. The input is copied. */
export class BytesContent implements Content<BytesContent> {
  readonly bytes: Uint8Array;
  private readonly strategy: HashStrategy;

  constructor(bytes: Uint8Array, hashStrategy?: HashStrategy | HashAlgorithm) {
    this.bytes = Uint8Array.from(bytes);
    this.strategy = resolveHashStrategy(hashStrategy);
  }

  calculateHash(): Digest {
    return this.strategy.digest(this.bytes);
  }

  equals(other: BytesContent): boolean {
    return other instanceof BytesContent && constantTimeEqual(other.bytes, this.bytes);
  }
}

/** Reason `value` has no canonical JSON form, or `undefined` when it has one. */
function jsonProblem(value: unknown, ancestors: Set<object>): string | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return undefined;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? undefined : `${value} has no JSON form`;
  }
  if (typeof value !== 'object') {
    return `${typeof value} has no JSON form`;
  }
  if (ancestors.has(value)) {
    return 'circular reference';
  }
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      for (let i = 0; i < value.length; i++) {
        const item: unknown = value[i];
        const problem = item === undefined ? 'undefined has no JSON form' : jsonProblem(item, ancestors);
        if (problem !== undefined) {
          return `[${i}]: ${problem}`;
        }
      }
      return undefined;
    }
    if (!isPlainObject(value)) {
      return 'only plain objects and arrays are supported';
    }
    for (const key of Object.keys(value)) {
      const member = value[key];
      // undefined members are dropped from the canonical form
      const problem = member === undefined ? undefined : jsonProblem(member, ancestors);
      if (problem !== undefined) {
        return `.${key}: ${problem}`;
      }
    }
    return undefined;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * A JSON value, hashed and compared in canonical form so key order does
 * not matter. The value is read on every call, so mutating it in place
 * changes the digest.
 *
 * Only values that survive a JSON round trip unchanged are accepted:
 * `null`, booleans, strings, finite numbers, arrays and plain objects of
 * those. The check runs once, in the constructor.
 *
 * @throws {ArborError} `INVALID_CONTENT` from the constructor for anything
 *   else (`undefined`, `NaN`, class instances, cycles...).
 */
export class JsonContent implements Content<JsonContent> {
  readonly value: unknown;
  private readonly strategy: HashStrategy;

  constructor(value: unknown, hashStrategy?: HashStrategy | HashAlgorithm) {
    const problem = jsonProblem(value, new Set());
    if (problem !== undefined) {
      throw new ArborError(
        ArborErrorCode.INVALID_CONTENT,
        `JsonContent value is not plain JSON: ${problem}`,
        { hint: 'Convert dates, class instances and non-finite numbers to strings or plain objects first.' }
      );
    }
    this.value = value;
    this.strategy = resolveHashStrategy(hashStrategy);
  }

  /** Canonical JSON text that is hashed. */
  canonical(): string {
    return canonicalizeJson(this.value);
  }

  calculateHash(): Digest {
    return this.strategy.digest(utf8ToBytes(this.canonical()));
  }

  equals(other: JsonContent): boolean {
    return other instanceof JsonContent && other.canonical() === this.canonical();
  }
}
