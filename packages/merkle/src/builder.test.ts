import { describe, it, expect } from 'vitest';
import { SHA256_STRATEGY, concatBytes, sha256, toHex, utf8ToBytes } from '@arbor/crypto';
import type { HashStrategy } from '@arbor/crypto';
import { ArborError, ArborErrorCode } from '@arbor/types';

import { buildLeaves, buildInternalLevels, buildLevels } from './builder';
import { StringContent } from './content';
import type { Content } from './types';

// ─── Helpers ────────────────────────────────────────────────────────────────────

function strings(...values: string[]): StringContent[] {
  return values.map((v) => new StringContent(v));
}

function h(value: string): string {
  return toHex(sha256(utf8ToBytes(value)));
}

function pair(leftHex: string, rightHex: string): string {
  return toHex(sha256(concatBytes(Buffer.from(leftHex, 'hex'), Buffer.from(rightHex, 'hex'))));
}

class ExplodingContent implements Content<ExplodingContent> {
  calculateHash(): Uint8Array {
    throw new Error('disk unavailable');
  }
  equals(other: ExplodingContent): boolean {
    return other === this;
  }
}

// ─── buildLeaves ────────────────────────────────────────────────────────────────

describe('buildLeaves', () => {
  it('creates one leaf per item, in input order', () => {
    const items = strings('a', 'b');
    const leaves = buildLeaves(items);
    expect(leaves).toHaveLength(2);
    expect(leaves.map((l) => toHex(l.digest))).toEqual([h('a'), h('b')]);
    expect(leaves.map((l) => l.index)).toEqual([0, 1]);
    expect(leaves[0].content).toBe(items[0]);
    expect(leaves.every((l) => l.kind === 'leaf' && l.level === 0 && !l.isDuplicate)).toBe(true);
  });

  it('pads an odd count with one duplicate of the last leaf', () => {
    const leaves = buildLeaves(strings('a', 'b', 'c'));
    expect(leaves).toHaveLength(4);
    const dup = leaves[3];
    expect(dup.isDuplicate).toBe(true);
    expect(dup.content).toBeUndefined();
    expect(dup.index).toBe(3);
    expect(toHex(dup.digest)).toBe(h('c'));
  });

  it('stores the duplicate digest as a separate copy', () => {
    const leaves = buildLeaves(strings('a', 'b', 'c'));
    expect(leaves[3].digest).not.toBe(leaves[2].digest);
  });

  it('does not pad a single leaf', () => {
    const leaves = buildLeaves(strings('only'));
    expect(leaves).toHaveLength(1);
    expect(leaves[0].isDuplicate).toBe(false);
  });

  it('rejects an empty list with EMPTY_INPUT', () => {
    try {
      buildLeaves([]);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ArborError);
      expect((e as ArborError).code).toBe(ArborErrorCode.EMPTY_INPUT);
    }
  });

  it('surfaces a failing digest as HASH_FAILURE with the cause attached', () => {
    try {
      buildLeaves<Content<unknown>>([new StringContent('a'), new ExplodingContent()]);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ArborError);
      const err = e as ArborError;
      expect(err.code).toBe(ArborErrorCode.HASH_FAILURE);
      expect(err.message).toBe('Content at index 1 failed to compute its digest: disk unavailable');
      expect(err.context).toEqual({ index: 1 });
      expect(err.cause).toBeInstanceOf(Error);
    }
  });

  it('rejects a digest that is not a Uint8Array', () => {
    const liar: Content<unknown> = {
      calculateHash: () => JSON.parse('"not-bytes"'),
      equals: () => false,
    };
    expect(() => buildLeaves([liar])).toThrow(
      'Content at index 0 returned a string instead of a Uint8Array digest',
    );
  });

  it('copies the digest returned by the content', () => {
    const cached = sha256(utf8ToBytes('a'));
    const item: Content<unknown> = { calculateHash: () => cached, equals: () => false };
    const [leaf] = buildLeaves([item]);
    expect(leaf.digest).not.toBe(cached);
    leaf.digest[0] ^= 0xff;
    expect(toHex(cached)).toBe(h('a'));
  });
});

// ─── buildInternalLevels ────────────────────────────────────────────────────────

describe('buildInternalLevels', () => {
  it('hashes two leaves into a root as H(left ++ right)', () => {
    const internal = buildInternalLevels(buildLeaves(strings('a', 'b')), SHA256_STRATEGY);
    expect(internal).toHaveLength(1);
    expect(internal[0]).toHaveLength(1);
    const root = internal[0][0];
    expect(toHex(root.digest)).toBe(pair(h('a'), h('b')));
    expect(root.left).toBe(0);
    expect(root.right).toBe(1);
    expect(root.level).toBe(1);
    expect(root.kind).toBe('internal');
  });

  it('returns no levels for a single leaf', () => {
    expect(buildInternalLevels(buildLeaves(strings('a')), SHA256_STRATEGY)).toEqual([]);
  });

  it('never reorders children by value', () => {
    const ab = buildInternalLevels(buildLeaves(strings('a', 'b')), SHA256_STRATEGY);
    const ba = buildInternalLevels(buildLeaves(strings('b', 'a')), SHA256_STRATEGY);
    expect(toHex(ab[0][0].digest)).not.toBe(toHex(ba[0][0].digest));
  });

  it('pads odd internal levels with a duplicate node', () => {
    // 5 leaves -> 6 with padding -> 3 parents -> padded to 4
    const internal = buildInternalLevels(buildLeaves(strings('a', 'b', 'c', 'd', 'e')), SHA256_STRATEGY);
    expect(internal.map((level) => level.length)).toEqual([4, 2, 1]);

    const [ab, cd, ee, eeDup] = internal[0];
    expect(toHex(ab.digest)).toBe(pair(h('a'), h('b')));
    expect(toHex(cd.digest)).toBe(pair(h('c'), h('d')));
    expect(toHex(ee.digest)).toBe(pair(h('e'), h('e')));
    expect(ee.isDuplicate).toBe(false);
    expect(eeDup.isDuplicate).toBe(true);
    expect(eeDup.index).toBe(3);
    expect(toHex(eeDup.digest)).toBe(toHex(ee.digest));
  });

  it('marks only the padding clones as duplicates', () => {
    // 9 leaves -> 10 -> 5 parents, padded to 6 -> 3, padded to 4 -> 2 -> 1
    const internal = buildInternalLevels(
      buildLeaves(strings('1', '2', '3', '4', '5', '6', '7', '8', '9')),
      SHA256_STRATEGY,
    );
    expect(internal.map((level) => level.length)).toEqual([6, 4, 2, 1]);
    expect(internal[0].map((n) => n.isDuplicate)).toEqual([false, false, false, false, false, true]);
    expect(internal[1].map((n) => n.isDuplicate)).toEqual([false, false, false, true]);
    expect(internal[2].map((n) => n.isDuplicate)).toEqual([false, false]);
    expect(internal[3][0].isDuplicate).toBe(false);
  });

  it('satisfies the pairing law on every node', () => {
    const leaves = buildLeaves(strings('a', 'b', 'c', 'd', 'e', 'f', 'g'));
    const internal = buildInternalLevels(leaves, SHA256_STRATEGY);
    const levels = [leaves, ...internal];
    for (let level = 1; level < levels.length; level++) {
      for (const node of internal[level - 1]) {
        const below = levels[level - 1];
        const expected = sha256(concatBytes(below[node.left].digest, below[node.right].digest));
        expect(toHex(node.digest)).toBe(toHex(expected));
      }
    }
  });

  it('wraps a throwing strategy in HASH_FAILURE', () => {
    const broken: HashStrategy = {
      name: 'broken',
      outputLength: 32,
      digest: () => {
        throw new Error('no entropy today');
      },
    };
    try {
      buildInternalLevels(buildLeaves(strings('a', 'b')), broken);
      expect.unreachable();
    } catch (e) {
      const err = e as ArborError;
      expect(err.code).toBe(ArborErrorCode.HASH_FAILURE);
      expect(err.message).toBe('Hash strategy "broken" failed: no entropy today');
      expect(err.context).toEqual({ algorithm: 'broken' });
    }
  });

  it('copies digests from a strategy that reuses its output buffer', () => {
    const out = new Uint8Array(32);
    const reusing: HashStrategy = {
      name: 'sha256-reusing',
      outputLength: 32,
      digest: (data) => {
        out.set(sha256(data));
        return out;
      },
    };
    const [level1, level2] = buildInternalLevels(buildLeaves(strings('a', 'b', 'c', 'd')), reusing);
    const ab = pair(h('a'), h('b'));
    const cd = pair(h('c'), h('d'));
    expect(level1.map((n) => toHex(n.digest))).toEqual([ab, cd]);
    expect(toHex(level2[0].digest)).toBe(pair(ab, cd));
  });
});

// ─── buildLevels ────────────────────────────────────────────────────────────────

describe('buildLevels', () => {
  it('returns the padded leaves and every internal level', () => {
    const built = buildLevels(strings('a', 'b', 'c'), SHA256_STRATEGY);
    expect(built.leaves).toHaveLength(4);
    expect(built.internal.map((level) => level.length)).toEqual([2, 1]);
  });
});
