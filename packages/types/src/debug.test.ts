import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { isDebugEnabled, createDebugLogger } from './debug';

/** Save and restore the original DEBUG env var around each test. */
let originalDebug: string | undefined;

beforeEach(() => {
  originalDebug = process.env.DEBUG;
});

afterEach(() => {
  if (originalDebug === undefined) {
    delete process.env.DEBUG;
  } else {
    process.env.DEBUG = originalDebug;
  }
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// isDebugEnabled
// ---------------------------------------------------------------------------
describe('isDebugEnabled', () => {
  it('returns false when DEBUG is not set or empty', () => {
    delete process.env.DEBUG;
    expect(isDebugEnabled()).toBe(false);
    process.env.DEBUG = '';
    expect(isDebugEnabled('arbor:merkle')).toBe(false);
  });

  it('enables every arbor namespace for DEBUG=arbor', () => {
    process.env.DEBUG = 'arbor';
    expect(isDebugEnabled()).toBe(true);
    expect(isDebugEnabled('arbor')).toBe(true);
    expect(isDebugEnabled('arbor:merkle')).toBe(true);
    expect(isDebugEnabled('other:thing')).toBe(false);
  });

  it('enables every arbor namespace for DEBUG=arbor:*', () => {
    process.env.DEBUG = 'arbor:*';
    expect(isDebugEnabled('arbor:crypto')).toBe(true);
    expect(isDebugEnabled('arborist')).toBe(false);
  });

  it('enables everything for DEBUG=*', () => {
    process.env.DEBUG = '*';
    expect(isDebugEnabled('anything')).toBe(true);
  });

  it('matches an exact namespace only', () => {
    process.env.DEBUG = 'arbor:merkle';
    expect(isDebugEnabled('arbor:merkle')).toBe(true);
    expect(isDebugEnabled('arbor:crypto')).toBe(false);
  });

  it('matches a namespace and its descendants for a trailing wildcard', () => {
    process.env.DEBUG = 'arbor:merkle:*';
    expect(isDebugEnabled('arbor:merkle')).toBe(true);
    expect(isDebugEnabled('arbor:merkle:proof')).toBe(true);
    expect(isDebugEnabled('arbor:crypto')).toBe(false);
  });

  it('accepts comma-separated patterns with whitespace', () => {
    process.env.DEBUG = 'other, arbor:crypto';
    expect(isDebugEnabled('arbor:crypto')).toBe(true);
    expect(isDebugEnabled('arbor:merkle')).toBe(false);
  });

  it('reads an explicit env value instead of process.env', () => {
    delete process.env.DEBUG;
    expect(isDebugEnabled('arbor:merkle', 'arbor')).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// createDebugLogger
// ---------------------------------------------------------------------------
describe('createDebugLogger', () => {
  it('is a silent no-op when disabled', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const dbg = createDebugLogger('arbor:merkle', '');
    expect(dbg.enabled).toBe(false);
    dbg.time('build')();
    expect(spy).not.toHaveBeenCalled();
  });

  it('writes prefixed lines to stderr when enabled', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const dbg = createDebugLogger('arbor:merkle', 'arbor:merkle');
    expect(dbg.enabled).toBe(true);
    dbg.time('rebuild')();
    expect(spy).toHaveBeenCalledOnce();
    const args = spy.mock.calls[0];
    expect(args).toHaveLength(3);
    expect(args[1]).toBe('[arbor:merkle]');
  });

  it('time() logs the label with elapsed milliseconds', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const stop = createDebugLogger('arbor:merkle', '*').time('build');
    stop();
    expect(spy).toHaveBeenCalledOnce();
    expect(spy.mock.calls[0][2]).toMatch(/^build: \d+\.\d{2}ms$/);
  });
});
