/**
 * Opt-in diagnostic output controlled by the `DEBUG` environment variable.
 *
 * Patterns are comma separated: `*` enables everything, `arbor` or
 * `arbor:*` enables every Arbor namespace, `arbor:merkle` enables one
 * namespace and `arbor:merkle:*` a namespace and its descendants.
 *
 * When a namespace is disabled every method is a no-op.
 *
 * @packageDocumentation
 */

/** Root namespace shared by all Arbor debug loggers. */
export const DEBUG_ROOT_NAMESPACE = 'arbor';

// ─── Debug detection ────────────────────────────────────────────────────────────

/**
 * Check whether debug output is enabled for `namespace`.
 *
 * @param namespace - Namespace to check, e.g. `'arbor:merkle'`. When omitted,
 *   checks whether any Arbor namespace is enabled.
 * @param env - Value to read instead of `process.env.DEBUG`.
 */
export function isDebugEnabled(namespace?: string, env?: string): boolean {
  const debugEnv = env ?? ((typeof process !== 'undefined' && process.env?.DEBUG) || '');
  if (!debugEnv) {
    return false;
  }

  const patterns = debugEnv.split(',').map((p) => p.trim()).filter(Boolean);
  const inRoot =
    !namespace ||
    namespace === DEBUG_ROOT_NAMESPACE ||
    namespace.startsWith(`${DEBUG_ROOT_NAMESPACE}:`);

  for (const pattern of patterns) {
    if (pattern === '*') {
      return true;
    }

    if ((pattern === DEBUG_ROOT_NAMESPACE || pattern === `${DEBUG_ROOT_NAMESPACE}:*`) && inRoot) {
      return true;
    }

    if (namespace && pattern === namespace) {
      return true;
    }

    if (namespace && pattern.endsWith(':*')) {
      const prefix = pattern.slice(0, -2);
      if (namespace === prefix || namespace.startsWith(prefix + ':')) {
        return true;
      }
    }
  }

  return false;
}

// ─── Debug logger ───────────────────────────────────────────────────────────────

/** Returned by {@link createDebugLogger}. */
export interface DebugLogger {
  /** Whether this namespace produces output. */
  readonly enabled: boolean;
  /** Start a timer; the returned function logs the elapsed milliseconds. */
  time: (label: string) => () => void;
}

const noop = (): void => {};

/**
 * Create a debug logger for `namespace`.
 *
 * @example
 * ```typescript
 * const dbg = createDebugLogger('arbor:merkle');
 * const stop = dbg.time('build');
 * // ... build ...
 * stop(); // [arbor:merkle] build: 0.42ms
 * ```
 */
export function createDebugLogger(namespace: string, env?: string): DebugLogger {
  if (!isDebugEnabled(namespace, env)) {
    return {
      enabled: false,
      time: () => noop,
    };
  }

  const prefix = `[${namespace}]`;

  return {
    enabled: true,
    time: (label: string): (() => void) => {
      const start = performance.now();
      return (): void => {
        const elapsed = performance.now() - start;
        console.error(new Date().toISOString(), prefix, `${label}: ${elapsed.toFixed(2)}ms`);
      };
    },
  };
}
