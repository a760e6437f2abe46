/**
 * Error code system for the Arbor packages.
 *
 * Every error has a unique code (ARBOR_Exxx) that maps to one failure mode,
 * so callers can branch on `error.code` instead of parsing messages.
 *
 * Verification outcomes such as "content not present" or "digest mismatch"
 * are reported as `false` by the verifying functions and never as errors;
 * the codes below describe situations where no answer could be produced.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All Arbor error codes. */
export enum ArborErrorCode {
  // Construction (1xx)
  /** A tree was requested over zero content items. */
  EMPTY_INPUT = 'ARBOR_E100',
  /** A content value has no stable byte form to hash. */
  INVALID_CONTENT = 'ARBOR_E101',

  // Hashing (2xx)
  /** A content item or the hash strategy failed to produce a digest. */
  HASH_FAILURE = 'ARBOR_E200',

  // Lookup (3xx)
  /** No leaf holds content equal to the requested value. */
  CONTENT_NOT_FOUND = 'ARBOR_E300',
  /** The supplied value cannot be compared with the tree's content. */
  TYPE_MISMATCH = 'ARBOR_E301',
  /** A leaf index outside the tree was requested. */
  INDEX_OUT_OF_RANGE = 'ARBOR_E302',

  // Encoding & primitives (9xx)
  /** A hex-encoded string was malformed. */
  INVALID_HEX = 'ARBOR_E900',
  /** No hash strategy is registered under the requested name. */
  UNKNOWN_HASH_ALGORITHM = 'ARBOR_E901',
  /** A serialized proof does not have the expected shape. */
  INVALID_PROOF = 'ARBOR_E902',
}

// ─── Error class ────────────────────────────────────────────────────────────────

/** Options for constructing an ArborError. */
export interface ArborErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error. */
  cause?: unknown;
}

/**
 * Base error class for all Arbor errors.
 *
 * @example
 * ```typescript
 * throw new ArborError(
 *   ArborErrorCode.EMPTY_INPUT,
 *   'Cannot build a Merkle tree from an empty content list',
 *   { hint: 'Pass at least one content item.' }
 * );
 * ```
 */
export class ArborError extends Error {
  readonly code: ArborErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: ArborErrorCode, message: string, options?: ArborErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ArborError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /**
   * Return a structured JSON representation suitable for logging.
   */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Check whether `value` is an {@link ArborError}, optionally with a given code.
 *
 * @example
 * ```typescript
 * try {
 *   tree.getMerklePath(item);
 * } catch (e) {
 *   if (isArborError(e, ArborErrorCode.CONTENT_NOT_FOUND)) { ... }
 * }
 * ```
 */
export function isArborError(value: unknown, code?: ArborErrorCode): value is ArborError {
  return value instanceof ArborError && (code === undefined || value.code === code);
}

/**
 * Describe an unknown thrown value in one line.
 */
export function describeError(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

/**
 * Format an error for display.
 *
 * @example
 * ```typescript
 * console.log(formatError(err));
 * // [ARBOR_E100] Cannot build a Merkle tree from an empty content list
 * // Hint: Pass at least one content item.
 * ```
 */
export function formatError(error: ArborError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}
