/**
 * @arbor/types - errors, logging and runtime guards shared by the Arbor packages.
 *
 * @packageDocumentation
 */

// ─── Errors ─────────────────────────────────────────────────────────────────────

export { ArborErrorCode, ArborError, isArborError, describeError, formatError } from './errors';
export type { ArborErrorOptions } from './errors';

// ─── Runtime type guards ────────────────────────────────────────────────────────

export { isValidHex, isByteArray, isPlainObject, assertNever } from './guards';

// ─── Structured logging ─────────────────────────────────────────────────────────

export { Logger, LogLevel, createSilentLogger } from './logger';
export type { LogEntry, LogOutput, LoggerOptions } from './logger';

// ─── Debug logging ──────────────────────────────────────────────────────────────

export { DEBUG_ROOT_NAMESPACE, isDebugEnabled, createDebugLogger } from './debug';
export type { DebugLogger } from './debug';
