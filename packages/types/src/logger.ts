/**
 * Structured logging for the Arbor packages.
 *
 * Emits one JSON object per entry. Loggers carry a level threshold, an
 * optional dotted component name and a set of bound fields that are merged
 * into every entry they emit.
 *
 * @packageDocumentation
 */

// ─── Log levels ─────────────────────────────────────────────────────────────────

/**
 * Numeric log levels. An entry is emitted only when its level is greater
 * than or equal to the logger's threshold.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  /** Suppress all output. */
  SILENT = 4,
}

// ─── Types ──────────────────────────────────────────────────────────────────────

/**
 * A single structured log entry.
 */
export interface LogEntry {
  /** Level name, e.g. "DEBUG". */
  level: string;
  message: string;
  /** ISO 8601 timestamp. */
  timestamp: string;
  component?: string;
  [key: string]: unknown;
}

/** Receives each entry that passes the level threshold. */
export type LogOutput = (entry: LogEntry) => void;

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const defaultOutput: LogOutput = (entry: LogEntry): void => {
  console.log(JSON.stringify(entry));
};

// ─── Logger options ─────────────────────────────────────────────────────────────

/** Configuration accepted by the {@link Logger} constructor. */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  component?: string;
  /** Fields merged into every entry. Per-call fields win on conflict. */
  fields?: Record<string, unknown>;
  /** Output sink. Defaults to JSON via `console.log`. */
  output?: LogOutput;
}

// ─── Logger class ───────────────────────────────────────────────────────────────

/**
 * Structured logger with level filtering, bound fields and child loggers.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'arbor' });
 * const treeLog = log.child('merkle', { algorithm: 'sha256' });
 * treeLog.debug('tree built', { leaves: 4 });
 * // {"level":"DEBUG","message":"tree built","timestamp":"...","component":"arbor.merkle","algorithm":"sha256","leaves":4}
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly fields: Record<string, unknown>;
  private readonly output: LogOutput;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.fields = { ...options?.fields };
    this.output = options?.output ?? defaultOutput;
  }

  // ── Public API ──────────────────────────────────────────────────────────────

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Create a child logger that shares this logger's level and output.
   *
   * The child's component is `parent.child` when this logger has a component,
   * and its bound fields are this logger's fields extended by `fields`.
   */
  child(component: string, fields?: Record<string, unknown>): Logger {
    const childComponent = this.component
      ? `${this.component}.${component}`
      : component;

    return new Logger({
      level: this.level,
      component: childComponent,
      fields: { ...this.fields, ...fields },
      output: this.output,
    });
  }

  /** Whether an entry at `level` would currently be emitted. */
  isLevelEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...this.fields,
      ...fields,
    };

    this.output(entry);
  }
}

// ─── Factories ──────────────────────────────────────────────────────────────────

/**
 * A logger that never emits. Used by library components when the caller
 * does not supply one.
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: LogLevel.SILENT });
}
