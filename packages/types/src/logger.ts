/**
 * Structured logging for Backstop components.
 *
 * Entries are flat JSON objects. Fund movements carry `bigint` amounts, so
 * the default sink writes them as decimal strings. Components log through
 * child loggers that extend a dotted component path (`backstop.pool`,
 * `backstop.engine.venue-1`) and may bind fields, such as the venue id,
 * that are stamped on every entry they write.
 *
 * @packageDocumentation
 */

import { isBackstopError } from './errors';

// ─── Log levels ─────────────────────────────────────────────────────────────────

/**
 * Numeric log levels. An entry is written only when its level is at or
 * above the logger's threshold.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

// ─── Types ──────────────────────────────────────────────────────────────────────

/** A single structured log entry. */
export interface LogEntry {
  /** Upper-case level name, e.g. `INFO`. */
  level: string;
  message: string;
  /** ISO 8601 time the entry was written. */
  timestamp: string;
  /** Dotted component path, e.g. `backstop.pool`. */
  component?: string;
  [key: string]: unknown;
}

export type LogOutput = (entry: LogEntry) => void;

/** Fields attached to an entry, either per call or bound to a logger. */
export type LogFields = Record<string, unknown>;

// ─── Helpers ────────────────────────────────────────────────────────────────────

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

/** JSON replacer that renders bigint values as decimal strings. */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

const defaultOutput: LogOutput = (entry: LogEntry): void => {
  console.log(JSON.stringify(entry, bigintReplacer));
};

/**
 * Parse a level name (case-insensitive) into a {@link LogLevel}.
 *
 * @returns The matching level, or `undefined` for an unknown name.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

/**
 * Plain-data form of a thrown value for the `error` field: a Backstop
 * error keeps its code and context, any other `Error` its name and message.
 */
function describeError(value: unknown): unknown {
  if (isBackstopError(value)) return value.toJSON();
  if (value instanceof Error) return { name: value.name, message: value.message };
  return value;
}

// ─── Logger ─────────────────────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  component?: string;
  /** Fields stamped on every entry. Per-call fields override them. */
  fields?: LogFields;
  /** Custom output sink. Defaults to JSON via `console.log`. */
  output?: LogOutput;
  /** Source of entry timestamps. Defaults to the wall clock. */
  now?: () => Date;
}

/**
 * Structured logger with level filtering, bound fields and child loggers.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'backstop' });
 * const engine = log.child('engine.venue-1', { venueId: 'venue-1' });
 * engine.info('report submitted', { month: 3, missingRevenue: 150n });
 * ```
 *
 * An `error` field holding a thrown value is written in its plain-data
 * form, so a rejected operation logs its error code and context.
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly fields: LogFields;
  private readonly output: LogOutput;
  private readonly now: () => Date;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.fields = options?.fields ?? {};
    this.output = options?.output ?? defaultOutput;
    this.now = options?.now ?? (() => new Date());
  }

  debug(message: string, fields?: LogFields): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Logger for a sub-component. Its component is `parent.component` when
   * this logger has one, and its bound fields are this logger's plus
   * `fields`.
   */
  child(component: string, fields?: LogFields): Logger {
    return new Logger({
      level: this.level,
      component: this.component ? `${this.component}.${component}` : component,
      fields: { ...this.fields, ...fields },
      output: this.output,
      now: this.now,
    });
  }

  /** Whether an entry at `level` would be written. */
  enabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private log(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.enabled(level)) return;

    const entry: LogEntry = {
      level: LEVEL_NAMES[level],
      message,
      timestamp: this.now().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...this.fields,
      ...fields,
    };
    if ('error' in entry) {
      entry.error = describeError(entry.error);
    }

    this.output(entry);
  }
}

// ─── Factory & default instance ─────────────────────────────────────────────────

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/** Discards everything; the default for components built without a logger. */
export const silentLogger: Logger = createLogger({ level: LogLevel.SILENT });
