/**
 * Structured JSON logger used by the licensekit command line.
 *
 * Library packages stay quiet and trace through {@link createDebugLogger}
 * instead; this logger is for processes that own their output streams.
 *
 * @packageDocumentation
 */

// ─── Log levels ─────────────────────────────────────────────────────────────────

/**
 * Numeric log levels. An entry is emitted only when its level is greater
 * than or equal to the logger threshold; {@link SILENT} suppresses all output.
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
  /** Level name, e.g. "INFO". */
  level: string;
  message: string;
  /** ISO 8601 timestamp. */
  timestamp: string;
  component?: string;
  /** Arbitrary contextual fields. */
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

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/** Level names accepted by {@link parseLogLevel}. */
export const LOG_LEVEL_NAMES: readonly string[] = Object.keys(LEVELS_BY_NAME);

/**
 * Resolve a case-insensitive level name (`debug`, `info`, `warn`, `error`,
 * `silent`). Returns `undefined` for anything else.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVELS_BY_NAME[name.trim().toLowerCase()];
}

/** JSON lines on stderr, leaving stdout to command output. */
export const stderrOutput: LogOutput = (entry: LogEntry): void => {
  process.stderr.write(JSON.stringify(entry) + '\n');
};

// ─── Logger ─────────────────────────────────────────────────────────────────────

/** Configuration options accepted by the {@link Logger} constructor. */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  /** Component name; children append to it with a dot. */
  component?: string;
  /** Output sink. Defaults to {@link stderrOutput}. */
  output?: LogOutput;
}

/**
 * Structured logger with level filtering, contextual fields and child loggers.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'cli' });
 * log.info('license issued', { id });
 * log.child('verify').warn('signature mismatch', { file });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.output = options?.output ?? stderrOutput;
  }

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
   * Create a child logger sharing this logger's level and output. Its
   * component is `parent.child` when this logger already has one.
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      component: this.component ? `${this.component}.${component}` : component,
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (level < this.level) {
      return;
    }

    const entry: LogEntry = {
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...fields,
    };

    this.output(entry);
  }
}

/** Convenience wrapper around `new Logger(options)`. */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
