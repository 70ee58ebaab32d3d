import chalk from "chalk";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  /** Colorize the level label in human-readable mode */
  color?: boolean;
  /** Timestamp source, overridable for deterministic output */
  now?: () => Date;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(defaultMeta: Record<string, unknown>): Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Narrow an arbitrary string (flag, env var) to a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some((level) => level === value);
}

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Create a structured logger for sync runs.
 * info/debug go to stdout, warn/error to stderr, so a `--json` summary
 * on stdout stays parseable when logs are also JSON lines.
 */
export function createLogger(options: LoggerOptions): Logger {
  const minLevel = LOG_LEVELS[options.level];
  const now = options.now ?? (() => new Date());

  function shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= minLevel;
  }

  function formatMessage(
    level: LogLevel,
    message: string,
    meta: Record<string, unknown>
  ): string {
    const timestamp = now().toISOString();

    if (options.json) {
      const entry: LogEntry = {
        timestamp,
        level,
        message,
        ...meta,
      };
      return JSON.stringify(entry);
    }

    const label = level.toUpperCase().padEnd(5);
    const coloredLabel = options.color ? LEVEL_COLORS[level](label) : label;
    const metaStr =
      Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `[${timestamp}] ${coloredLabel} ${message}${metaStr}`;
  }

  function log(
    level: LogLevel,
    message: string,
    meta: Record<string, unknown> = {},
    defaultMeta: Record<string, unknown> = {}
  ): void {
    if (!shouldLog(level)) return;

    const formatted = formatMessage(level, message, { ...defaultMeta, ...meta });

    if (level === "warn" || level === "error") {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
  }

  function createLoggerInstance(
    defaultMeta: Record<string, unknown> = {}
  ): Logger {
    return {
      debug: (msg, meta) => log("debug", msg, meta, defaultMeta),
      info: (msg, meta) => log("info", msg, meta, defaultMeta),
      warn: (msg, meta) => log("warn", msg, meta, defaultMeta),
      error: (msg, meta) => log("error", msg, meta, defaultMeta),
      child: (childMeta) =>
        createLoggerInstance({ ...defaultMeta, ...childMeta }),
    };
  }

  return createLoggerInstance();
}

/**
 * Logger that discards everything. Used when a caller passes none.
 */
export function createNoopLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
