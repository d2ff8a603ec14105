/**
 * Log severity levels, lowest first.
 */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Numeric priority per level; an entry passes when its priority is at least the logger's */
export const LOG_LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

/** ANSI colour per level for the console transport */
export const LOG_LEVEL_COLORS: Readonly<Record<LogLevel, string>> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[35m",
};

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  /**
   * Bound by `createLogger({ name })` and `logger.child(...)`:
   * `logger` (the program), `component` (router, loader, engine).
   */
  context?: Record<string, unknown>;
  data?: unknown;
}

/**
 * Returned by {@link Logger.time}. `duration` is in milliseconds and stays 0
 * until the timer is ended or stopped.
 */
export interface TimerResult {
  readonly duration: number;
  /** Stops the timer and logs the duration at debug level */
  end(message?: string): void;
  /** Stops the timer without logging */
  stop(): number;
}

export interface LogTransport {
  log(entry: LogEntry): void;
}

export interface LoggerOptions {
  /** Default: "info" */
  level?: LogLevel;
  context?: Record<string, unknown>;
  /** Shared by reference with child loggers */
  transports?: LogTransport[];
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
