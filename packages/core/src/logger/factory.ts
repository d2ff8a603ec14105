import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: none) */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** If true, output JSON lines instead of human-readable text */
  json?: boolean;
  /** Enable colored console output (auto-detected when omitted) */
  colors?: boolean;
  /** Include timestamps in console output (default: true) */
  timestamps?: boolean;
  /** Output sink shared by the transports (default: stderr) */
  write?: (line: string) => void;
}

/**
 * Factory function to create a Logger with common transport configurations.
 *
 * @example
 * ```typescript
 * // Human-readable stderr logger
 * const logger = createLogger({ name: 'ali', level: 'debug' });
 *
 * // JSON lines for log aggregation
 * const logger = createLogger({ name: 'ali', json: true });
 *
 * // Silent logger
 * const logger = createLogger({ console: false });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    context: options.name ? { logger: options.name } : undefined,
  });

  const enableConsole = options.console ?? true;
  if (enableConsole) {
    if (options.json) {
      logger.addTransport(new JsonTransport({ output: options.write }));
    } else {
      logger.addTransport(
        new ConsoleTransport({
          colors: options.colors,
          timestamps: options.timestamps,
          write: options.write,
        })
      );
    }
  }

  return logger;
}

/**
 * A logger with no transports. Used wherever a logger is optional.
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: "fatal" });
}
