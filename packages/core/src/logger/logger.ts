import { LOG_LEVEL_PRIORITY, type LogLevel, type LoggerOptions, type LogTransport, type TimerResult } from "./types.js";

/**
 * Level-filtered logger fanning entries out to its transports.
 *
 * The engine and loader take a Logger as an option and fall back to
 * {@link createSilentLogger}, so nothing reaches the process streams unless
 * the caller installs a transport. Components log through a child:
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: "ali", level: "debug" });
 * const router = logger.child({ component: "router" });
 * router.debug("VerbResolved", { token: "split", verb: "SPLIT" });
 * // [DEBUG] (router) VerbResolved {"token":"split","verb":"SPLIT"}
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly context: Readonly<Record<string, unknown>>;
  private readonly transports: LogTransport[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = { ...options.context };
    this.transports = options.transports ?? [];
  }

  trace(message: string, data?: unknown): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  fatal(message: string, data?: unknown): void {
    this.log("fatal", message, data);
  }

  log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const context = Object.keys(this.context).length > 0 ? this.context : undefined;
    const entry = { level, message, timestamp: new Date(), context, data };
    for (const transport of this.transports) {
      transport.log(entry);
    }
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  /**
   * Measures a span of work; `end()` logs `<label> completed` with the
   * duration at debug level.
   */
  time(label: string): TimerResult {
    const start = performance.now();
    let duration = 0;
    const stop = (): number => {
      duration = performance.now() - start;
      return duration;
    };

    return {
      get duration() {
        return duration;
      },
      end: (message) => {
        this.debug(message ?? `${label} completed`, { label, durationMs: stop() });
      },
      stop,
    };
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * A logger with `context` merged over this one's. It shares the transport
   * list, so transports added later reach it too, and starts at this level.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      transports: this.transports,
    });
  }
}
