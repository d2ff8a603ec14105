import type { LogEntry, LogTransport } from "../types.js";
import { LOG_LEVEL_COLORS } from "../types.js";

const RESET = "\x1b[0m";

/**
 * Options for ConsoleTransport.
 */
export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Output sink (default: process.stderr) */
  write?: (line: string) => void;
}

/**
 * Detect if colors should be enabled by default.
 * Disables colors when:
 * - stderr is not a TTY
 * - CI environment variable is set
 * - NO_COLOR environment variable is set
 */
function shouldEnableColors(): boolean {
  // Check NO_COLOR (standard: https://no-color.org/)
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }

  if (process.env.CI) {
    return false;
  }

  return process.stderr.isTTY === true;
}

/**
 * Format a timestamp as ISO string without milliseconds.
 */
function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

/**
 * Console transport with color support.
 *
 * Writes to stderr: stdout carries the resolved command line and must stay
 * clean for piping into a shell.
 *
 * @example
 * ```typescript
 * const transport = new ConsoleTransport({ colors: false });
 * logger.addTransport(transport);
 * ```
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly timestamps: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.timestamps = options.timestamps ?? true;
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  log(entry: LogEntry): void {
    const level = entry.level.toUpperCase().padEnd(5);
    const tag = this.useColors ? `${LOG_LEVEL_COLORS[entry.level]}[${level}]${RESET}` : `[${level}]`;

    let output = this.timestamps ? `[${formatTimestamp(entry.timestamp)}] ${tag}` : tag;

    const component = entry.context?.component;
    if (typeof component === "string") {
      output += ` (${component})`;
    }

    output += ` ${entry.message}`;

    if (entry.data !== undefined) {
      const dataStr = typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data);
      output += ` ${dataStr}`;
    }

    this.write(output);
  }
}
