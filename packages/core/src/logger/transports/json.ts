import type { LogEntry, LogTransport } from "../types.js";

export interface JsonTransportOptions {
  /** Receives one serialized entry per call (default: a line on stderr) */
  output?: (line: string) => void;
}

/**
 * One JSON object per line, for `logJson = true`.
 *
 * Keys appear in a fixed order: `time`, `level`, `context` (when bound),
 * `message`, `data` (when given).
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * new JsonTransport({ output: (line) => lines.push(line) });
 * // {"time":"2026-01-01T10:00:00.000Z","level":"warn","context":{"component":"router"},"message":"..."}
 * ```
 */
export class JsonTransport implements LogTransport {
  private readonly output: (line: string) => void;

  constructor(options: JsonTransportOptions = {}) {
    this.output = options.output ?? ((line) => process.stderr.write(`${line}\n`));
  }

  log({ timestamp, level, context, message, data }: LogEntry): void {
    const hasContext = context !== undefined && Object.keys(context).length > 0;

    this.output(
      JSON.stringify({
        time: timestamp.toISOString(),
        level,
        ...(hasContext ? { context } : {}),
        message,
        ...(data !== undefined ? { data } : {}),
      })
    );
  }
}
