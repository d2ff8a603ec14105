import { describe, expect, it } from "vitest";
import { ConsoleTransport } from "../transports/console.js";
import type { LogEntry } from "../types.js";

describe("ConsoleTransport", () => {
  const entry: LogEntry = {
    level: "info",
    message: "Registry loaded",
    timestamp: new Date("2026-01-05T10:00:00.000Z"),
  };

  function capture(options: { timestamps?: boolean; colors?: boolean } = {}) {
    const lines: string[] = [];
    const transport = new ConsoleTransport({ colors: false, ...options, write: (line) => lines.push(line) });
    return { lines, transport };
  }

  it("writes a timestamped line", () => {
    const { lines, transport } = capture();
    transport.log(entry);

    expect(lines).toEqual(["[2026-01-05 10:00:00] [INFO ] Registry loaded"]);
  });

  it("omits the timestamp on request", () => {
    const { lines, transport } = capture({ timestamps: false });
    transport.log({ ...entry, level: "warn" });

    expect(lines).toEqual(["[WARN ] Registry loaded"]);
  });

  it("includes the component from the context", () => {
    const { lines, transport } = capture({ timestamps: false });
    transport.log({ ...entry, level: "debug", context: { logger: "ali", component: "router" } });

    expect(lines).toEqual(["[DEBUG] (router) Registry loaded"]);
  });

  it("appends object data as JSON and strings as-is", () => {
    const { lines, transport } = capture({ timestamps: false });
    transport.log({ ...entry, data: { plugins: 2 } });
    transport.log({ ...entry, data: "tmux, broot" });

    expect(lines).toEqual(['[INFO ] Registry loaded {"plugins":2}', "[INFO ] Registry loaded tmux, broot"]);
  });

  it("wraps the level tag in colour codes when enabled", () => {
    const { lines, transport } = capture({ timestamps: false, colors: true });
    transport.log({ ...entry, level: "error" });

    expect(lines).toEqual(["\x1b[31m[ERROR]\x1b[0m Registry loaded"]);
  });
});
