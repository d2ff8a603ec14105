import { describe, expect, it } from "vitest";
import { createLogger, createSilentLogger } from "../factory.js";
import { Logger } from "../logger.js";
import type { LogEntry, LogTransport } from "../types.js";
import { isLogLevel } from "../types.js";

function createMockTransport(): LogTransport & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    log(entry: LogEntry) {
      entries.push(entry);
    },
  };
}

describe("Logger", () => {
  it("should pass entries at or above its level to every transport", () => {
    const first = createMockTransport();
    const second = createMockTransport();
    const logger = new Logger({ level: "warn", transports: [first, second] });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown", { token: "b" });
    logger.fatal("shown too");

    expect(first.entries.map((entry) => [entry.level, entry.message])).toEqual([
      ["warn", "shown"],
      ["fatal", "shown too"],
    ]);
    expect(first.entries[0]?.data).toEqual({ token: "b" });
    expect(second.entries).toHaveLength(2);
  });

  it("should change level at runtime", () => {
    const transport = createMockTransport();
    const logger = new Logger({ level: "error", transports: [transport] });

    logger.setLevel("trace");
    logger.trace("now visible");

    expect(logger.getLevel()).toBe("trace");
    expect(transport.entries).toHaveLength(1);
  });

  it("should report enabled levels", () => {
    const logger = new Logger({ level: "warn" });

    expect(logger.isEnabled("info")).toBe(false);
    expect(logger.isEnabled("warn")).toBe(true);
    expect(logger.isEnabled("fatal")).toBe(true);
  });

  it("should leave context undefined when empty", () => {
    const transport = createMockTransport();
    new Logger({ transports: [transport] }).info("plain");

    expect(transport.entries[0]?.context).toBeUndefined();
  });

  describe("child", () => {
    it("should merge context and share transports", () => {
      const transport = createMockTransport();
      const logger = new Logger({ level: "debug", context: { logger: "ali" }, transports: [transport] });

      logger.child({ component: "router" }).debug("Verb resolved");

      expect(transport.entries[0]?.context).toEqual({ logger: "ali", component: "router" });
    });

    it("should see transports added to the parent later", () => {
      const logger = new Logger();
      const child = logger.child({ component: "loader" });
      const transport = createMockTransport();

      logger.addTransport(transport);
      child.info("late");

      expect(transport.entries).toHaveLength(1);
    });
  });

  describe("time", () => {
    it("should log the duration at debug level", () => {
      const transport = createMockTransport();
      const logger = new Logger({ level: "debug", transports: [transport] });

      const timer = logger.time("load");
      timer.end();

      expect(transport.entries[0]?.message).toBe("load completed");
      expect(transport.entries[0]?.data).toMatchObject({ label: "load" });
      expect(timer.duration).toBeGreaterThanOrEqual(0);
    });

    it("should stop without logging", () => {
      const transport = createMockTransport();
      const logger = new Logger({ level: "debug", transports: [transport] });

      expect(logger.time("quiet").stop()).toBeGreaterThanOrEqual(0);
      expect(transport.entries).toEqual([]);
    });
  });
});

describe("createLogger", () => {
  it("should write human-readable lines to the given sink", () => {
    const lines: string[] = [];
    const logger = createLogger({ name: "ali", level: "info", colors: false, timestamps: false, write: (line) => lines.push(line) });

    logger.child({ component: "router" }).warn("Unrecognized token for tmux: b");

    expect(lines).toEqual(["[WARN ] (router) Unrecognized token for tmux: b"]);
  });

  it("should write JSON lines when requested", () => {
    const lines: string[] = [];
    const logger = createLogger({ name: "ali", json: true, write: (line) => lines.push(line) });

    logger.info("ready");

    expect(JSON.parse(lines[0] ?? "")).toMatchObject({ level: "info", context: { logger: "ali" }, message: "ready" });
  });

  it("should default to info", () => {
    expect(createLogger({ console: false }).getLevel()).toBe("info");
  });
});

describe("createSilentLogger", () => {
  it("should drop everything", () => {
    const logger = createSilentLogger();
    logger.error("nobody hears this");

    expect(logger.getLevel()).toBe("fatal");
  });
});

describe("isLogLevel", () => {
  it("should accept known levels only", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("loud")).toBe(false);
  });
});
