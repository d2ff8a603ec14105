import { describe, expect, it } from "vitest";

import {
  compileConditions,
  contextValue,
  describeCondition,
  isPresent,
  matchesAll,
  readKey,
} from "../conditions.js";
import { context } from "./fixtures.js";

describe("compileConditions", () => {
  it("should recognise every test form", () => {
    const conditions = compileConditions({
      a: "present",
      b: "absent",
      c: null,
      d: "^\\.",
      e: "GO",
      f: 3,
      g: true,
    });

    expect(conditions.map((condition) => condition.test)).toEqual([
      "present",
      "absent",
      "absent",
      "regex",
      "equals",
      "equals",
      "equals",
    ]);
    expect(conditions.map(describeCondition)).toEqual([
      "a: present",
      "b: absent",
      "c: absent",
      "d: ^\\.",
      "e: GO",
      "f: 3",
      "g: true",
    ]);
  });

  it("should throw on invalid regular expressions", () => {
    expect(() => compileConditions({ target: "^(" })).toThrow(SyntaxError);
  });
});

describe("matchesAll", () => {
  const ctx = context({ TMUX: "/tmp/tmux-1000/default" }, { caller: "tmux" });

  it("should hold for an empty conjunction", () => {
    expect(matchesAll([], { verb: "GO" }, ctx)).toBe(true);
  });

  it("should test equality, presence and absence", () => {
    const conditions = compileConditions({ verb: "GO", target: "present", object: "absent" });

    expect(matchesAll(conditions, { verb: "GO", target: ".1" }, ctx)).toBe(true);
    expect(matchesAll(conditions, { verb: "GO", target: "" }, ctx)).toBe(false);
    expect(matchesAll(conditions, { verb: "GO", target: ".1", object: "PANE" }, ctx)).toBe(false);
    expect(matchesAll(conditions, { verb: "SPLIT", target: ".1" }, ctx)).toBe(false);
  });

  it("should test regular expressions against present values only", () => {
    const conditions = compileConditions({ target: "^\\." });

    expect(matchesAll(conditions, { verb: "GO", target: ".2" }, ctx)).toBe(true);
    expect(matchesAll(conditions, { verb: "GO", target: ":2" }, ctx)).toBe(false);
    expect(matchesAll(conditions, { verb: "GO" }, ctx)).toBe(false);
  });

  it("should read ctx keys from the invocation context", () => {
    const conditions = compileConditions({ "ctx.caller": "tmux", "ctx.env.TMUX": "present" });

    expect(matchesAll(conditions, { verb: "GO" }, ctx)).toBe(true);
    expect(matchesAll(conditions, { verb: "GO" }, context({}, { caller: "tmux" }))).toBe(false);
  });

  it("should not read inherited properties as fields", () => {
    const conditions = compileConditions({ constructor: "present" });

    expect(matchesAll(conditions, { verb: "GO" }, ctx)).toBe(false);
  });
});

describe("context access", () => {
  const ctx = context({ HOME: "/home/me" }, { pane: "%3", session: "$1", cwd: "/work" });

  it("should read named context values and environment variables", () => {
    expect(contextValue("pane", ctx)).toBe("%3");
    expect(contextValue("session", ctx)).toBe("$1");
    expect(contextValue("cwd", ctx)).toBe("/work");
    expect(contextValue("env.HOME", ctx)).toBe("/home/me");
    expect(contextValue("caller", ctx)).toBeUndefined();
    expect(contextValue("unknown", ctx)).toBeUndefined();
  });

  it("should route ctx keys to the context and others to the state", () => {
    expect(readKey("ctx.pane", { verb: "GO" }, ctx)).toBe("%3");
    expect(readKey("verb", { verb: "GO" }, ctx)).toBe("GO");
  });

  it("should treat empty strings as absent", () => {
    expect(isPresent("")).toBe(false);
    expect(isPresent(undefined)).toBe(false);
    expect(isPresent("x")).toBe(true);
  });
});
