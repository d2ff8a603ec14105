import { describe, expect, it } from "vitest";

import { PluginDescriptor } from "../descriptor.js";
import { GrammarMismatchError } from "../errors.js";
import { acceptToken, parseTokens } from "../grammar.js";
import { tmuxPlugin } from "./fixtures.js";

const tmux = PluginDescriptor.parse(tmuxPlugin);

function plugin(grammar: Record<string, unknown>, strict = false): PluginDescriptor {
  return PluginDescriptor.parse({ name: "test", strict, vocabulary: { verbs: ["RUN"] }, grammar });
}

describe("acceptToken", () => {
  it("should apply the transform before matching values", () => {
    const [, direction] = tmux.grammar;
    if (!direction) throw new Error("Test setup error");

    expect(acceptToken(direction, "LEFT")).toBe("left");
    expect(acceptToken(direction, "up")).toBeUndefined();
  });

  it("should test patterns against the raw token and store the transformed value", () => {
    const [field] = plugin({ name: { type: "pattern", pattern: "[a-z]+", transform: "upper" } }).grammar;
    if (!field) throw new Error("Test setup error");

    expect(acceptToken(field, "abc")).toBe("ABC");
    expect(acceptToken(field, "ABC")).toBeUndefined();
  });
});

describe("parseTokens", () => {
  describe("forward pass", () => {
    it("should fill fields in order", () => {
      const result = parseTokens("RUN", ["x", "hello", "z"], plugin({
        a: { type: "values", values: ["x", "y"] },
        b: { type: "string" },
        c: { type: "values", values: ["z"] },
      }));

      expect(result.state).toEqual({ verb: "RUN", a: "x", b: "hello", c: "z" });
      expect(result.leftover).toEqual([]);
      expect(result.warnings).toEqual([]);
    });

    it("should skip fields that reject a token and never revisit them", () => {
      const result = parseTokens("RUN", ["z", "x"], plugin({
        a: { type: "values", values: ["x"] },
        c: { type: "values", values: ["z"] },
      }));

      expect(result.state).toEqual({ verb: "RUN", c: "z", args: "x" });
      expect(result.leftover).toEqual(["x"]);
    });

    it("should match vocabulary objects case-insensitively", () => {
      const result = parseTokens("GO", ["pane", ".2"], tmux);

      expect(result.state).toEqual({ verb: "GO", object: "PANE", target: ".2" });
    });

    it("should apply the field's own transform to vocabulary objects", () => {
      const lower = PluginDescriptor.parse({
        name: "test",
        vocabulary: { verbs: ["GO"], objects: ["PANE", "Window"] },
        grammar: { object: { type: "values", transform: "lower" } },
      });

      const result = parseTokens("GO", ["PANE"], lower, { strict: true });

      expect(result.state).toEqual({ verb: "GO", object: "pane" });
      expect(result.leftover).toEqual([]);
      expect(parseTokens("GO", ["window"], lower).state).toEqual({ verb: "GO", object: "window" });
    });

    it("should leave the state bare without tokens", () => {
      expect(parseTokens("SPLIT", [], tmux).state).toEqual({ verb: "SPLIT" });
    });
  });

  describe("leftover tokens", () => {
    it("should warn and keep leftovers in args when not strict", () => {
      const result = parseTokens("SPLIT", ["up"], tmux);

      expect(result.state).toEqual({ verb: "SPLIT", args: "up" });
      expect(result.warnings).toEqual(["Unrecognized token for tmux: up"]);
    });

    it("should join several leftovers with spaces", () => {
      const result = parseTokens("SPLIT", ["up", "left", "down"], tmux);

      expect(result.state).toEqual({ verb: "SPLIT", direction: "left", args: "up down" });
      expect(result.warnings).toEqual(["Unrecognized tokens for tmux: up down"]);
    });

    it("should append to an args value the grammar already set", () => {
      const result = parseTokens("RUN", ["all", "extra"], plugin({
        args: { type: "values", values: ["all"] },
      }));

      expect(result.state.args).toBe("all extra");
    });

    it("should fail under a strict plugin", () => {
      const strict = plugin({ direction: { type: "values", values: ["left", "right"] } }, true);

      try {
        parseTokens("RUN", ["left", "up"], strict);
        expect.unreachable("parseTokens should throw");
      } catch (error) {
        expect(error).toBeInstanceOf(GrammarMismatchError);
        if (!(error instanceof GrammarMismatchError)) return;
        expect(error.kind).toBe("GrammarMismatchError");
        expect(error.message).toBe("Unrecognized token for test: up");
        expect(error.leftover).toEqual(["up"]);
        expect(error.state).toEqual({ verb: "RUN", direction: "left" });
      }
    });

    it("should fail when strict mode is forced", () => {
      expect(() => parseTokens("SPLIT", ["up"], tmux, { strict: true })).toThrow(GrammarMismatchError);
    });
  });
});
