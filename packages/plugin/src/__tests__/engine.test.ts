import { describe, expect, it } from "vitest";

import { createEngine } from "../engine.js";
import { GrammarMismatchError, TemplateCycleError } from "../errors.js";
import {
  brootPlugin,
  context,
  createCapturingLogger,
  createRegistry,
  editorPlugin,
  tmuxPlugin,
} from "./fixtures.js";

describe("Engine", () => {
  const registry = createRegistry(tmuxPlugin, brootPlugin, editorPlugin);
  const engine = createEngine({ registry });

  describe("resolve", () => {
    it.each([
      [["SPLIT", "left"], "tmux split-window -h -b"],
      [["split", "RIGHT"], "tmux split-window -h"],
      [["BROWSE", "left"], "tmux split-window -h -b 'broot'"],
      [["GO", ".2"], "tmux select-pane -t .2"],
      [["JUMP", ":3"], "tmux select-window -t :3"],
      [["CLOSE"], "tmux kill-pane"],
      [["CLOSE", ".1"], "tmux kill-pane -t .1"],
      [["GO", "PANE", "?"], "tmux display-panes -d 2000"],
      [["EDIT", "@?"], "$EDITOR $(broot --conf ~/.config/broot/select.hjson)"],
    ])("should compose %j into %j", (tokens, expected) => {
      expect(engine.resolve(tokens).output).toBe(expected);
    });

    it("should drop unrecognized tokens with a warning", () => {
      const { logger, entries } = createCapturingLogger();

      const composition = createEngine({ registry, logger }).resolve(["SPLIT", "up"]);

      expect(composition.output).toBe("tmux split-window");
      expect(composition.route.warnings).toEqual(["Unrecognized token for tmux: up"]);
      expect(entries.some((entry) => entry.level === "warn")).toBe(true);
    });

    it("should reject unrecognized tokens in strict mode", () => {
      const strict = createEngine({ registry, strict: true });

      expect(() => strict.resolve(["SPLIT", "up"])).toThrow(GrammarMismatchError);
    });

    it("should report the template the output came from", () => {
      const composition = engine.resolve(["BROWSE", "left"]);

      expect(composition.template).toBe("{split} 'broot'");
      expect(composition.route.plugin.name).toBe("broot");
    });

    it("should pass resolver limits through", () => {
      const isolated = createEngine({ registry, maxServiceHops: 0 });

      expect(() => isolated.resolve(["BROWSE", "left"])).toThrow(TemplateCycleError);
    });

    it("should be deterministic", () => {
      const first = engine.resolve(["JUMP", ":3"], context({ TMUX: "1" }));
      const second = engine.resolve(["JUMP", ":3"], context({ TMUX: "1" }));

      expect(second.output).toBe(first.output);
      expect(second.route.state).toEqual(first.route.state);
    });
  });

  describe("services across plugins", () => {
    const services = createRegistry(
      {
        name: "mux",
        provides: ["window"],
        services: { open: "mux new-window {cmd}" },
      },
      {
        name: "runner",
        requires: ["window"],
        vocabulary: { verbs: ["RUN", "SHELL"] },
        grammar: { cmd: { type: "string" } },
        commands: [
          { match: { verb: "RUN" }, exec: "{open}" },
          { match: { verb: "SHELL" }, exec: "run {extra}" },
        ],
      }
    );
    const runner = createEngine({ registry: services });

    it("should leave the caller's unset fields empty inside the provider's template", () => {
      expect(runner.resolve(["RUN"]).output).toBe("mux new-window");
    });

    it("should resolve undeclared names to empty", () => {
      expect(runner.resolve(["SHELL"]).output).toBe("run");
    });

    it("should splice the caller's fields into the provider's template", () => {
      expect(runner.resolve(["RUN", "htop"]).output).toBe("mux new-window htop");
    });
  });

  describe("compose", () => {
    it("should wrap the composition in an ok result", () => {
      const result = engine.compose(["GO", ".2"]);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.output).toBe("tmux select-pane -t .2");
      }
    });

    it("should return engine errors instead of throwing", () => {
      const result = engine.compose(["FLY"]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("UnknownVerbError");
        expect(result.error.message).toBe("Unknown verb 'FLY'. Available: BROWSE, CLOSE, EDIT, GO, SPLIT");
      }
    });

    it("should report required fields that stay unset", () => {
      const result = engine.compose(["EDIT"]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("UnresolvedRequiredFieldError");
        expect(result.error.plugin).toBe("editor");
      }
    });
  });

  describe("explain", () => {
    it("should list every stage through template expansion", () => {
      const explanation = engine.explain(["GO", ".2"]);

      expect(explanation.output).toBe("tmux select-pane -t .2");
      expect(explanation.error).toBeUndefined();
      expect(explanation.stages.map((event) => event.stage)).toEqual([
        "VerbResolved",
        "PluginSelected",
        "StateParsed",
        "StateInferred",
        "CommandMatched",
        "TemplateExpanded",
      ]);
      expect(explanation.stages[3]?.detail).toEqual({
        state: { verb: "GO", target: ".2", object: "PANE" },
        rules: [0],
      });
    });

    it("should report selector routing", () => {
      const stages = engine.explain(["GO", "PANE", "?"]).stages.map((event) => event.stage);

      expect(stages).toContain("SelectorResolved");
      expect(stages).not.toContain("CommandMatched");
    });

    it("should stop at the failing stage", () => {
      const explanation = engine.explain(["GO", "?"]);

      expect(explanation.output).toBeUndefined();
      expect(explanation.error?.kind).toBe("NoMatchingCommandError");
      expect(explanation.stages.map((event) => event.stage)).toEqual([
        "VerbResolved",
        "PluginSelected",
        "StateParsed",
        "StateInferred",
      ]);
    });
  });
});
