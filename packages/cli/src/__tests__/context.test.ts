import { describe, expect, it } from "vitest";

import { buildInvocationContext, tmuxSession } from "../context.js";

describe("buildInvocationContext", () => {
  it("should read pane and session from tmux variables", () => {
    const env = { TMUX: "/tmp/tmux-test/default,4242,3", TMUX_PANE: "%7" };

    expect(buildInvocationContext(env, { caller: "cli", cwd: "/work" })).toEqual({
      env,
      caller: "cli",
      pane: "%7",
      session: "3",
      cwd: "/work",
    });
  });

  it("should leave tmux fields unset outside tmux", () => {
    const context = buildInvocationContext({ TMUX_PANE: "" });

    expect(context.pane).toBeUndefined();
    expect(context.session).toBeUndefined();
    expect(context.caller).toBeUndefined();
  });
});

describe("tmuxSession", () => {
  it("should take the third field", () => {
    expect(tmuxSession("/tmp/s,1,0")).toBe("0");
  });

  it("should ignore malformed values", () => {
    expect(tmuxSession("/tmp/s")).toBeUndefined();
    expect(tmuxSession("/tmp/s,1,")).toBeUndefined();
    expect(tmuxSession(undefined)).toBeUndefined();
  });
});
