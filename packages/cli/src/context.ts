/**
 * Invocation context
 *
 * Collects what templates and guards may read through `ctx.*` from the
 * process environment.
 *
 * @module cli/context
 */

import type { InvocationContext } from "@ali/plugin";

export interface ContextOptions {
  /** Caller identity from configuration (`caller`, `ALI_CALLER`) */
  caller?: string;
  cwd?: string;
}

/**
 * Session index from the `TMUX` variable (`socket,pid,session`).
 */
export function tmuxSession(tmux: string | undefined): string | undefined {
  if (!tmux) {
    return undefined;
  }
  const session = tmux.split(",")[2];
  return session === undefined || session === "" ? undefined : session;
}

export function buildInvocationContext(
  env: Readonly<Record<string, string | undefined>>,
  options: ContextOptions = {}
): InvocationContext {
  return {
    env,
    caller: options.caller,
    pane: env.TMUX_PANE || undefined,
    session: tmuxSession(env.TMUX),
    cwd: options.cwd,
  };
}
