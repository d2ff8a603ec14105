/**
 * Inference Engine
 *
 * Applies a plugin's ordered rewrite rules to the parsed state. Single
 * forward pass: later rules observe the effects of earlier ones, and no
 * rule is ever re-triggered. A guard that does not hold skips the rule.
 *
 * @module plugin/inference
 */

import { isPresent, matchesAll, ownValue } from "./conditions.js";
import type { PluginDescriptor } from "./descriptor.js";
import type { CommandState, FieldRewrite, InvocationContext } from "./types.js";

export interface InferenceResult {
  state: Record<string, string>;
  /** Indices of the rules whose guards held, in order */
  applied: number[];
}

/**
 * Rewrites a present value. Absent or empty values are left alone.
 */
function rewrite(current: string, change: FieldRewrite): string {
  switch (change.kind) {
    case "replace":
      return change.value;
    case "substitute":
      return current.replace(change.from, change.to);
  }
}

/**
 * Runs every rule whose `when` guard holds: `set` effects first, then
 * `transform` effects.
 *
 * @example
 * ```typescript
 * // - when: { target: "?", object: PANE }
 * //   transform: { target: ".?" }
 * applyInference({ verb: "GO", object: "PANE", target: "?" }, tmux, context).state.target; // ".?"
 * ```
 */
export function applyInference(
  state: CommandState,
  plugin: PluginDescriptor,
  context: InvocationContext
): InferenceResult {
  const next: Record<string, string> = { ...state };
  const applied: number[] = [];

  for (const rule of plugin.inference) {
    if (!matchesAll(rule.when, next, context)) {
      continue;
    }
    for (const [field, value] of rule.set) {
      next[field] = value;
    }
    for (const change of rule.transform) {
      const current = ownValue(next, change.field);
      if (isPresent(current)) {
        next[change.field] = rewrite(current, change);
      }
    }
    applied.push(rule.index);
  }

  return { state: next, applied };
}
