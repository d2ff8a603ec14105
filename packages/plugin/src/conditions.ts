/**
 * Condition interpreter
 *
 * One interpreter evaluates every plugin's `when` guards and `match`
 * predicates. Conditions are compiled once from descriptor data and then
 * evaluated against a command state and an invocation context.
 *
 * @module plugin/conditions
 */

import type { ConditionMap } from "./manifest.js";
import type { CommandState, Condition, InvocationContext } from "./types.js";

/** Prefix of condition keys and template markers that read the context */
export const CONTEXT_PREFIX = "ctx.";

// =============================================================================
// Compilation
// =============================================================================

/**
 * Compiles a condition map. Throws SyntaxError on an invalid `^regex`.
 *
 * @example
 * ```typescript
 * compileConditions({ target: "^\\.", object: "absent", verb: "GO" });
 * // [regex, absent, equals]
 * ```
 */
export function compileConditions(map: ConditionMap): Condition[] {
  return Object.entries(map).map(([key, raw]) => compileCondition(key, raw));
}

function compileCondition(key: string, raw: string | number | boolean | null): Condition {
  if (raw === null || raw === "absent") {
    return { key, test: "absent" };
  }
  if (raw === "present") {
    return { key, test: "present" };
  }
  if (typeof raw === "string" && raw.startsWith("^")) {
    return { key, test: "regex", pattern: new RegExp(raw) };
  }
  return { key, test: "equals", value: String(raw) };
}

// =============================================================================
// Evaluation
// =============================================================================

/**
 * Reads an own property without falling through to Object.prototype.
 */
export function ownValue(
  record: Readonly<Record<string, string | undefined>>,
  key: string
): string | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * A value counts as present when it is set and non-empty.
 */
export function isPresent(value: string | undefined): value is string {
  return value !== undefined && value !== "";
}

/**
 * Reads a context key such as `caller` or `env.TMUX` (without the `ctx.` prefix).
 */
export function contextValue(path: string, context: InvocationContext): string | undefined {
  if (path.startsWith("env.")) {
    return ownValue(context.env, path.slice(4));
  }
  switch (path) {
    case "caller":
      return context.caller;
    case "pane":
      return context.pane;
    case "session":
      return context.session;
    case "cwd":
      return context.cwd;
    default:
      return undefined;
  }
}

/**
 * Reads a condition key from the state, or from the context for `ctx.` keys.
 */
export function readKey(
  key: string,
  state: CommandState,
  context: InvocationContext
): string | undefined {
  if (key.startsWith(CONTEXT_PREFIX)) {
    return contextValue(key.slice(CONTEXT_PREFIX.length), context);
  }
  return ownValue(state, key);
}

export function testCondition(
  condition: Condition,
  state: CommandState,
  context: InvocationContext
): boolean {
  const value = readKey(condition.key, state, context);
  switch (condition.test) {
    case "present":
      return isPresent(value);
    case "absent":
      return !isPresent(value);
    case "equals":
      return value === condition.value;
    case "regex":
      return value !== undefined && condition.pattern.test(value);
  }
}

/**
 * Conjunction of all conditions. An empty list always holds.
 */
export function matchesAll(
  conditions: readonly Condition[],
  state: CommandState,
  context: InvocationContext
): boolean {
  return conditions.every((condition) => testCondition(condition, state, context));
}

/**
 * Renders a condition the way it is written in a descriptor.
 */
export function describeCondition(condition: Condition): string {
  switch (condition.test) {
    case "present":
    case "absent":
      return `${condition.key}: ${condition.test}`;
    case "equals":
      return `${condition.key}: ${condition.value}`;
    case "regex":
      return `${condition.key}: ${condition.pattern.source}`;
  }
}
