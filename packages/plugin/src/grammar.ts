/**
 * Grammar Parser
 *
 * Maps the tokens after the verb onto a plugin's ordered grammar fields in
 * a single forward pass. For each token the fields from the cursor onward
 * are tried in declared order; the first field that accepts the token
 * claims it and the cursor moves past that field. Skipped fields stay unset
 * and are never revisited. There is no backtracking.
 *
 * @module plugin/grammar
 */

import type { FieldTransform } from "./manifest.js";
import type { PluginDescriptor } from "./descriptor.js";
import { GrammarMismatchError } from "./errors.js";
import { isPresent, ownValue } from "./conditions.js";
import type { GrammarField } from "./types.js";

export interface ParseOptions {
  /** Treat leftover tokens as fatal even when the plugin is not strict */
  strict?: boolean;
}

export interface ParseResult {
  /** Partial state, always containing `verb` */
  state: Record<string, string>;
  /** Tokens no field accepted, in input order */
  leftover: string[];
  warnings: string[];
}

export function applyTransform(value: string, transform: FieldTransform | undefined): string {
  switch (transform) {
    case "lower":
      return value.toLowerCase();
    case "upper":
      return value.toUpperCase();
    default:
      return value;
  }
}

/**
 * Returns the value a field would store for a token, or undefined when the
 * field rejects it. The transform is applied before matching `values`;
 * `pattern` fields test the raw token.
 */
export function acceptToken(field: GrammarField, token: string): string | undefined {
  switch (field.kind) {
    case "string":
      return applyTransform(token, field.transform);
    case "values": {
      const value = applyTransform(token, field.transform);
      return field.values.includes(value) ? value : undefined;
    }
    case "pattern":
      return field.pattern.test(token) ? applyTransform(token, field.transform) : undefined;
  }
}

/**
 * Parses tokens against a plugin's grammar.
 *
 * Leftover tokens throw {@link GrammarMismatchError} under strict mode;
 * otherwise they produce a warning and are joined into the `args` field.
 *
 * @example
 * ```typescript
 * // grammar: direction: { type: values, values: [left, right], transform: lower }
 * parseTokens("SPLIT", ["LEFT"], tmux).state; // { verb: "SPLIT", direction: "left" }
 * ```
 */
export function parseTokens(
  verb: string,
  tokens: readonly string[],
  plugin: PluginDescriptor,
  options: ParseOptions = {}
): ParseResult {
  const state: Record<string, string> = { verb };
  const leftover: string[] = [];
  let cursor = 0;

  for (const token of tokens) {
    let claimed = false;
    for (let index = cursor; index < plugin.grammar.length; index++) {
      const field = plugin.grammar[index];
      if (!field) continue;
      const value = acceptToken(field, token);
      if (value !== undefined) {
        state[field.name] = value;
        cursor = index + 1;
        claimed = true;
        break;
      }
    }
    if (!claimed) {
      leftover.push(token);
    }
  }

  const warnings: string[] = [];
  if (leftover.length > 0) {
    if (options.strict || plugin.strict) {
      throw new GrammarMismatchError(leftover, { verb, plugin: plugin.name, state: { ...state } });
    }
    warnings.push(describeLeftover(plugin.name, leftover));
    const joined = leftover.join(" ");
    const existing = ownValue(state, "args");
    state.args = isPresent(existing) ? `${existing} ${joined}` : joined;
  }

  return { state, leftover, warnings };
}

export function describeLeftover(plugin: string, leftover: readonly string[]): string {
  return `Unrecognized token${leftover.length === 1 ? "" : "s"} for ${plugin}: ${leftover.join(" ")}`;
}
