/**
 * Runtime types shared by the registry, router and template resolver.
 *
 * @module plugin/types
 */

import type { FieldTransform, SelectorKind } from "./manifest.js";

// =============================================================================
// State and context
// =============================================================================

/**
 * Field name -> value. Always contains `verb` once routing has begun.
 */
export type CommandState = Readonly<Record<string, string>>;

/**
 * Signals about the caller, supplied by the host process.
 */
export interface InvocationContext {
  /** Environment variables visible to the caller */
  env: Readonly<Record<string, string | undefined>>;
  /** Who is asking, e.g. "cli" or "tmux" */
  caller?: string;
  /** Active multiplexer pane id */
  pane?: string;
  /** Active multiplexer session id */
  session?: string;
  cwd?: string;
}

export const EMPTY_CONTEXT: InvocationContext = Object.freeze({ env: Object.freeze({}) });

// =============================================================================
// Grammar
// =============================================================================

interface FieldBase {
  name: string;
  transform?: FieldTransform;
  description?: string;
}

export interface StringField extends FieldBase {
  kind: "string";
}

export interface ValuesField extends FieldBase {
  kind: "values";
  values: readonly string[];
}

export interface PatternField extends FieldBase {
  kind: "pattern";
  pattern: RegExp;
}

export type GrammarField = StringField | ValuesField | PatternField;

// =============================================================================
// Conditions
// =============================================================================

export type Condition =
  | { key: string; test: "present" }
  | { key: string; test: "absent" }
  | { key: string; test: "equals"; value: string }
  | { key: string; test: "regex"; pattern: RegExp };

// =============================================================================
// Inference and commands
// =============================================================================

export type FieldRewrite =
  | { field: string; kind: "replace"; value: string }
  | { field: string; kind: "substitute"; from: RegExp; to: string };

export interface InferenceRule {
  /** Position in the descriptor, for tracing */
  index: number;
  when: readonly Condition[];
  set: readonly (readonly [field: string, value: string])[];
  transform: readonly FieldRewrite[];
  description?: string;
}

export interface CommandSpec {
  index: number;
  match: readonly Condition[];
  exec: string;
  description?: string;
}

export interface SelectorSpec {
  token: string;
  kind: SelectorKind;
  exec: string;
  description?: string;
  /** Name of the declaring plugin */
  plugin: string;
}
