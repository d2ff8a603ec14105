// ============================================
// Engine Errors
// ============================================

import { AliError } from "@ali/core";
import { ErrorCode } from "@ali/shared";

import type { CommandState } from "./types.js";

/**
 * Discriminant for every failure the engine can report.
 */
export type ErrorKind =
  | "LoadError"
  | "UnknownVerbError"
  | "GrammarMismatchError"
  | "NoMatchingCommandError"
  | "LookupError"
  | "UnresolvedRequiredFieldError"
  | "TemplateCycleError";

/**
 * What the engine knew when it failed.
 */
export interface EngineErrorDetails {
  verb?: string;
  plugin?: string;
  state?: CommandState;
  cause?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Base class for engine failures.
 *
 * Carries the verb, the candidate plugin and a snapshot of the command
 * state so callers can print an actionable message. Every kind is
 * deterministic: the same input against the same registry fails the same way.
 */
export class EngineError extends AliError {
  readonly kind: ErrorKind;
  readonly verb?: string;
  readonly plugin?: string;
  readonly state?: CommandState;

  constructor(kind: ErrorKind, message: string, code: ErrorCode, details: EngineErrorDetails = {}) {
    super(message, code, { cause: details.cause, context: details.context });
    this.name = kind;
    this.kind = kind;
    this.verb = details.verb;
    this.plugin = details.plugin;
    this.state = details.state;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      kind: this.kind,
      verb: this.verb,
      plugin: this.plugin,
      state: this.state,
    };
  }
}

/**
 * Malformed descriptors or conflicting declarations. No registry is built.
 */
export class LoadError extends EngineError {
  readonly source?: string;

  constructor(message: string, details: EngineErrorDetails & { source?: string } = {}) {
    super("LoadError", message, ErrorCode.PLUGIN_LOAD_FAILED, details);
    this.source = details.source;
  }
}

export class UnknownVerbError extends EngineError {
  readonly available: readonly string[];
  /** Plugins serving the verb whose environment requirements are unmet */
  readonly unavailable: readonly string[];

  constructor(verb: string, available: readonly string[], unavailable: readonly string[] = []) {
    let message: string;
    if (verb === "") {
      message = "No verb given";
    } else if (unavailable.length > 0) {
      message = `Verb '${verb}' is not available here: ${unavailable.join(", ")} missing required environment`;
    } else {
      message = `Unknown verb '${verb}'. Available: ${available.length > 0 ? available.join(", ") : "(none)"}`;
    }
    super("UnknownVerbError", message, ErrorCode.UNKNOWN_VERB, { verb });
    this.available = available;
    this.unavailable = unavailable;
  }
}

/**
 * Tokens no grammar field accepted, under strict mode.
 */
export class GrammarMismatchError extends EngineError {
  readonly leftover: readonly string[];

  constructor(leftover: readonly string[], details: EngineErrorDetails) {
    super(
      "GrammarMismatchError",
      `Unrecognized token${leftover.length === 1 ? "" : "s"} for ${details.plugin ?? "plugin"}: ${leftover.join(" ")}`,
      ErrorCode.GRAMMAR_MISMATCH,
      details
    );
    this.leftover = leftover;
  }
}

export class NoMatchingCommandError extends EngineError {
  constructor(details: EngineErrorDetails) {
    super(
      "NoMatchingCommandError",
      `No command of ${details.plugin ?? "plugin"} matches ${formatState(details.state)}`,
      ErrorCode.NO_MATCHING_COMMAND,
      details
    );
  }
}

/**
 * A lookup table has no entry for the field's value and no default.
 */
export class LookupError extends EngineError {
  readonly field: string;
  readonly value: string;
  readonly keys: readonly string[];

  constructor(field: string, value: string, keys: readonly string[], details: EngineErrorDetails) {
    super(
      "LookupError",
      `No entry for ${field}='${value}' (expected one of: ${keys.join(", ")})`,
      ErrorCode.LOOKUP_FAILED,
      details
    );
    this.field = field;
    this.value = value;
    this.keys = keys;
  }
}

export class UnresolvedRequiredFieldError extends EngineError {
  readonly field: string;

  constructor(field: string, reason: string, details: EngineErrorDetails) {
    super(
      "UnresolvedRequiredFieldError",
      `Cannot resolve '{${field}}': ${reason}`,
      ErrorCode.UNRESOLVED_REQUIRED_FIELD,
      details
    );
    this.field = field;
  }
}

export class TemplateCycleError extends EngineError {
  readonly chain: readonly string[];

  constructor(message: string, chain: readonly string[], details: EngineErrorDetails) {
    super("TemplateCycleError", message, ErrorCode.TEMPLATE_CYCLE, details);
    this.chain = chain;
  }
}

/**
 * Type guard for engine failures.
 */
export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

function formatState(state: CommandState | undefined): string {
  if (!state) {
    return "{}";
  }
  const pairs = Object.entries(state).map(([key, value]) => `${key}=${value}`);
  return `{${pairs.join(", ")}}`;
}
