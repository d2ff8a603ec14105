/**
 * Router
 *
 * Drives one invocation from tokens to a matched command:
 * verb resolution, candidate selection, grammar parsing, inference,
 * selector check and command matching. Template expansion is left to the
 * caller. Pure: the same tokens against the same registry give the same result.
 *
 * @module plugin/router
 */

import { createSilentLogger, type Logger } from "@ali/core";

import { matchesAll } from "./conditions.js";
import type { PluginDescriptor } from "./descriptor.js";
import { NoMatchingCommandError, UnknownVerbError } from "./errors.js";
import { parseTokens } from "./grammar.js";
import { applyInference } from "./inference.js";
import type { Registry } from "./registry.js";
import {
  type CommandSpec,
  type CommandState,
  EMPTY_CONTEXT,
  type InvocationContext,
  type SelectorSpec,
} from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type RouteStage =
  | "VerbResolved"
  | "PluginSelected"
  | "StateParsed"
  | "StateInferred"
  | "SelectorResolved"
  | "CommandMatched"
  | "TemplateExpanded";

export interface StageEvent {
  stage: RouteStage;
  detail: Record<string, unknown>;
}

export type StageListener = (event: StageEvent) => void;

/**
 * Why a candidate was chosen:
 * - `only`: the verb has a single candidate
 * - `pattern`: the first token with an owned prefix belongs to a candidate
 * - `first-declared`: fallback to declaration order
 */
export type SelectionReason = "only" | "pattern" | "first-declared";

export interface CandidateSelection {
  plugin: PluginDescriptor;
  reason: SelectionReason;
  /** Token whose prefix decided, for `pattern` */
  marker?: string;
}

export type RouteTarget =
  | { kind: "command"; command: CommandSpec }
  | { kind: "selector"; selector: SelectorSpec; field: string };

export interface RouteResult {
  verb: string;
  plugin: PluginDescriptor;
  selection: CandidateSelection;
  state: CommandState;
  leftover: readonly string[];
  warnings: readonly string[];
  /** Indices of the inference rules that fired */
  inferred: readonly number[];
  target: RouteTarget;
}

export interface RouterOptions {
  /** Leftover tokens are fatal for every plugin */
  strict?: boolean;
  logger?: Logger;
}

// =============================================================================
// Candidate policy
// =============================================================================

/**
 * Picks one plugin among the candidates for a verb.
 *
 * The first token starting with an owned syntax prefix decides when its
 * owner is a candidate; otherwise the first declared candidate wins.
 * Returns undefined only for an empty candidate list.
 */
export function selectCandidate(
  candidates: readonly PluginDescriptor[],
  tokens: readonly string[],
  registry: Registry
): CandidateSelection | undefined {
  const [first] = candidates;
  if (!first) {
    return undefined;
  }
  if (candidates.length === 1) {
    return { plugin: first, reason: "only" };
  }

  for (const token of tokens) {
    const owner = registry.ownerOfToken(token);
    if (!owner) continue;
    if (candidates.includes(owner)) {
      return { plugin: owner, reason: "pattern", marker: token };
    }
    break;
  }

  return { plugin: first, reason: "first-declared" };
}

// =============================================================================
// Router
// =============================================================================

export class Router {
  private readonly strict: boolean;
  private readonly logger: Logger;

  constructor(
    private readonly registry: Registry,
    options: RouterOptions = {}
  ) {
    this.strict = options.strict ?? false;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "router" });
  }

  /**
   * Routes tokens (verb first) to a command or action selector.
   *
   * @throws UnknownVerbError, GrammarMismatchError or NoMatchingCommandError
   */
  route(
    tokens: readonly string[],
    context: InvocationContext = EMPTY_CONTEXT,
    listener?: StageListener
  ): RouteResult {
    const emit = (stage: RouteStage, detail: Record<string, unknown>): void => {
      this.logger.debug(stage, detail);
      listener?.({ stage, detail });
    };

    const [head, ...rest] = tokens;
    const verb = head === undefined ? undefined : this.registry.resolveVerb(head);
    if (verb === undefined) {
      throw new UnknownVerbError(head?.toUpperCase() ?? "", this.registry.verbNames());
    }
    emit("VerbResolved", { token: head, verb });

    const candidates = this.registry.pluginsForVerb(verb, context);
    const selection = selectCandidate(candidates, rest, this.registry);
    if (!selection) {
      const blocked = this.registry.plugins
        .filter((plugin) => plugin.verbs.includes(verb))
        .map((plugin) => plugin.name);
      throw new UnknownVerbError(verb, this.registry.verbNames(), blocked);
    }
    const plugin = selection.plugin;
    emit("PluginSelected", {
      plugin: plugin.name,
      reason: selection.reason,
      candidates: candidates.map((candidate) => candidate.name),
    });

    const parsed = parseTokens(verb, rest, plugin, { strict: this.strict });
    for (const warning of parsed.warnings) {
      this.logger.warn(warning);
    }
    emit("StateParsed", { state: { ...parsed.state }, leftover: parsed.leftover });

    const inferred = applyInference(parsed.state, plugin, context);
    const state: CommandState = Object.freeze(inferred.state);
    emit("StateInferred", { state: { ...state }, rules: inferred.applied });

    const base = {
      verb,
      plugin,
      selection,
      state,
      leftover: parsed.leftover,
      warnings: parsed.warnings,
      inferred: inferred.applied,
    };

    for (const [field, value] of Object.entries(state)) {
      if (field === "verb") continue;
      const selector = this.registry.selectorFor(value, plugin, context);
      if (selector?.kind === "action") {
        emit("SelectorResolved", { field, token: selector.token, plugin: selector.plugin });
        return { ...base, target: { kind: "selector", selector, field } };
      }
    }

    const command = plugin.commands.find((candidate) => matchesAll(candidate.match, state, context));
    if (!command) {
      throw new NoMatchingCommandError({ verb, plugin: plugin.name, state });
    }
    emit("CommandMatched", { index: command.index, exec: command.exec });

    return { ...base, target: { kind: "command", command } };
  }
}
