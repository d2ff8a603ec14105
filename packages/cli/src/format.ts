/**
 * Human-readable output for the ali CLI.
 *
 * @module cli/format
 */

import type { ConfigError } from "@ali/core";
import {
  type Composition,
  type EngineError,
  type Explanation,
  LoadError,
  type PluginSummary,
  type StageEvent,
  type VerbListing,
} from "@ali/plugin";
import type { ChalkInstance } from "chalk";

function list(values: readonly string[]): string {
  return values.length > 0 ? values.join(", ") : "-";
}

/**
 * Format an engine failure for stderr.
 */
export function formatEngineError(error: EngineError, paint: ChalkInstance): string {
  const lines = [`${paint.red.bold(`error[${error.kind}]`)}: ${error.message}`];

  if (error instanceof LoadError && error.source) {
    lines.push(`  ${paint.dim("source:")} ${error.source}`);
  } else if (error.plugin) {
    lines.push(`  ${paint.dim("plugin:")} ${error.plugin}`);
  }

  return lines.join("\n");
}

export function formatConfigError(error: ConfigError, paint: ChalkInstance): string {
  const location = error.path ? ` ${paint.dim(`(${error.path})`)}` : "";
  return `${paint.red.bold("config error")}: ${error.message}${location}`;
}

export function formatUsageError(message: string, paint: ChalkInstance): string {
  return `${paint.red.bold("usage error")}: ${message}`;
}

/**
 * JSON shape printed by `--json` for a composed command.
 */
export function compositionJson(composition: Composition): Record<string, unknown> {
  const { route } = composition;
  return {
    ok: true,
    output: composition.output,
    template: composition.template,
    verb: route.verb,
    plugin: route.plugin.name,
    state: route.state,
    warnings: route.warnings,
  };
}

function formatStage(event: StageEvent, index: number, paint: ChalkInstance): string {
  return `${paint.dim(`${index + 1}.`)} ${paint.cyan(event.stage)} ${JSON.stringify(event.detail)}`;
}

/**
 * One line per stage reached, then the output or the failure.
 *
 * @example
 * ```
 * 1. VerbResolved {"token":"GO","verb":"GO"}
 * ...
 * => tmux select-pane -t .2
 * ```
 */
export function formatExplanation(explanation: Explanation, paint: ChalkInstance): string {
  const lines = explanation.stages.map((event, index) => formatStage(event, index, paint));

  if (explanation.error) {
    lines.push(formatEngineError(explanation.error, paint));
  } else if (explanation.output !== undefined) {
    lines.push(`${paint.green("=>")} ${explanation.output}`);
  }

  return lines.join("\n");
}

export function formatPlugins(plugins: readonly PluginSummary[], paint: ChalkInstance): string {
  if (plugins.length === 0) {
    return paint.gray("No plugins loaded");
  }

  return plugins
    .map((plugin) => {
      const header = `${paint.bold(plugin.name)} ${paint.dim(plugin.version)}${
        plugin.description ? `  ${plugin.description}` : ""
      }`;
      const lines = [
        header,
        `  verbs:    ${list(plugin.verbs)}`,
        `  provides: ${list(plugin.provides)}`,
        `  requires: ${list(plugin.requires)}`,
        `  patterns: ${list(plugin.patterns)}`,
      ];
      if (plugin.source) {
        lines.push(`  source:   ${paint.blue(plugin.source)}`);
      }
      return lines.join("\n");
    })
    .join("\n\n");
}

export function formatVerbs(verbs: readonly VerbListing[], paint: ChalkInstance): string {
  if (verbs.length === 0) {
    return paint.gray("No verbs available");
  }

  const width = Math.max(...verbs.map((entry) => entry.verb.length));
  return verbs
    .map((entry) => {
      const aliases = entry.aliases.length > 0 ? paint.dim(` (aliases: ${entry.aliases.join(", ")})`) : "";
      return `${paint.bold(entry.verb.padEnd(width))}  ${entry.plugins.join(", ")}${aliases}`;
    })
    .join("\n");
}
