import { createSilentLogger, Logger, type LogEntry, type LogTransport } from "@ali/core";

import type { PluginManifestInput } from "../manifest.js";
import type { PluginDescriptor } from "../descriptor.js";
import { Registry } from "../registry.js";
import type { InvocationContext } from "../types.js";

// =============================================================================
// Descriptors
// =============================================================================

export const tmuxPlugin = {
  name: "tmux",
  version: "1.0.0",
  description: "Terminal multiplexer control",
  provides: ["pane", "window"],
  patterns: [".", ":"],
  vocabulary: {
    verbs: ["SPLIT", "GO", "close"],
    aliases: { jump: "go" },
    objects: ["pane", "WINDOW"],
  },
  grammar: {
    object: { type: "values" },
    direction: { type: "values", values: ["left", "right"], transform: "lower" },
    target: { type: "pattern", pattern: "[.:?]" },
  },
  inference: [
    { when: { target: "^\\.", object: "absent" }, set: { object: "PANE" } },
    { when: { target: "^:", object: "absent" }, set: { object: "WINDOW" } },
    { when: { target: "?", object: "PANE" }, transform: { target: ".?" } },
  ],
  commands: [
    { match: { verb: "SPLIT" }, exec: "tmux split-window {direction[left:-h -b,right:-h]}" },
    { match: { verb: "GO", object: "WINDOW" }, exec: "tmux select-window -t {target!}" },
    { match: { verb: "GO", object: "PANE" }, exec: "tmux select-pane -t {target!}" },
    { match: { verb: "CLOSE" }, exec: "tmux kill-pane{?target: -t {target}}" },
  ],
  services: {
    split: "tmux split-window {direction[left:-h -b,right:-h,default:-h]}",
    popup: "tmux display-popup {_flags} -E",
    _flags: "-w 80%",
  },
  selectors: {
    ".?": { kind: "action", exec: "tmux display-panes -d 2000" },
  },
} satisfies PluginManifestInput;

export const brootPlugin = {
  name: "broot",
  version: "1.0.0",
  provides: ["file_selector"],
  requires: ["pane"],
  patterns: ["@"],
  vocabulary: { verbs: ["BROWSE"] },
  grammar: {
    direction: { type: "values", values: ["left", "right"], transform: "lower" },
  },
  commands: [{ match: { verb: "BROWSE" }, exec: "{split} 'broot'" }],
  services: { _conf: "~/.config/broot/select.hjson" },
  selectors: {
    "@?": { kind: "stream", exec: "broot --conf {_conf}" },
  },
} satisfies PluginManifestInput;

export const editorPlugin = {
  name: "editor",
  version: "1.0.0",
  vocabulary: { verbs: ["EDIT"] },
  grammar: { file: { type: "string" } },
  commands: [{ match: { verb: "EDIT" }, exec: "$EDITOR {file!}" }],
} satisfies PluginManifestInput;

// =============================================================================
// Helpers
// =============================================================================

export function context(env: Record<string, string> = {}, extra: Partial<InvocationContext> = {}): InvocationContext {
  return { env, ...extra };
}

export function createRegistry(...descriptors: unknown[]): Registry {
  return Registry.load(descriptors, { logger: createSilentLogger() });
}

export function pluginOf(registry: Registry, name: string): PluginDescriptor {
  const plugin = registry.get(name);
  if (!plugin) {
    throw new Error(`Plugin '${name}' is not loaded`);
  }
  return plugin;
}

/**
 * Logger capturing every entry, for asserting warnings.
 */
export function createCapturingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const transport: LogTransport = {
    log(entry: LogEntry) {
      entries.push(entry);
    },
  };
  return { logger: new Logger({ level: "trace", transports: [transport] }), entries };
}
