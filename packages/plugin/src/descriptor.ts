/**
 * Plugin descriptor
 *
 * Turns validated descriptor data into the immutable runtime form used by
 * the registry: verbs upper-cased, grammar fields ordered and compiled,
 * conditions compiled, services and selectors indexed.
 *
 * @module plugin/descriptor
 */

import { compileConditions } from "./conditions.js";
import { LoadError } from "./errors.js";
import { applyTransform } from "./grammar.js";
import {
  formatIssues,
  type GrammarFieldManifest,
  type PluginManifest,
  safeParsePluginManifest,
} from "./manifest.js";
import type {
  CommandSpec,
  FieldRewrite,
  GrammarField,
  InferenceRule,
  SelectorSpec,
} from "./types.js";

/** Services whose names start with this prefix are not exported */
export const INTERNAL_SERVICE_PREFIX = "_";

/**
 * Summary of a descriptor for listings and JSON output.
 */
export interface PluginSummary {
  name: string;
  version: string;
  description?: string;
  source?: string;
  strict: boolean;
  provides: readonly string[];
  requires: readonly string[];
  patterns: readonly string[];
  verbs: readonly string[];
  services: readonly string[];
}

/**
 * Immutable, normalised plugin definition.
 *
 * Construct with {@link PluginDescriptor.parse}, which validates raw data
 * (e.g. a parsed plugin.yaml) and throws {@link LoadError} on any problem.
 *
 * @example
 * ```typescript
 * const tmux = PluginDescriptor.parse({
 *   name: "tmux",
 *   vocabulary: { verbs: ["split"] },
 *   commands: [{ match: { verb: "SPLIT" }, exec: "tmux split-window" }],
 * });
 * tmux.verbs; // ["SPLIT"]
 * ```
 */
export class PluginDescriptor {
  readonly name: string;
  readonly version: string;
  readonly description?: string;
  /** File the descriptor was read from, when loaded from disk */
  readonly source?: string;
  readonly strict: boolean;
  readonly provides: readonly string[];
  readonly requires: readonly string[];
  readonly patterns: readonly string[];
  readonly verbs: readonly string[];
  readonly aliases: ReadonlyMap<string, string>;
  readonly objects: readonly string[];
  readonly grammar: readonly GrammarField[];
  readonly inference: readonly InferenceRule[];
  readonly commands: readonly CommandSpec[];
  readonly services: ReadonlyMap<string, string>;
  readonly selectors: ReadonlyMap<string, SelectorSpec>;
  readonly requiresEnv: readonly string[];

  private constructor(manifest: PluginManifest, source?: string) {
    const compile = <T>(where: string, build: () => T): T => {
      try {
        return build();
      } catch (error) {
        if (error instanceof SyntaxError) {
          throw new LoadError(`Invalid regular expression in ${where}: ${error.message}`, {
            plugin: manifest.name,
            source,
            cause: error,
          });
        }
        throw error;
      }
    };

    this.name = manifest.name;
    this.version = manifest.version;
    this.description = manifest.description;
    this.source = source;
    this.strict = manifest.strict;
    this.provides = deepFreeze(unique(manifest.provides));
    this.requires = deepFreeze(unique(manifest.requires));
    this.patterns = deepFreeze(unique(manifest.patterns));
    this.requiresEnv = deepFreeze(unique(manifest.context.requires_env));

    const vocabulary = manifest.vocabulary;
    this.verbs = deepFreeze(unique(vocabulary.verbs.map(upper)));
    this.objects = deepFreeze(unique(vocabulary.objects.map(upper)));

    const aliases = new Map<string, string>();
    for (const [alias, verb] of Object.entries(vocabulary.aliases)) {
      const canonical = upper(verb);
      if (!this.verbs.includes(canonical)) {
        throw new LoadError(`Alias '${upper(alias)}' points to undeclared verb '${canonical}'`, {
          plugin: manifest.name,
          source,
        });
      }
      aliases.set(upper(alias), canonical);
    }
    this.aliases = aliases;

    this.grammar = deepFreeze(
      Object.entries(manifest.grammar).map(([name, field]) =>
        compile(`grammar field '${name}'`, () => toGrammarField(name, field, this.objects))
      )
    );

    this.inference = deepFreeze(
      manifest.inference.map((rule, index): InferenceRule => {
        const when = compile(`inference rule ${index + 1}`, () => compileConditions(rule.when));
        const transform = Object.entries(rule.transform ?? {}).map(
          ([field, rewrite]): FieldRewrite =>
            typeof rewrite === "string"
              ? { field, kind: "replace", value: rewrite }
              : {
                  field,
                  kind: "substitute",
                  from: compile(`inference rule ${index + 1}`, () => new RegExp(rewrite.from, "g")),
                  to: rewrite.to,
                }
        );
        return {
          index,
          when,
          set: Object.entries(rule.set ?? {}),
          transform,
          description: rule.description,
        };
      })
    );

    this.commands = deepFreeze(
      manifest.commands.map(
        (command, index): CommandSpec => ({
          index,
          match: compile(`command ${index + 1}`, () => compileConditions(command.match)),
          exec: command.exec,
          description: command.description,
        })
      )
    );

    this.services = new Map(Object.entries(manifest.services));

    this.selectors = new Map(
      Object.entries(manifest.selectors).map(([token, selector]): [string, SelectorSpec] => [
        token,
        deepFreeze({ token, plugin: manifest.name, ...selector }),
      ])
    );

    const selfRequired = this.requires.filter((capability) => this.provides.includes(capability));
    if (selfRequired.length > 0) {
      throw new LoadError(
        `Plugin '${manifest.name}' requires capabilities it provides itself: ${selfRequired.join(", ")}`,
        { plugin: manifest.name, source }
      );
    }

    Object.freeze(this);
  }

  /**
   * Validates raw descriptor data and builds the runtime descriptor.
   *
   * @param data - Parsed descriptor, e.g. the result of loading plugin.yaml
   * @param source - Where the data came from, for error messages
   * @throws LoadError on schema violations or invalid regular expressions
   */
  static parse(data: unknown, source?: string): PluginDescriptor {
    const result = safeParsePluginManifest(data);
    if (!result.success) {
      const where = source ? ` (${source})` : "";
      throw new LoadError(`Invalid plugin descriptor${where}: ${formatIssues(result.error)}`, {
        source,
        cause: result.error,
      });
    }
    return new PluginDescriptor(result.data, source);
  }

  /**
   * Whether a service is private to this plugin.
   */
  static isInternalService(name: string): boolean {
    return name.startsWith(INTERNAL_SERVICE_PREFIX);
  }

  /**
   * Service names other plugins may reference.
   */
  exportedServices(): string[] {
    return [...this.services.keys()].filter((name) => !PluginDescriptor.isInternalService(name));
  }

  summary(): PluginSummary {
    return {
      name: this.name,
      version: this.version,
      description: this.description,
      source: this.source,
      strict: this.strict,
      provides: this.provides,
      requires: this.requires,
      patterns: this.patterns,
      verbs: this.verbs,
      services: this.exportedServices(),
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function upper(value: string): string {
  return value.toUpperCase();
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

/**
 * `values` fields without their own list accept the vocabulary objects,
 * upper-cased unless the field names its own transform.
 */
function toGrammarField(
  name: string,
  field: GrammarFieldManifest,
  objects: readonly string[]
): GrammarField {
  const base = { name, transform: field.transform, description: field.description };
  switch (field.type) {
    case "string":
      return { ...base, kind: "string" };
    case "values": {
      if (field.values === undefined) {
        const transform = field.transform ?? "upper";
        return {
          ...base,
          kind: "values",
          values: objects.map((value) => applyTransform(value, transform)),
          transform,
        };
      }
      const values = field.values.map((value) => applyTransform(value, field.transform));
      return { ...base, kind: "values", values };
    }
    case "pattern":
      return { ...base, kind: "pattern", pattern: new RegExp(`^(?:${field.pattern ?? ""})`) };
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

/**
 * Freezes arrays and plain objects recursively. RegExp instances are left
 * writable: `replace` with a global pattern resets `lastIndex`.
 */
function deepFreeze<T>(value: T): T {
  if (Array.isArray(value) || isPlainObject(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
