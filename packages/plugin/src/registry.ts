/**
 * Plugin Registry
 *
 * Immutable collection of plugin descriptors, built once and passed
 * explicitly to the router and template resolver. Indexes verbs, aliases,
 * exported services, capabilities, owned syntax prefixes and selectors.
 *
 * Ties are always broken by declaration order: the descriptor listed first wins.
 *
 * @module plugin/registry
 */

import { createSilentLogger, type Logger } from "@ali/core";

import { isPresent, ownValue } from "./conditions.js";
import { PluginDescriptor } from "./descriptor.js";
import { LoadError } from "./errors.js";
import { EMPTY_CONTEXT, type InvocationContext, type SelectorSpec } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface RegistryOptions {
  /** Receives warnings about unmet requirements and alias conflicts */
  logger?: Logger;
}

/**
 * A service template together with the plugin that declares it.
 */
export interface ServiceBinding {
  plugin: PluginDescriptor;
  name: string;
  template: string;
}

export interface VerbListing {
  verb: string;
  plugins: string[];
  aliases: string[];
}

// =============================================================================
// Registry
// =============================================================================

export class Registry {
  /** Descriptors in declaration order */
  readonly plugins: readonly PluginDescriptor[];

  private readonly byName = new Map<string, PluginDescriptor>();
  private readonly verbIndex = new Map<string, PluginDescriptor[]>();
  private readonly aliasIndex = new Map<string, string>();
  private readonly serviceIndex = new Map<string, PluginDescriptor>();
  private readonly capabilityIndex = new Map<string, PluginDescriptor>();
  private readonly patternIndex = new Map<string, PluginDescriptor>();
  /** Selector token -> declaring plugins' selectors, declaration order */
  private readonly selectorIndex = new Map<string, SelectorSpec[]>();

  private constructor(plugins: readonly PluginDescriptor[], logger: Logger) {
    this.plugins = Object.freeze([...plugins]);

    for (const plugin of plugins) {
      if (this.byName.has(plugin.name)) {
        throw new LoadError(`Duplicate plugin name '${plugin.name}'`, {
          plugin: plugin.name,
          source: plugin.source,
        });
      }
      this.byName.set(plugin.name, plugin);

      for (const prefix of plugin.patterns) {
        const owner = this.patternIndex.get(prefix);
        if (owner) {
          throw new LoadError(
            `Pattern '${prefix}' is claimed by both '${owner.name}' and '${plugin.name}'`,
            { plugin: plugin.name, source: plugin.source }
          );
        }
        this.patternIndex.set(prefix, plugin);
      }

      for (const verb of plugin.verbs) {
        const candidates = this.verbIndex.get(verb);
        if (candidates) {
          candidates.push(plugin);
        } else {
          this.verbIndex.set(verb, [plugin]);
        }
      }

      for (const [alias, verb] of plugin.aliases) {
        const existing = this.aliasIndex.get(alias);
        if (existing === undefined) {
          this.aliasIndex.set(alias, verb);
        } else if (existing !== verb) {
          logger.warn(`Alias '${alias}' already maps to '${existing}'; ignoring '${verb}' from ${plugin.name}`);
        }
      }

      for (const name of plugin.exportedServices()) {
        if (!this.serviceIndex.has(name)) {
          this.serviceIndex.set(name, plugin);
        }
      }

      for (const capability of plugin.provides) {
        if (!this.capabilityIndex.has(capability)) {
          this.capabilityIndex.set(capability, plugin);
        }
      }

      for (const [token, selector] of plugin.selectors) {
        this.selectorIndex.set(token, [...(this.selectorIndex.get(token) ?? []), selector]);
      }
    }

    for (const plugin of plugins) {
      for (const capability of plugin.requires) {
        if (!this.capabilityIndex.has(capability) && !this.serviceIndex.has(capability)) {
          logger.warn(`Plugin '${plugin.name}' requires '${capability}', which no plugin provides`);
        }
      }
    }

    Object.freeze(this);
  }

  /**
   * Builds a registry from descriptors.
   *
   * Accepts runtime descriptors or raw descriptor data, which is validated.
   * Fails as a whole: no partial registry is ever returned.
   *
   * @throws LoadError on malformed descriptors, duplicate names, contested
   * pattern prefixes, self-required capabilities or invalid regular expressions
   */
  static load(descriptors: readonly unknown[], options: RegistryOptions = {}): Registry {
    const logger = options.logger ?? createSilentLogger();
    const plugins = descriptors.map((descriptor) =>
      descriptor instanceof PluginDescriptor ? descriptor : PluginDescriptor.parse(descriptor)
    );
    const registry = new Registry(plugins, logger);
    logger.debug("Registry loaded", {
      plugins: plugins.map((plugin) => plugin.name),
      verbs: registry.verbIndex.size,
    });
    return registry;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  get(name: string): PluginDescriptor | undefined {
    return this.byName.get(name);
  }

  /**
   * Canonical verb for a token: exact verb first, then alias. Case-insensitive.
   */
  resolveVerb(token: string): string | undefined {
    const key = token.toUpperCase();
    if (this.verbIndex.has(key)) {
      return key;
    }
    return this.aliasIndex.get(key);
  }

  /**
   * Plugins serving a verb, in declaration order, without those whose
   * required environment variables are missing from the context.
   */
  pluginsForVerb(verb: string, context: InvocationContext = EMPTY_CONTEXT): PluginDescriptor[] {
    const candidates = this.verbIndex.get(verb) ?? [];
    return candidates.filter((plugin) => Registry.environmentSatisfied(plugin, context));
  }

  /**
   * First declared plugin exporting a service template of that name, else
   * the first declared plugin providing a capability of that name.
   */
  providerFor(serviceName: string): PluginDescriptor | undefined {
    return this.serviceIndex.get(serviceName) ?? this.capabilityIndex.get(serviceName);
  }

  /**
   * Looks up a service template: the requesting plugin's own services
   * (internal ones included) first, then the exported service of the provider.
   */
  serviceFor(name: string, from?: PluginDescriptor): ServiceBinding | undefined {
    const own = from?.services.get(name);
    if (from && own !== undefined) {
      return { plugin: from, name, template: own };
    }
    if (PluginDescriptor.isInternalService(name)) {
      return undefined;
    }
    const provider = this.serviceIndex.get(name);
    const template = provider?.services.get(name);
    if (!provider || template === undefined) {
      return undefined;
    }
    return { plugin: provider, name, template };
  }

  ownerOfPattern(prefix: string): PluginDescriptor | undefined {
    return this.patternIndex.get(prefix);
  }

  /**
   * Owner of the longest owned prefix the token starts with.
   */
  ownerOfToken(token: string): PluginDescriptor | undefined {
    let best: { prefix: string; owner: PluginDescriptor } | undefined;
    for (const [prefix, owner] of this.patternIndex) {
      if (token.startsWith(prefix) && (!best || prefix.length > best.prefix.length)) {
        best = { prefix, owner };
      }
    }
    return best?.owner;
  }

  /**
   * Selector for a token: from the preferred plugin, else from the owner of
   * the token's prefix, else from the first declaring plugin. With a
   * context, the fallbacks skip plugins whose `requires_env` it does not
   * satisfy.
   */
  selectorFor(
    token: string,
    preferred?: PluginDescriptor,
    context?: InvocationContext
  ): SelectorSpec | undefined {
    const usable = (plugin: PluginDescriptor | undefined): plugin is PluginDescriptor =>
      plugin !== undefined && (context === undefined || Registry.environmentSatisfied(plugin, context));

    const own = preferred?.selectors.get(token);
    if (own) {
      return own;
    }

    const owner = this.ownerOfToken(token);
    const owned = usable(owner) ? owner.selectors.get(token) : undefined;
    if (owned) {
      return owned;
    }

    return this.selectorIndex.get(token)?.find((selector) => usable(this.byName.get(selector.plugin)));
  }

  /**
   * Verb names, sorted.
   */
  verbNames(): string[] {
    return [...this.verbIndex.keys()].sort();
  }

  /**
   * Every verb with its serving plugins (declaration order) and aliases.
   */
  verbs(): VerbListing[] {
    return this.verbNames().map((verb) => ({
      verb,
      plugins: (this.verbIndex.get(verb) ?? []).map((plugin) => plugin.name),
      aliases: [...this.aliasIndex]
        .filter(([, target]) => target === verb)
        .map(([alias]) => alias)
        .sort(),
    }));
  }

  /**
   * Whether every variable a plugin requires is set in the context.
   */
  static environmentSatisfied(plugin: PluginDescriptor, context: InvocationContext): boolean {
    return plugin.requiresEnv.every((name) => isPresent(ownValue(context.env, name)));
  }
}
