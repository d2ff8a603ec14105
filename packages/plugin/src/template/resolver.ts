/**
 * Template Resolver
 *
 * Recursive-descent expansion of command templates against a command
 * state, the invocation context and registry services.
 *
 * Marker grammar:
 * - `{name}`                    state value, else service, else empty
 * - `{ctx.caller}`              invocation context value
 * - `{name!}`                   required: fails when absent
 * - `{?field:body}`             body when field is present and non-empty
 * - `{field[k:v,default:v]}`    lookup table
 * - `{outer_{inner}}`           inner result spliced into the name, then looked up
 *
 * Substituted values are never re-scanned. Every splice and every service
 * expansion counts as one nested pass; exceeding the pass bound, re-entering
 * a service being expanded, or crossing more plugin boundaries than allowed
 * fails with {@link TemplateCycleError}. Resolution is all-or-nothing.
 *
 * @module plugin/template/resolver
 */

import { createSilentLogger, type Logger } from "@ali/core";

import { CONTEXT_PREFIX, contextValue, isPresent, ownValue } from "../conditions.js";
import type { PluginDescriptor } from "../descriptor.js";
import {
  type EngineErrorDetails,
  LookupError,
  TemplateCycleError,
  UnresolvedRequiredFieldError,
} from "../errors.js";
import type { Registry, ServiceBinding } from "../registry.js";
import {
  type CommandState,
  EMPTY_CONTEXT,
  type InvocationContext,
  type SelectorSpec,
} from "../types.js";
import { DEFAULT_KEY, type LookupEntry, parseMarker, scanTemplate } from "./scanner.js";

export const DEFAULT_MAX_PASSES = 5;
export const DEFAULT_MAX_SERVICE_HOPS = 1;

export interface TemplateResolverOptions {
  /** Nested splices and service expansions allowed */
  maxPasses?: number;
  /** Cross-plugin service references allowed along one chain */
  maxServiceHops?: number;
  logger?: Logger;
}

/**
 * Where a piece of template text is being resolved.
 */
interface Frame {
  /** Plugin whose template this is; its own services and fields apply */
  plugin: PluginDescriptor;
  hops: number;
  passes: number;
  /** Services being expanded, as "plugin:service" */
  stack: readonly string[];
}

export class TemplateResolver {
  private readonly maxPasses: number;
  private readonly maxServiceHops: number;
  private readonly logger: Logger;

  constructor(
    private readonly registry: Registry,
    options: TemplateResolverOptions = {}
  ) {
    this.maxPasses = options.maxPasses ?? DEFAULT_MAX_PASSES;
    this.maxServiceHops = options.maxServiceHops ?? DEFAULT_MAX_SERVICE_HOPS;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "template" });
  }

  /**
   * Expands a template written by `plugin`. The result is trimmed.
   */
  resolve(
    template: string,
    plugin: PluginDescriptor,
    state: CommandState,
    context: InvocationContext = EMPTY_CONTEXT
  ): string {
    const resolution = new Resolution(this.registry, state, context, this.limits());
    return resolution.text(template, { plugin, hops: 0, passes: 0, stack: [] }).trim();
  }

  /**
   * Expands a selector's `exec` template in the frame of its declaring plugin.
   */
  resolveSelector(
    selector: SelectorSpec,
    plugin: PluginDescriptor,
    state: CommandState,
    context: InvocationContext = EMPTY_CONTEXT
  ): string {
    const resolution = new Resolution(this.registry, state, context, this.limits());
    return resolution.selector(selector, { plugin, hops: 0, passes: 0, stack: [] }).trim();
  }

  private limits(): Limits {
    return { maxPasses: this.maxPasses, maxServiceHops: this.maxServiceHops, logger: this.logger };
  }
}

interface Limits {
  maxPasses: number;
  maxServiceHops: number;
  logger: Logger;
}

/**
 * One template expansion. Holds the per-call state so frames stay small.
 */
class Resolution {
  constructor(
    private readonly registry: Registry,
    private readonly state: CommandState,
    private readonly context: InvocationContext,
    private readonly limits: Limits
  ) {}

  text(template: string, frame: Frame): string {
    let output = "";
    for (const segment of scanTemplate(template)) {
      output += segment.kind === "text" ? segment.text : this.marker(segment.body, frame);
    }
    return output;
  }

  selector(selector: SelectorSpec, frame: Frame): string {
    const owner = this.registry.get(selector.plugin) ?? frame.plugin;
    const inner = this.enter(`selector ${selector.token}`, owner, frame);
    return this.text(selector.exec, inner).trim();
  }

  private marker(body: string, frame: Frame): string {
    const marker = parseMarker(body);
    switch (marker.kind) {
      case "conditional": {
        const field = this.name(marker.field, frame);
        const value = this.read(field);
        if (!isPresent(value)) {
          return "";
        }
        return marker.body === undefined ? this.render(value, frame) : this.text(marker.body, frame);
      }
      case "lookup":
        return this.lookup(this.name(marker.name, frame), marker.required, marker.entries, frame);
      case "value":
        return this.value(this.name(marker.name, frame), marker.required, frame);
    }
  }

  /**
   * Resolves markers inside a name and splices the result in.
   */
  private name(raw: string, frame: Frame): string {
    if (!raw.includes("{")) {
      return raw;
    }
    const passes = this.nextPass(frame, raw);
    return this.text(raw, { ...frame, passes }).trim();
  }

  private value(name: string, required: boolean, frame: Frame): string {
    if (name.startsWith(CONTEXT_PREFIX)) {
      const value = contextValue(name.slice(CONTEXT_PREFIX.length), this.context);
      if (required && !isPresent(value)) {
        throw new UnresolvedRequiredFieldError(name, "context value is not set", this.details(frame));
      }
      return value ?? "";
    }

    const value = ownValue(this.state, name);
    if (isPresent(value)) {
      return this.render(value, frame);
    }

    const service = this.registry.serviceFor(name, frame.plugin);
    if (service) {
      return this.service(service, frame);
    }

    if (required) {
      throw new UnresolvedRequiredFieldError(name, "field is not set", this.details(frame));
    }
    return "";
  }

  private lookup(
    name: string,
    required: boolean,
    entries: readonly LookupEntry[],
    frame: Frame
  ): string {
    const value = this.read(name);
    const fallback = entries.find((entry) => entry.key === DEFAULT_KEY);

    if (!isPresent(value)) {
      if (required) {
        throw new UnresolvedRequiredFieldError(name, "field is not set", this.details(frame));
      }
      return fallback ? this.text(fallback.value, frame) : "";
    }

    const entry = entries.find((candidate) => candidate.key === value) ?? fallback;
    if (!entry) {
      throw new LookupError(
        name,
        value,
        entries.map((candidate) => candidate.key),
        this.details(frame)
      );
    }
    return this.text(entry.value, frame);
  }

  private service(binding: ServiceBinding, frame: Frame): string {
    const inner = this.enter(binding.name, binding.plugin, frame);
    this.limits.logger.debug(`Expanding service ${binding.plugin.name}:${binding.name}`, {
      from: frame.plugin.name,
      passes: inner.passes,
    });
    return this.text(binding.template, inner);
  }

  /**
   * Frame for expanding a service or selector template owned by `owner`.
   */
  private enter(name: string, owner: PluginDescriptor, frame: Frame): Frame {
    const id = `${owner.name}:${name}`;
    const chain = [...frame.stack, id];

    if (frame.stack.includes(id)) {
      throw new TemplateCycleError(
        `Service '${name}' references itself: ${chain.join(" -> ")}`,
        chain,
        this.details(frame)
      );
    }

    const hops = frame.hops + (owner === frame.plugin ? 0 : 1);
    if (hops > this.limits.maxServiceHops) {
      throw new TemplateCycleError(
        `Service chain crosses more than ${this.limits.maxServiceHops} plugin boundar${
          this.limits.maxServiceHops === 1 ? "y" : "ies"
        }: ${chain.join(" -> ")}`,
        chain,
        this.details(frame)
      );
    }

    return { plugin: owner, hops, passes: this.nextPass(frame, name), stack: chain };
  }

  private nextPass(frame: Frame, name: string): number {
    const passes = frame.passes + 1;
    if (passes > this.limits.maxPasses) {
      throw new TemplateCycleError(
        `Template nesting exceeds ${this.limits.maxPasses} passes at '${name}'`,
        frame.stack,
        this.details(frame)
      );
    }
    return passes;
  }

  /**
   * A value equal to a stream selector token renders as a command substitution.
   */
  private render(value: string, frame: Frame): string {
    const selector = this.registry.selectorFor(value, frame.plugin, this.context);
    if (selector?.kind === "stream") {
      return `$(${this.selector(selector, frame)})`;
    }
    return value;
  }

  private read(name: string): string | undefined {
    if (name.startsWith(CONTEXT_PREFIX)) {
      return contextValue(name.slice(CONTEXT_PREFIX.length), this.context);
    }
    return ownValue(this.state, name);
  }

  private details(frame: Frame): EngineErrorDetails {
    return { verb: ownValue(this.state, "verb"), plugin: frame.plugin.name, state: this.state };
  }
}
