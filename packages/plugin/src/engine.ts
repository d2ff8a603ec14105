/**
 * Engine
 *
 * Wires the router and template resolver over one registry. `resolve`
 * throws engine errors; `compose` returns them as a Result; `explain`
 * records every stage reached.
 *
 * @module plugin/engine
 */

import { createSilentLogger, type Logger } from "@ali/core";
import { Err, Ok, type Result } from "@ali/shared";

import { type EngineError, isEngineError } from "./errors.js";
import type { Registry } from "./registry.js";
import { type RouteResult, Router, type StageEvent, type StageListener } from "./router.js";
import { TemplateResolver } from "./template/resolver.js";
import { EMPTY_CONTEXT, type InvocationContext } from "./types.js";

export interface EngineOptions {
  registry: Registry;
  /** Defaults to a silent logger */
  logger?: Logger;
  /** Leftover tokens are fatal for every plugin */
  strict?: boolean;
  maxPasses?: number;
  maxServiceHops?: number;
}

export interface Composition {
  /** Resolved command line */
  output: string;
  /** Template the output was expanded from */
  template: string;
  route: RouteResult;
}

export interface Explanation {
  tokens: readonly string[];
  stages: StageEvent[];
  output?: string;
  error?: EngineError;
}

export class Engine {
  readonly registry: Registry;
  private readonly router: Router;
  private readonly resolver: TemplateResolver;
  private readonly logger: Logger;

  constructor(options: EngineOptions) {
    this.registry = options.registry;
    this.logger = options.logger ?? createSilentLogger();
    this.router = new Router(options.registry, { strict: options.strict, logger: this.logger });
    this.resolver = new TemplateResolver(options.registry, {
      maxPasses: options.maxPasses,
      maxServiceHops: options.maxServiceHops,
      logger: this.logger,
    });
  }

  route(tokens: readonly string[], context: InvocationContext = EMPTY_CONTEXT): RouteResult {
    return this.router.route(tokens, context);
  }

  /**
   * Routes tokens and expands the matched template.
   *
   * @throws EngineError
   */
  resolve(
    tokens: readonly string[],
    context: InvocationContext = EMPTY_CONTEXT,
    listener?: StageListener
  ): Composition {
    const route = this.router.route(tokens, context, listener);
    const { target, plugin, state } = route;

    let template: string;
    let output: string;
    if (target.kind === "selector") {
      template = target.selector.exec;
      output = this.resolver.resolveSelector(target.selector, plugin, state, context);
    } else {
      template = target.command.exec;
      output = this.resolver.resolve(template, plugin, state, context);
    }

    this.logger.debug("TemplateExpanded", { template, output });
    listener?.({ stage: "TemplateExpanded", detail: { template, output } });
    return { output, template, route };
  }

  /**
   * Like {@link resolve}, with engine failures returned instead of thrown.
   * Anything else is a bug and still propagates.
   */
  compose(
    tokens: readonly string[],
    context: InvocationContext = EMPTY_CONTEXT
  ): Result<Composition, EngineError> {
    try {
      return Ok(this.resolve(tokens, context));
    } catch (error) {
      if (isEngineError(error)) {
        return Err(error);
      }
      throw error;
    }
  }

  /**
   * Runs the pipeline and reports every stage reached, plus the output or
   * the error that stopped it.
   */
  explain(tokens: readonly string[], context: InvocationContext = EMPTY_CONTEXT): Explanation {
    const stages: StageEvent[] = [];
    try {
      const { output } = this.resolve(tokens, context, (event) => stages.push(event));
      return { tokens, stages, output };
    } catch (error) {
      if (isEngineError(error)) {
        return { tokens, stages, error };
      }
      throw error;
    }
  }
}

export function createEngine(options: EngineOptions): Engine {
  return new Engine(options);
}
