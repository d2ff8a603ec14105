/**
 * Plugin Loader
 *
 * Reads discovered plugin.yaml files, validates them and builds the
 * registry. The first malformed descriptor aborts loading: no partial
 * plugin set is returned.
 *
 * @module plugin/loader
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";

import { createSilentLogger, errorMessage, type Logger } from "@ali/core";
import * as yaml from "js-yaml";

import { PluginDescriptor } from "./descriptor.js";
import { discoverPlugins } from "./discovery.js";
import { LoadError } from "./errors.js";
import type { SearchPath } from "./paths.js";
import { Registry } from "./registry.js";

export interface LoadPluginsOptions {
  /** Plugin names to skip */
  disabled?: readonly string[];
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads and validates one descriptor file.
 *
 * A descriptor without a `name` takes the name of its directory.
 *
 * @throws LoadError when the file cannot be read, is not valid YAML, or
 * fails validation
 */
export async function loadDescriptorFile(manifestPath: string): Promise<PluginDescriptor> {
  let content: string;
  try {
    content = await fs.readFile(manifestPath, "utf-8");
  } catch (error) {
    throw new LoadError(`Cannot read ${manifestPath}: ${errorMessage(error)}`, {
      source: manifestPath,
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content, { filename: manifestPath });
  } catch (error) {
    throw new LoadError(`Invalid YAML in ${manifestPath}: ${errorMessage(error)}`, {
      source: manifestPath,
      cause: error,
    });
  }

  if (isRecord(parsed) && parsed.name === undefined) {
    parsed = { ...parsed, name: path.basename(path.dirname(manifestPath)) };
  }

  return PluginDescriptor.parse(parsed, manifestPath);
}

/**
 * Discovers and loads every plugin on the search paths, in discovery order,
 * minus disabled names.
 */
export async function loadPlugins(
  searchPaths: readonly SearchPath[],
  options: LoadPluginsOptions = {}
): Promise<PluginDescriptor[]> {
  const logger = options.logger ?? createSilentLogger();
  const disabled = new Set(options.disabled ?? []);
  const discovered = await discoverPlugins(searchPaths, logger);
  const descriptors: PluginDescriptor[] = [];

  for (const plugin of discovered) {
    if (disabled.has(plugin.name)) {
      logger.debug(`Plugin ${plugin.name} is disabled`);
      continue;
    }
    const descriptor = await loadDescriptorFile(plugin.manifestPath);
    if (disabled.has(descriptor.name)) {
      logger.debug(`Plugin ${descriptor.name} is disabled`);
      continue;
    }
    logger.debug(`Loaded plugin ${descriptor.name}@${descriptor.version}`, {
      source: plugin.source,
      path: plugin.manifestPath,
    });
    descriptors.push(descriptor);
  }

  return descriptors;
}

/**
 * Loads plugins from the search paths and builds a registry over them.
 */
export async function loadRegistry(
  searchPaths: readonly SearchPath[],
  options: LoadPluginsOptions = {}
): Promise<Registry> {
  const timer = options.logger?.time("Plugin loading");
  const descriptors = await loadPlugins(searchPaths, options);
  const registry = Registry.load(descriptors, { logger: options.logger });
  timer?.end(`Loaded ${descriptors.length} plugins`);
  return registry;
}
