/**
 * Plugin Discovery Scanner
 *
 * Scans search paths for plugins. A valid plugin directory contains a
 * `plugin.yaml` (or `plugin.yml`) descriptor.
 *
 * Priority order (first wins for duplicate names) follows the search path
 * order: extra, project, user, builtin. Within one directory plugins are
 * returned sorted by directory name, which fixes their declaration order.
 *
 * @module plugin/discovery
 */

import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import type { Logger } from "@ali/core";

import type { PluginSource, SearchPath } from "./paths.js";

// =============================================================================
// Constants
// =============================================================================

/** Descriptor file names, in lookup order */
export const MANIFEST_FILE_NAMES = ["plugin.yaml", "plugin.yml"] as const;

// =============================================================================
// Types
// =============================================================================

/**
 * A plugin found on the filesystem. The descriptor is parsed by the loader.
 *
 * @example
 * ```typescript
 * const plugin: DiscoveredPlugin = {
 *   name: "tmux",
 *   root: "/home/user/.config/ali/plugins/tmux",
 *   manifestPath: "/home/user/.config/ali/plugins/tmux/plugin.yaml",
 *   source: "user"
 * };
 * ```
 */
export interface DiscoveredPlugin {
  /** Plugin name derived from the directory name */
  name: string;

  /** Absolute path to the plugin root directory */
  root: string;

  /** Absolute path to the descriptor file */
  manifestPath: string;

  source: PluginSource;
}

// =============================================================================
// Directory Scanning
// =============================================================================

/**
 * Scans a directory for plugin subdirectories. Symlinks are followed.
 *
 * @param dir - Directory path to scan for plugins
 * @param source - Source type for discovered plugins
 * @param logger - Receives a warning when the directory cannot be read
 */
export async function scanDirectory(
  dir: string,
  source: PluginSource,
  logger?: Logger
): Promise<DiscoveredPlugin[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isNodeError(error)) {
      if (error.code === "ENOENT" || error.code === "ENOTDIR") {
        return [];
      }
      if (error.code === "EACCES" || error.code === "EPERM") {
        logger?.warn(`Permission denied scanning ${dir}`);
        return [];
      }
    }
    throw error;
  }

  const checks = entries.map(async (entry): Promise<DiscoveredPlugin | null> => {
    let isDirectory = entry.isDirectory();
    const entryName = String(entry.name);
    const entryPath = path.join(dir, entryName);

    if (entry.isSymbolicLink()) {
      try {
        const stats = await fs.stat(entryPath);
        isDirectory = stats.isDirectory();
      } catch {
        // Broken symlink
        return null;
      }
    }

    if (!isDirectory) {
      return null;
    }

    const manifestPath = await findManifest(entryPath);
    return manifestPath === undefined
      ? null
      : { name: entryName, root: entryPath, manifestPath, source };
  });

  const results = await Promise.all(checks);
  return results
    .filter((result): result is DiscoveredPlugin => result !== null)
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

async function findManifest(root: string): Promise<string | undefined> {
  for (const fileName of MANIFEST_FILE_NAMES) {
    const candidate = path.join(root, fileName);
    try {
      await fs.access(candidate, fs.constants.R_OK);
      return candidate;
    } catch {
      // Try the next name
    }
  }
  return undefined;
}

// =============================================================================
// Plugin Discovery
// =============================================================================

/**
 * Discovers plugins across search paths. When duplicate directory names
 * are found, the first occurrence (by path order) wins, so project plugins
 * override user and builtin ones.
 *
 * @example
 * ```typescript
 * const plugins = await discoverPlugins(getSearchPaths({ projectRoot: "/my/project" }));
 * console.log(plugins.map((p) => `${p.name} (${p.source})`));
 * // ["my-tool (project)", "tmux (builtin)"]
 * ```
 */
export async function discoverPlugins(
  searchPaths: readonly SearchPath[],
  logger?: Logger
): Promise<DiscoveredPlugin[]> {
  const seenNames = new Set<string>();
  const allPlugins: DiscoveredPlugin[] = [];

  for (const searchPath of searchPaths) {
    const plugins = await scanDirectory(searchPath.dir, searchPath.source, logger);

    for (const plugin of plugins) {
      if (seenNames.has(plugin.name)) {
        logger?.debug(`Skipping ${plugin.manifestPath}: '${plugin.name}' already discovered`);
        continue;
      }
      seenNames.add(plugin.name);
      allPlugins.push(plugin);
    }
  }

  return allPlugins;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Type guard for Node.js filesystem errors.
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
