/**
 * Plugin Path Resolution Utilities
 *
 * Resolves the directories searched for plugin descriptors:
 * - Extra directories (CLI flags, config, ALI_PLUGINS_DIR)
 * - Project-local plugins (.ali/plugins/)
 * - User plugins (~/.config/ali/plugins/)
 * - Builtin plugins (the repository's plugins/ directory)
 *
 * @module plugin/paths
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

// =============================================================================
// Constants
// =============================================================================

const PLUGINS_DIR_NAME = "plugins";

/** Project-local configuration directory name */
const PROJECT_DIR_NAME = ".ali";

const APP_NAME = "ali";

// =============================================================================
// Types
// =============================================================================

/**
 * Where a search path comes from. Earlier sources win on duplicate plugin names.
 */
export type PluginSource = "extra" | "project" | "user" | "builtin";

export interface SearchPath {
  dir: string;
  source: PluginSource;
}

// =============================================================================
// Path Expansion Utilities
// =============================================================================

/**
 * Expands `~` and `$VAR` / `${VAR}` references.
 *
 * @example
 * ```typescript
 * expandPath("~/plugins"); // "/home/user/plugins"
 * expandPath("$HOME/plugins", { HOME: "/home/me" }); // "/home/me/plugins"
 * ```
 */
export function expandPath(
  inputPath: string,
  env: Readonly<Record<string, string | undefined>> = process.env
): string {
  let expanded = inputPath;

  if (expanded.startsWith("~")) {
    expanded = expanded.replace(/^~(?=[/\\]|$)/, os.homedir());
  }

  expanded = expanded.replace(
    /\$\{([^}]+)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_match: string, braced: string | undefined, plain: string | undefined) =>
      env[braced ?? plain ?? ""] ?? ""
  );

  return path.normalize(expanded);
}

/**
 * Checks if a directory exists at the given path.
 */
export function pathExists(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

// =============================================================================
// Directory Getters
// =============================================================================

/**
 * Gets the user-specific plugins directory: `~/.config/ali/plugins/`,
 * honouring XDG_CONFIG_HOME.
 */
export function getUserPluginsDir(
  env: Readonly<Record<string, string | undefined>> = process.env
): string {
  const configHome = env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(configHome, APP_NAME, PLUGINS_DIR_NAME);
}

/**
 * Gets the project-specific plugins directory: `${projectRoot}/.ali/plugins/`
 */
export function getProjectPluginsDir(projectRoot: string): string {
  return path.join(projectRoot, PROJECT_DIR_NAME, PLUGINS_DIR_NAME);
}

/**
 * Gets the builtin plugins directory shipped with ali.
 *
 * Walks up from this module to the first directory holding both a
 * package.json and a plugins/ directory, so it works from the sources
 * and from a bundled build alike.
 */
export function getBuiltinPluginsDir(): string {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));

  let currentDir = moduleDir;
  while (currentDir !== path.dirname(currentDir)) {
    const candidate = path.join(currentDir, PLUGINS_DIR_NAME);
    if (fs.existsSync(path.join(currentDir, "package.json")) && pathExists(candidate)) {
      return candidate;
    }
    currentDir = path.dirname(currentDir);
  }

  // Fallback: repository layout packages/plugin/src -> root
  return path.resolve(moduleDir, "..", "..", "..", PLUGINS_DIR_NAME);
}

// =============================================================================
// Search Path Resolution
// =============================================================================

export interface SearchPathsOptions {
  /** Project root; project plugins are included when given */
  projectRoot?: string;

  /** Extra directories searched first, in order */
  extra?: readonly string[];

  /** Overrides the user plugins directory */
  userDir?: string;

  /**
   * Whether to include builtin plugins directory.
   * @default true
   */
  includeBuiltin?: boolean;

  /**
   * Whether to filter out non-existent directories.
   * @default true
   */
  filterNonExistent?: boolean;

  /** Environment used for `~`/`$VAR` expansion and XDG_CONFIG_HOME */
  env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Gets plugin search paths in priority order:
 * 1. Extra directories
 * 2. Project plugins: `${projectRoot}/.ali/plugins/`
 * 3. User plugins: `~/.config/ali/plugins/`
 * 4. Builtin plugins
 *
 * @example
 * ```typescript
 * const paths = getSearchPaths({ projectRoot: "/home/user/project", extra: ["./plugins"] });
 * // [{ dir: "/home/user/project/plugins", source: "extra" }, ...]
 * ```
 */
export function getSearchPaths(options: SearchPathsOptions = {}): SearchPath[] {
  const {
    projectRoot,
    extra = [],
    includeBuiltin = true,
    filterNonExistent = true,
    env = process.env,
  } = options;

  const candidates: SearchPath[] = extra.map((dir) => ({
    dir: resolvePluginPath(dir, projectRoot, env),
    source: "extra",
  }));

  if (projectRoot) {
    candidates.push({ dir: getProjectPluginsDir(projectRoot), source: "project" });
  }

  candidates.push({
    dir: options.userDir ? expandPath(options.userDir, env) : getUserPluginsDir(env),
    source: "user",
  });

  if (includeBuiltin) {
    candidates.push({ dir: getBuiltinPluginsDir(), source: "builtin" });
  }

  const seen = new Set<string>();
  const unique = candidates.filter((candidate) => {
    if (seen.has(candidate.dir)) return false;
    seen.add(candidate.dir);
    return true;
  });

  return filterNonExistent ? unique.filter((candidate) => pathExists(candidate.dir)) : unique;
}

/**
 * Resolves a plugin directory that may be relative, absolute or use `~`/`$VAR`.
 *
 * @example
 * ```typescript
 * resolvePluginPath("./local", "/project"); // "/project/local"
 * ```
 */
export function resolvePluginPath(
  pluginPath: string,
  basePath: string = process.cwd(),
  env: Readonly<Record<string, string | undefined>> = process.env
): string {
  const expanded = expandPath(pluginPath, env);
  if (path.isAbsolute(expanded)) {
    return path.normalize(expanded);
  }
  return path.resolve(basePath, expanded);
}
