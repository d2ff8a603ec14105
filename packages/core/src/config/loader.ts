import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@ali/shared";
import { type Config, ConfigSchema } from "./schema.js";

// ============================================
// Configuration Loader
// ============================================

/**
 * Error types for configuration loading operations
 */
export type ConfigErrorCode = "FILE_NOT_FOUND" | "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

/**
 * Configuration error with code and context
 */
export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

/**
 * Options for loadConfig function
 */
export interface LoadConfigOptions {
  /** Working directory to search for config files (default: process.cwd()) */
  cwd?: string;
  /** Config overrides (highest priority) */
  overrides?: Record<string, unknown>;
  /** Environment to read ALI_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectFile?: boolean;
  /** Override the global config file location */
  globalConfigPath?: string;
}

// ============================================
// findProjectConfig
// ============================================

/** Config file names to search for in order */
const CONFIG_FILE_NAMES = ["ali.toml", ".ali.toml", ".config/ali.toml"];

/**
 * Find project configuration file by searching up from startDir to root.
 *
 * @param startDir - Directory to start search from (default: process.cwd())
 * @returns Path to found config file, or undefined if not found
 */
export function findProjectConfig(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  return undefined;
}

// ============================================
// parseEnvConfig
// ============================================

/**
 * Environment variable to config path mappings
 */
const ENV_MAPPINGS: Record<string, readonly string[]> = {
  ALI_LOG_LEVEL: ["logLevel"],
  ALI_LOG_JSON: ["logJson"],
  ALI_STRICT: ["strict"],
  ALI_CALLER: ["caller"],
  ALI_PLUGINS_DIR: ["plugins", "dirs"],
  ALI_MAX_PASSES: ["template", "maxPasses"],
};

const BOOLEAN_KEYS = new Set(["logJson", "strict"]);
const NUMBER_KEYS = new Set(["maxPasses"]);

/**
 * Coerce string value to the type its config key expects
 */
function coerceValue(value: string, configPath: readonly string[]): unknown {
  const key = configPath[configPath.length - 1] ?? "";
  if (BOOLEAN_KEYS.has(key)) {
    return value === "true" || value === "1";
  }
  if (NUMBER_KEYS.has(key)) {
    return Number(value);
  }
  if (key === "dirs") {
    return value.split(path.delimiter).filter((dir) => dir !== "");
  }
  return value;
}

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(
  obj: Record<string, unknown>,
  configPath: readonly string[],
  value: unknown
): void {
  const [head, ...rest] = configPath;
  if (head === undefined) return;

  if (rest.length === 0) {
    obj[head] = value;
    return;
  }

  const existing = obj[head];
  const next: Record<string, unknown> = isPlainObject(existing) ? existing : {};
  obj[head] = next;
  setNestedValue(next, rest, value);
}

/**
 * Parse ALI_* environment variables into a partial config object.
 *
 * @example
 * ```typescript
 * // With ALI_LOG_LEVEL=debug set:
 * parseEnvConfig(); // { logLevel: "debug" }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [envVar, configPath] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== "") {
      setNestedValue(result, configPath, coerceValue(value, configPath));
    }
  }

  return result;
}

// ============================================
// deepMerge
// ============================================

/**
 * Check if value is a plain object (not array, null, or other type)
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

/**
 * Deep merge multiple objects. Later sources override earlier ones.
 * Arrays are replaced (not concatenated).
 * undefined values don't overwrite existing values.
 *
 * @example
 * ```typescript
 * deepMerge({ a: 1, b: { c: 2 } }, { b: { d: 3 } });
 * // { a: 1, b: { c: 2, d: 3 } }
 * ```
 */
export function deepMerge(...sources: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const source of sources) {
    if (!isPlainObject(source)) continue;

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];

      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        result[key] = deepMerge(targetValue, sourceValue);
      } else {
        result[key] = sourceValue;
      }
    }
  }

  return result;
}

// ============================================
// loadConfig
// ============================================

/**
 * Get path to global config file (~/.config/ali/config.toml)
 */
export function getGlobalConfigPath(): string {
  return path.join(os.homedir(), ".config", "ali", "config.toml");
}

/**
 * Read and parse a TOML config file
 */
export function readTomlFile(filePath: string): Result<Record<string, unknown>, ConfigError> {
  if (!fs.existsSync(filePath)) {
    return Err({
      code: "FILE_NOT_FOUND",
      message: `Config file not found: ${filePath}`,
      path: filePath,
    });
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }

  try {
    return Ok(TOML.parse(content));
  } catch (error) {
    return Err({
      code: "PARSE_ERROR",
      message: `Failed to parse TOML: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Load configuration from multiple sources with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults
 * 2. Global config: ~/.config/ali/config.toml
 * 3. Project config: findProjectConfig()
 * 4. Environment variables (unless skipEnv)
 * 5. CLI overrides (options.overrides)
 *
 * @example
 * ```typescript
 * const result = loadConfig({ cwd: "/my/project" });
 * if (result.ok) {
 *   console.log(result.value.template.maxPasses);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<Config, ConfigError> {
  const { cwd, overrides, skipEnv = false, skipProjectFile = false } = options;

  const configs: Record<string, unknown>[] = [];

  // Missing global config is fine; a broken one is not
  const globalResult = readTomlFile(options.globalConfigPath ?? getGlobalConfigPath());
  if (globalResult.ok) {
    configs.push(globalResult.value);
  } else if (globalResult.error.code !== "FILE_NOT_FOUND") {
    return globalResult;
  }

  if (!skipProjectFile) {
    const projectPath = findProjectConfig(cwd);
    if (projectPath) {
      const projectResult = readTomlFile(projectPath);
      if (!projectResult.ok) {
        return projectResult;
      }
      configs.push(projectResult.value);
    }
  }

  if (!skipEnv) {
    const envConfig = parseEnvConfig(options.env);
    if (Object.keys(envConfig).length > 0) {
      configs.push(envConfig);
    }
  }

  if (overrides) {
    configs.push(overrides);
  }

  const parseResult = ConfigSchema.safeParse(deepMerge(...configs));

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration: ${issues}`,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}
