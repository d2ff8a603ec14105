export {
  type ConfigError,
  type ConfigErrorCode,
  deepMerge,
  findProjectConfig,
  getGlobalConfigPath,
  type LoadConfigOptions,
  loadConfig,
  parseEnvConfig,
  readTomlFile,
} from "./loader.js";
export {
  type Config,
  ConfigSchema,
  LogLevelSchema,
  type PartialConfig,
  type PluginsConfig,
  PluginsConfigSchema,
  type TemplateConfig,
  TemplateConfigSchema,
} from "./schema.js";
