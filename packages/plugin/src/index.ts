// ============================================
// ali Plugin Engine
// ============================================

export {
  CONTEXT_PREFIX,
  contextValue,
  describeCondition,
  isPresent,
  matchesAll,
  readKey,
} from "./conditions.js";
export {
  INTERNAL_SERVICE_PREFIX,
  PluginDescriptor,
  type PluginSummary,
} from "./descriptor.js";
export {
  type DiscoveredPlugin,
  discoverPlugins,
  MANIFEST_FILE_NAMES,
  scanDirectory,
} from "./discovery.js";
export {
  type Composition,
  createEngine,
  Engine,
  type EngineOptions,
  type Explanation,
} from "./engine.js";
export {
  EngineError,
  type EngineErrorDetails,
  type ErrorKind,
  GrammarMismatchError,
  isEngineError,
  LoadError,
  LookupError,
  NoMatchingCommandError,
  TemplateCycleError,
  UnknownVerbError,
  UnresolvedRequiredFieldError,
} from "./errors.js";
export { acceptToken, applyTransform, type ParseResult, parseTokens } from "./grammar.js";
export { applyInference, type InferenceResult } from "./inference.js";
export { loadDescriptorFile, loadPlugins, type LoadPluginsOptions, loadRegistry } from "./loader.js";
export {
  type PluginManifest,
  type PluginManifestInput,
  PluginDescriptorSchema,
  safeParsePluginManifest,
} from "./manifest.js";
export {
  expandPath,
  getBuiltinPluginsDir,
  getProjectPluginsDir,
  getSearchPaths,
  getUserPluginsDir,
  type PluginSource,
  resolvePluginPath,
  type SearchPath,
  type SearchPathsOptions,
} from "./paths.js";
export { Registry, type RegistryOptions, type ServiceBinding, type VerbListing } from "./registry.js";
export {
  type CandidateSelection,
  type RouteResult,
  Router,
  type RouteStage,
  type RouteTarget,
  type SelectionReason,
  type StageEvent,
  type StageListener,
  selectCandidate,
} from "./router.js";
export {
  DEFAULT_MAX_PASSES,
  DEFAULT_MAX_SERVICE_HOPS,
  TemplateResolver,
  type TemplateResolverOptions,
} from "./template/resolver.js";
export { type LookupEntry, type Marker, parseMarker, scanTemplate, type Segment } from "./template/scanner.js";
export {
  type CommandSpec,
  type CommandState,
  type Condition,
  EMPTY_CONTEXT,
  type GrammarField,
  type InferenceRule,
  type InvocationContext,
  type SelectorSpec,
} from "./types.js";
