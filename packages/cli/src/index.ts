// ============================================
// ali CLI
// ============================================

export { buildInvocationContext, type ContextOptions, tmuxSession } from "./context.js";
export { EXIT_CODES, type ExitCode } from "./exit-codes.js";
export {
  compositionJson,
  formatEngineError,
  formatExplanation,
  formatPlugins,
  formatVerbs,
} from "./format.js";
export { type CliIO, createProgram, type GlobalOptions, runCli, wordsToTokens } from "./program.js";
export { TokenizeError, tokenize } from "./tokenize.js";
export { version } from "./version.js";
