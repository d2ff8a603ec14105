// ============================================
// ali Errors - Barrel Export
// ============================================

export {
  AliError,
  type AliErrorOptions,
  ErrorSeverity,
  errorMessage,
  inferSeverity,
  isFatalError,
} from "./types.js";
