// ============================================
// ali Error Types
// ============================================

import { ErrorCode } from "@ali/shared";

/**
 * Error severity levels that determine handling strategy.
 */
export enum ErrorSeverity {
  /** User needs to fix something (input, plugin descriptor, config) */
  USER_ACTION = "user_action",
  /** Cannot continue */
  FATAL = "fatal",
}

/**
 * Infers the appropriate severity level from an error code.
 *
 * Everything the user can correct (bad input, bad descriptors, bad
 * configuration) is USER_ACTION; internal and unknown errors are FATAL.
 * No ali error is retryable: the engine is pure, so a retry reproduces
 * the same outcome.
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.INVALID_ARGUMENT:
    case ErrorCode.CONFIG_NOT_FOUND:
    case ErrorCode.CONFIG_PARSE_ERROR:
    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.PLUGIN_LOAD_FAILED:
    case ErrorCode.UNKNOWN_VERB:
    case ErrorCode.GRAMMAR_MISMATCH:
    case ErrorCode.NO_MATCHING_COMMAND:
    case ErrorCode.TOKENIZE_FAILED:
    case ErrorCode.LOOKUP_FAILED:
    case ErrorCode.UNRESOLVED_REQUIRED_FIELD:
    case ErrorCode.TEMPLATE_CYCLE:
      return ErrorSeverity.USER_ACTION;
    default:
      return ErrorSeverity.FATAL;
  }
}

/**
 * Options for creating an AliError.
 */
export interface AliErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
}

/**
 * Base error class for all ali errors.
 *
 * Provides:
 * - Categorized error codes
 * - Automatic severity inference
 * - Error cause chaining
 * - Additional context
 */
export class AliError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: AliErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "AliError";
    this.code = code;
    this.context = options?.context;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * The severity level of this error, inferred from the error code.
   */
  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Type guard to check if an error is an AliError with FATAL severity.
 */
export function isFatalError(error: unknown): error is AliError {
  return error instanceof AliError && error.severity === ErrorSeverity.FATAL;
}

/**
 * Extracts a printable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
