// ============================================
// ali Error Codes
// ============================================

/**
 * Centralized error codes for the ali application.
 * Error code ranges:
 * - 1xxx: General/System errors
 * - 2xxx: Configuration errors
 * - 3xxx: Plugin loading errors
 * - 4xxx: Routing errors (verb, grammar, command matching)
 * - 5xxx: Template resolution errors
 */
export enum ErrorCode {
  // General Errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL_ERROR = 1001,
  INVALID_ARGUMENT = 1002,

  // Configuration Errors (2xxx)
  CONFIG_NOT_FOUND = 2001,
  CONFIG_PARSE_ERROR = 2002,
  CONFIG_INVALID = 2003,

  // Plugin Loading Errors (3xxx)
  PLUGIN_LOAD_FAILED = 3001,

  // Routing Errors (4xxx)
  UNKNOWN_VERB = 4001,
  GRAMMAR_MISMATCH = 4002,
  NO_MATCHING_COMMAND = 4003,
  TOKENIZE_FAILED = 4004,

  // Template Errors (5xxx)
  LOOKUP_FAILED = 5001,
  UNRESOLVED_REQUIRED_FIELD = 5002,
  TEMPLATE_CYCLE = 5003,
}
