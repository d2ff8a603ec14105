/**
 * Process exit codes
 *
 * - 0: the command was composed (or the listing printed)
 * - 1: the engine rejected the input
 * - 2: configuration, descriptors or arguments are unusable
 *
 * @module cli/exit-codes
 */

export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** Engine failure: unknown verb, no matching command, template error */
  ERROR: 1,
  /** Configuration, load or usage error */
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
