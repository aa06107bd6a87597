/**
 * Execution defaults.
 */

export const ENGINE_DEFAULTS = {
  /** Body excerpt kept on ExecutionError */
  maxErrorBodyChars: 2_000,
} as const;
