/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Rejected credentials or token */
  AUTHENTICATION_ERROR: 3,

  /** Account or resource not found */
  NOT_FOUND: 4,

  /** Rate limit exceeded */
  RATE_LIMIT: 5,

  /** Network or connectivity error */
  NETWORK_ERROR: 6,

  /** Request rejected before it was sent */
  VALIDATION_ERROR: 8,

  /** Timeout error */
  TIMEOUT: 10,

  /** Configuration error */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

