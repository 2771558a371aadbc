/**
 * Standardized process exit codes
 */

/**
 * Standard exit codes for the server binary
 */
export const ExitCode = {
  /** Clean shutdown */
  SUCCESS: 0,
  /** Unexpected/unhandled error */
  UNEXPECTED_ERROR: 1,
  /** Invalid CLI usage */
  USAGE_ERROR: 2,
  /** Configuration could not be loaded or validated */
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
