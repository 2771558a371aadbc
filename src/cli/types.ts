/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

/** Parsed CLI arguments */
export interface ParsedArgs {
  /** Env file to load (defaults to byte-vision-cfg.env in the working directory) */
  configPath: string | null;

  /** HTTP port overriding HttpPort */
  port: number | null;

  /** Endpoint path overriding EndPoint */
  endpoint: string | null;

  /** Show help and exit */
  help: boolean;

  /** Show version and exit */
  version: boolean;

  /** Enable debug logging (resolved arguments, subprocess lifecycle) */
  debug: boolean;

  /** Emit log lines as JSON */
  jsonOutput: boolean;
}

/** Default values for parsed arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  configPath: null,
  port: null,
  endpoint: null,
  help: false,
  version: false,
  debug: false,
  jsonOutput: false,
};

/** Result of parsing arguments */
export type ParseResult =
  | { success: true; args: ParsedArgs }
  | { success: false; error: string };
