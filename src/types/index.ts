/**
 * Types module - shared interfaces and types
 * This module provides all injectable interfaces for testability
 */

// Exit codes
export { ExitCode } from './exit-codes';

// Process runner interface
export type { ProcessRunner, SpawnOptions, SpawnResult } from './process-runner';

// Execution outcomes
export type {
  ExecutionOutcome,
  ExecutionOutcomeKind,
  OutputOutcome,
  FailedOutcome,
  TimedOutOutcome,
  CancelledOutcome,
} from './execution-outcome';
export { ProcessLaunchError, ProcessExitError } from './execution-outcome';

// Clock interface
export type { Clock } from './clock';
export { SystemClock, MockClock } from './clock';

// Logger interface
export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';
export {
  compareLogLevels,
  shouldLog,
  getEventLevel,
  DEFAULT_REDACT_PATTERNS,
  redactSecrets,
  truncateForLog,
} from './logger';

// llama-cli and server configuration
export type { ValueOption, BooleanOption, LlamaCliConfig, AppConfig, EffectiveConfig } from './llama-config';
export {
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_HTTP_PORT,
  DEFAULT_ENDPOINT,
  DEFAULT_CONFIG_FILE,
  isValueOption,
  getTimeoutSeconds,
} from './llama-config';

// Completion request/response
export type { CompletionOverrides, CompletionResponse } from './completion';
