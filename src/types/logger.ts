/**
 * Logger interface
 * Structured logging with event types and metadata
 */

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for the server and request lifecycle
 */
export type LogEventType =
  // Server lifecycle
  | 'server_started'
  | 'shutdown_started'
  | 'shutdown_completed'
  // Completion requests
  | 'completion_requested'
  | 'completion_succeeded'
  | 'completion_failed'
  | 'completion_timed_out'
  | 'completion_cancelled'
  // Subprocess events
  | 'process_spawned'
  | 'process_exited'
  | 'process_killed'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Base metadata included in all log events
 */
export interface LogMetadata {
  /** Identifier of the request being handled */
  requestId?: string;
  /** MCP tool name */
  tool?: string;
  /** Additional context-specific metadata */
  [key: string]: unknown;
}

/**
 * A structured log event
 */
export interface LogEvent {
  /** Timestamp of the event (ISO 8601) */
  timestamp: string;
  level: LogLevel;
  /** Event type for structured queries */
  eventType: LogEventType;
  /** Human-readable message */
  message: string;
  metadata: LogMetadata;
}

/**
 * Options for configuring the logger
 */
export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Whether to use JSON format for output */
  jsonOutput?: boolean;
  /** Patterns to redact from log output (for secrets) */
  redactPatterns?: RegExp[];
  /** File that receives a copy of every emitted line */
  logFilePath?: string;
}

/**
 * Interface for structured logging
 * Implementations can write to console, file, or buffer (for testing)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;

  info(message: string, metadata?: LogMetadata): void;

  warn(message: string, metadata?: LogMetadata): void;

  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Set context (requestId, etc.) for all subsequent logs
   */
  setContext(context: Partial<LogMetadata>): void;

  clearContext(): void;

  /**
   * Get all logged events (for testing/diagnostics)
   */
  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Partial<LogMetadata>): Logger;

  /**
   * Flush and release any file handles
   */
  close(): Promise<void>;
}

/**
 * Compare log levels (returns positive if a > b)
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  const order: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };
  return order[a] - order[b];
}

/**
 * Check if a log level should be emitted given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return compareLogLevels(level, minLevel) >= 0;
}

/**
 * Map an event type to the level it is logged at
 */
export function getEventLevel(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'completion_failed':
      return 'error';
    case 'warn':
    case 'completion_timed_out':
    case 'process_killed':
      return 'warn';
    case 'debug':
    case 'process_spawned':
    case 'process_exited':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Common secret patterns to redact
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  // API keys (generic patterns)
  /(?:api[_-]?key|apikey)[=:\s]*['"]?([a-zA-Z0-9_-]{20,})['"]?/gi,
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/gi,
  // HuggingFace tokens (model downloads)
  /hf_[a-zA-Z0-9]{30,}/g,
  // Generic secrets in env vars
  /(?:password|secret|token|credential)[=:\s]*['"]?([^\s'"]{8,})['"]?/gi,
];

/**
 * Redact secrets from a string using the given patterns
 */
export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    // Reset lastIndex for stateful regexes
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}

/**
 * Shorten a prompt for log output
 */
export function truncateForLog(text: string, maxLength: number = 100): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}...`;
}
