/**
 * Console Logger implementation
 * Structured logging with event types and metadata, optionally mirrored to
 * an append-only log file.
 */

import { createWriteStream, mkdirSync, WriteStream } from 'fs';
import { dirname } from 'path';
import {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
  shouldLog,
  getEventLevel,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from '../types/logger';

/**
 * Log file shared between a logger and its children
 */
export class LogFileSink {
  private readonly stream: WriteStream;
  private closed = false;

  constructor(filePath: string) {
    mkdirSync(dirname(filePath), { recursive: true });
    this.stream = createWriteStream(filePath, { flags: 'a' });
    this.stream.on('error', (error) => {
      this.closed = true;
      console.error(`[ERROR] Log file ${filePath} is unavailable: ${error.message}`);
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  write(line: string): void {
    if (!this.closed) {
      this.stream.write(line + '\n');
    }
  }

  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    this.closed = true;
    return new Promise((resolve) => {
      if (this.stream.destroyed) {
        resolve();
        return;
      }
      this.stream.end(() => resolve());
    });
  }
}

/**
 * Console-based logger implementation
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private context: Partial<LogMetadata> = {};
  private events: LogEvent[] = [];
  private readonly options: LoggerOptions;
  private readonly sink?: LogFileSink;

  constructor(options: LoggerOptions = {}, sink?: LogFileSink) {
    this.minLevel = options.minLevel ?? 'info';
    this.options = {
      includeTimestamp: true,
      jsonOutput: false,
      redactPatterns: DEFAULT_REDACT_PATTERNS,
      ...options,
    };
    this.sink = sink ?? (options.logFilePath ? new LogFileSink(options.logFilePath) : undefined);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(getEventLevel(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = new ConsoleLogger(this.options, this.sink);
    childLogger.setContext({ ...this.context, ...additionalContext });
    childLogger.setMinLevel(this.minLevel);
    return childLogger;
  }

  close(): Promise<void> {
    return this.sink ? this.sink.close() : Promise.resolve();
  }

  private log(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: this.redact(message),
      metadata: this.mergeMetadata(metadata),
    };

    // Keep the most recent events only
    if (this.events.length >= 1000) {
      this.events.shift();
    }
    this.events.push(event);

    this.output(event);
  }

  private mergeMetadata(metadata?: LogMetadata): LogMetadata {
    const merged = { ...this.context, ...metadata };
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = this.redact(value);
      }
    }
    return merged;
  }

  private redact(text: string): string {
    return redactSecrets(text, this.options.redactPatterns);
  }

  private output(event: LogEvent): void {
    const line = this.options.jsonOutput ? JSON.stringify(event) : formatPrettyLine(event, this.options);

    if (event.level === 'error') {
      console.error(line);
    } else if (event.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }

    // The file always gets full timestamps
    this.sink?.write(this.options.jsonOutput ? line : `${event.timestamp} ${formatPrettyLine(event, { includeTimestamp: false })}`);
  }
}

/**
 * Format an event as a single human-readable line
 */
export function formatPrettyLine(event: LogEvent, options: LoggerOptions = {}): string {
  const parts: string[] = [];

  if (options.includeTimestamp) {
    const time = new Date(event.timestamp).toLocaleTimeString();
    parts.push(`[${time}]`);
  }

  parts.push(`[${event.level.toUpperCase()}]`);

  // Event type (if not a basic level)
  if (!['debug', 'info', 'warn', 'error'].includes(event.eventType)) {
    parts.push(`(${event.eventType})`);
  }

  parts.push(event.message);

  const { requestId, tool } = event.metadata;
  const metaParts: string[] = [];
  if (typeof requestId === 'string') metaParts.push(`req=${requestId.slice(0, 8)}`);
  if (typeof tool === 'string') metaParts.push(`tool=${tool}`);

  if (metaParts.length > 0) {
    parts.push(`{${metaParts.join(', ')}}`);
  }

  return parts.join(' ');
}

/**
 * Create a console logger with optional options
 */
export function createConsoleLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
