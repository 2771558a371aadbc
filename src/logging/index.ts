/**
 * Logging module - structured logging implementations
 */

export { ConsoleLogger, LogFileSink, createConsoleLogger, formatPrettyLine } from './console-logger';
export { BufferLogger, createBufferLogger } from './buffer-logger';
