/**
 * Library entry point
 */

export { SERVER_NAME, VERSION } from './version';

export * from './types';
export * from './config';
export * from './core';
export * from './engines';
export * from './logging';

export { CompletionMetrics } from './completion/completion-metrics';
export type { CompletionMetricsSnapshot } from './completion/completion-metrics';
export { CompletionService, COMPLETION_TOOL_NAME, createCompletionService } from './completion/completion-service';
export type { CompletionServiceOptions } from './completion/completion-service';

export {
  completionArgumentsShape,
  completionArgumentsSchema,
  toCompletionOverrides,
} from './schemas/completion-arguments.schema';
export type { CompletionArguments } from './schemas/completion-arguments.schema';

export { createCompletionMcpServer, COMPLETION_TOOL_DESCRIPTION } from './server/mcp-server';
export type { ServerIdentity } from './server/mcp-server';
export { createHttpApp, startHttpServer, closeHttpServer, getListeningPort } from './server/http-server';
export type { HttpAppOptions } from './server/http-server';
export { startCompletionServer } from './server/run-server';
export type { CompletionServerOptions, RunningCompletionServer } from './server/run-server';
