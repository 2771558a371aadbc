/**
 * Server lifecycle
 * Wires runner, executor, completion service and HTTP front end together and
 * tears them down again on shutdown.
 */

import { Server } from 'http';
import { EffectiveConfig } from '../types/llama-config';
import { Logger } from '../types/logger';
import { ProcessRunner } from '../types/process-runner';
import { Clock } from '../types/clock';
import { createRealProcessRunner } from '../engines/real-process-runner';
import { createCancellableExecutor } from '../engines/cancellable-executor';
import { CompletionService, createCompletionService } from '../completion/completion-service';
import { formatConfigForDisplay } from '../config/resolve-config';
import { createCompletionMcpServer, ServerIdentity } from './mcp-server';
import { closeHttpServer, createHttpApp, getListeningPort, startHttpServer } from './http-server';

export interface CompletionServerOptions {
  config: EffectiveConfig;
  logger: Logger;
  identity: ServerIdentity;
  /** Defaults to a child_process-backed runner */
  processRunner?: ProcessRunner;
  clock?: Clock;
  /** Delay between SIGTERM and SIGKILL for abandoned runs */
  killGraceMs?: number;
}

export interface RunningCompletionServer {
  httpServer: Server;
  /** Port actually bound (differs from the configured one when that was 0) */
  port: number;
  service: CompletionService;
  /** Cancel in-flight completions and stop listening */
  shutdown(reason: string): Promise<void>;
}

export async function startCompletionServer(options: CompletionServerOptions): Promise<RunningCompletionServer> {
  const { config, logger, identity } = options;
  const processRunner = options.processRunner ?? createRealProcessRunner();
  const shutdownController = new AbortController();

  const executor = createCancellableExecutor({
    processRunner,
    logger,
    clock: options.clock,
    killGraceMs: options.killGraceMs,
  });
  const service = createCompletionService({
    config,
    executor,
    logger,
    clock: options.clock,
    shutdownSignal: shutdownController.signal,
  });

  const app = createHttpApp({
    endpoint: config.app.endpoint,
    createMcpServer: () => createCompletionMcpServer(service, identity, logger),
    logger,
  });
  const httpServer = await startHttpServer(app, config.app.httpPort);
  const port = getListeningPort(httpServer) ?? config.app.httpPort;

  logger.event('server_started', `MCP server listening on :${port}${config.app.endpoint}`, {
    port,
    endpoint: config.app.endpoint,
  });
  logger.info(formatConfigForDisplay(config));

  let shuttingDown: Promise<void> | undefined;

  const shutdown = (reason: string): Promise<void> => {
    if (!shuttingDown) {
      shuttingDown = (async () => {
        logger.event('shutdown_started', `Shutting down server (${reason})`, {
          inFlight: processRunner.runningCount?.() ?? 0,
        });
        shutdownController.abort(new Error(`server shutting down: ${reason}`));
        await closeHttpServer(httpServer);
        logger.event('shutdown_completed', 'Server stopped', { metrics: service.metrics.snapshot() });
      })();
    }
    return shuttingDown;
  };

  return { httpServer, port, service, shutdown };
}
