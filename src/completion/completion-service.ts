/**
 * Completion Service
 * Handles one generate_completion call: validates the prompt, resolves the
 * llama-cli arguments, runs the program under the request deadline and turns
 * the outcome into response text.
 */

import { randomUUID } from 'crypto';
import { CompletionOverrides, CompletionResponse } from '../types/completion';
import { EffectiveConfig, getTimeoutSeconds } from '../types/llama-config';
import { ExecutionOutcome, ProcessExitError } from '../types/execution-outcome';
import { Logger, truncateForLog } from '../types/logger';
import { Clock, SystemClock } from '../types/clock';
import { resolveLlamaArgs } from '../core/resolve-llama-args';
import { CancellableExecutor } from '../engines/cancellable-executor';
import { createRequestScope } from '../engines/request-scope';
import { CompletionMetrics } from './completion-metrics';

export const COMPLETION_TOOL_NAME = 'generate_completion';

/**
 * Options for creating a completion service
 */
export interface CompletionServiceOptions {
  config: EffectiveConfig;
  executor: CancellableExecutor;
  logger: Logger;
  clock?: Clock;
  /** Aborted on server shutdown; cancels every in-flight completion */
  shutdownSignal?: AbortSignal;
  /** Request id factory (defaults to random UUIDs) */
  createRequestId?: () => string;
}

export class CompletionService {
  readonly metrics = new CompletionMetrics();
  private readonly config: EffectiveConfig;
  private readonly executor: CancellableExecutor;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly shutdownSignal?: AbortSignal;
  private readonly createRequestId: () => string;

  constructor(options: CompletionServiceOptions) {
    this.config = options.config;
    this.executor = options.executor;
    this.logger = options.logger;
    this.clock = options.clock ?? new SystemClock();
    this.shutdownSignal = options.shutdownSignal;
    this.createRequestId = options.createRequestId ?? randomUUID;
  }

  async complete(overrides: CompletionOverrides): Promise<CompletionResponse> {
    const log = this.logger.child({ requestId: this.createRequestId(), tool: COMPLETION_TOOL_NAME });
    const startedAt = this.clock.timestamp();
    this.metrics.recordRequest();

    try {
      if (overrides.prompt === '') {
        log.warn('Empty prompt received');
        this.metrics.recordRejected();
        return { text: 'Error: Prompt cannot be empty', isError: true };
      }

      log.event('completion_requested', `Handling completion request for prompt: ${truncateForLog(overrides.prompt)}`);

      const timeoutSeconds = getTimeoutSeconds(this.config.app);
      const args = resolveLlamaArgs(this.config.llama, overrides);
      log.debug(`Starting completion with timeout of ${timeoutSeconds} seconds`, { argCount: args.length });

      const scope = createRequestScope(timeoutSeconds * 1000, this.shutdownSignal);
      let outcome: ExecutionOutcome;
      try {
        outcome = await this.executor.execute(this.config.app.llamaCliPath, args, scope.signal);
      } finally {
        scope.dispose();
      }

      this.metrics.recordOutcome(outcome.kind);
      return this.toResponse(outcome, timeoutSeconds, log);
    } finally {
      const durationMs = this.clock.timestamp() - startedAt;
      this.metrics.recordDuration(durationMs);
      log.info(`Request completed in ${durationMs}ms (avg: ${this.metrics.averageDurationMs()}ms)`);
    }
  }

  private toResponse(outcome: ExecutionOutcome, timeoutSeconds: number, log: Logger): CompletionResponse {
    switch (outcome.kind) {
      case 'output': {
        const text = outcome.stdout.toString('utf-8');
        log.event('completion_succeeded', `Completion generated successfully, output length: ${text.length} chars`);
        return { text, isError: false };
      }

      case 'timed_out':
        log.event('completion_timed_out', `Completion timed out after ${timeoutSeconds} seconds`);
        return { text: `Error: Completion timed out after ${timeoutSeconds} seconds`, isError: true };

      case 'cancelled':
        log.event('completion_cancelled', 'Completion cancelled by server shutdown');
        return { text: 'Error: Completion cancelled', isError: true };

      case 'failed':
        log.event('completion_failed', `Error generating completion: ${outcome.error.message}`, {
          stderrTail: outcome.error instanceof ProcessExitError ? outcome.error.stderrTail : undefined,
        });
        return { text: `Error generating completion: ${outcome.error.message}`, isError: true };
    }
  }
}

/**
 * Create a completion service
 */
export function createCompletionService(options: CompletionServiceOptions): CompletionService {
  return new CompletionService(options);
}
