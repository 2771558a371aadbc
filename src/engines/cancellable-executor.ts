/**
 * Cancellable Executor
 * Runs the external program under an AbortSignal and classifies the result.
 *
 * The process wait races the signal. Whichever settles first decides the
 * outcome; when the signal wins, the child is told to terminate through a
 * linked AbortController and the call returns without waiting for it.
 */

import { ProcessRunner, SpawnResult } from '../types/process-runner';
import {
  ExecutionOutcome,
  ProcessExitError,
  ProcessLaunchError,
} from '../types/execution-outcome';
import { Logger } from '../types/logger';
import { Clock, SystemClock } from '../types/clock';
import { isTimeoutReason } from './request-scope';

/**
 * Options for creating an executor
 */
export interface CancellableExecutorOptions {
  /** Process runner for subprocess execution */
  processRunner: ProcessRunner;
  logger?: Logger;
  clock?: Clock;
  /** Working directory for the external program */
  workingDirectory?: string;
  /** Delay between SIGTERM and SIGKILL once a run is abandoned */
  killGraceMs?: number;
}

type Settled =
  | { type: 'exited'; result: SpawnResult }
  | { type: 'launch_failed'; error: Error }
  | { type: 'aborted' };

export class CancellableExecutor {
  private readonly processRunner: ProcessRunner;
  private readonly logger?: Logger;
  private readonly clock: Clock;
  private readonly workingDirectory?: string;
  private readonly killGraceMs?: number;

  constructor(options: CancellableExecutorOptions) {
    this.processRunner = options.processRunner;
    this.logger = options.logger;
    this.clock = options.clock ?? new SystemClock();
    this.workingDirectory = options.workingDirectory;
    this.killGraceMs = options.killGraceMs;
  }

  /**
   * Run `executablePath` with `args` until it exits or `signal` aborts
   */
  async execute(executablePath: string, args: string[], signal: AbortSignal): Promise<ExecutionOutcome> {
    const startedAt = this.clock.timestamp();
    const elapsed = (): number => this.clock.timestamp() - startedAt;

    // Never start a process for a request that is already over
    if (signal.aborted) {
      return this.abortedOutcome(signal, elapsed());
    }

    const processController = new AbortController();
    let onAbort: () => void = () => undefined;
    const abortWatcher = new Promise<Settled>((resolve) => {
      onAbort = () => {
        processController.abort(signal.reason);
        resolve({ type: 'aborted' });
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });

    this.logger?.event('process_spawned', `Starting ${executablePath}`, {
      command: executablePath,
      argCount: args.length,
    });

    const completion: Promise<Settled> = this.processRunner
      .spawn(executablePath, {
        args,
        cwd: this.workingDirectory,
        signal: processController.signal,
        killGraceMs: this.killGraceMs,
      })
      .then(
        (result): Settled => ({ type: 'exited', result }),
        (error: unknown): Settled => ({ type: 'launch_failed', error: toError(error) })
      );

    try {
      const settled = await Promise.race([completion, abortWatcher]);
      const durationMs = elapsed();

      switch (settled.type) {
        case 'aborted':
          this.logger?.event('process_killed', `Terminating ${executablePath}`, {
            command: executablePath,
            reason: isTimeoutReason(signal.reason) ? 'timeout' : 'cancelled',
          });
          return this.abortedOutcome(signal, durationMs);

        case 'launch_failed':
          return {
            kind: 'failed',
            error: new ProcessLaunchError(executablePath, settled.error),
            durationMs,
          };

        case 'exited':
          return this.exitedOutcome(executablePath, settled.result, signal, durationMs);
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private exitedOutcome(
    executablePath: string,
    result: SpawnResult,
    signal: AbortSignal,
    durationMs: number
  ): ExecutionOutcome {
    this.logger?.event('process_exited', `${executablePath} exited`, {
      command: executablePath,
      exitCode: result.exitCode,
      signal: result.signal,
      stderrTail: result.stderrTail,
    });

    // Killed on our behalf before the abort event reached us
    if (result.aborted && signal.aborted) {
      return this.abortedOutcome(signal, durationMs);
    }

    if (result.exitCode === 0) {
      return { kind: 'output', stdout: result.stdout, durationMs };
    }

    return {
      kind: 'failed',
      error: new ProcessExitError(result.exitCode, result.signal, result.stderrTail),
      durationMs,
    };
  }

  private abortedOutcome(signal: AbortSignal, durationMs: number): ExecutionOutcome {
    if (isTimeoutReason(signal.reason)) {
      return { kind: 'timed_out', durationMs };
    }
    return { kind: 'cancelled', durationMs };
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Create an executor
 */
export function createCancellableExecutor(options: CancellableExecutorOptions): CancellableExecutor {
  return new CancellableExecutor(options);
}
