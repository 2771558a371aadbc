/**
 * Classified result of one external program run
 * Exactly one variant is produced per execution.
 */

export interface OutputOutcome {
  kind: 'output';
  /** Full standard output of the program */
  stdout: Buffer;
  durationMs: number;
}

export interface FailedOutcome {
  kind: 'failed';
  /** Launch or exit failure, kept for logging */
  error: Error;
  durationMs: number;
}

export interface TimedOutOutcome {
  kind: 'timed_out';
  durationMs: number;
}

export interface CancelledOutcome {
  kind: 'cancelled';
  durationMs: number;
}

export type ExecutionOutcome = OutputOutcome | FailedOutcome | TimedOutOutcome | CancelledOutcome;

export type ExecutionOutcomeKind = ExecutionOutcome['kind'];

/**
 * The program could not be started (missing binary, permission denied, ...)
 */
export class ProcessLaunchError extends Error {
  readonly code: string | undefined;

  constructor(command: string, cause: Error) {
    super(`failed to start ${command}: ${cause.message}`, { cause });
    this.name = 'ProcessLaunchError';
    this.code = getErrorCode(cause);
  }
}

/**
 * The program started but did not exit cleanly
 */
export class ProcessExitError extends Error {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | undefined;
  /** Last lines of stderr, for logs only */
  readonly stderrTail: string[];

  constructor(exitCode: number | null, signal: NodeJS.Signals | undefined, stderrTail: string[]) {
    super(exitCode !== null ? `exit status ${exitCode}` : `signal: ${signal ?? 'unknown'}`);
    this.name = 'ProcessExitError';
    this.exitCode = exitCode;
    this.signal = signal;
    this.stderrTail = stderrTail;
  }
}

function getErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
