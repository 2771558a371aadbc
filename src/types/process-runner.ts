/**
 * ProcessRunner interface
 * Abstracts subprocess execution for testability
 */

/**
 * Options for spawning a subprocess
 */
export interface SpawnOptions {
  /** Arguments to pass to the command */
  args: string[];
  /** Working directory for the subprocess (defaults to process.cwd()) */
  cwd?: string;
  /** Environment variables (merged with process.env) */
  env?: Record<string, string>;
  /**
   * Aborting this signal terminates the subprocess.
   * SIGTERM is sent first, SIGKILL after `killGraceMs`.
   */
  signal?: AbortSignal;
  /** Delay between SIGTERM and SIGKILL once aborted (default: 5000) */
  killGraceMs?: number;
  /** Number of stderr lines to keep in the tail buffer */
  tailLines?: number;
}

/**
 * Result from a subprocess that ran to completion
 */
export interface SpawnResult {
  /** Exit code from the subprocess, null when killed by a signal */
  exitCode: number | null;
  /** Signal that terminated the process, if any */
  signal?: NodeJS.Signals;
  /** Full captured standard output */
  stdout: Buffer;
  /** Last N lines of stderr */
  stderrTail: string[];
  /** Duration of execution in milliseconds */
  durationMs: number;
  /** Whether the process was terminated because the abort signal fired */
  aborted: boolean;
}

/**
 * Interface for running subprocesses
 * Implementations can be real (child_process) or mock (for testing)
 */
export interface ProcessRunner {
  /**
   * Spawn a subprocess and wait for it to exit.
   * Rejects when the process cannot be started at all.
   */
  spawn(command: string, options: SpawnOptions): Promise<SpawnResult>;

  /**
   * Number of processes currently tracked as running
   */
  runningCount?(): number;
}
