/**
 * Real ProcessRunner implementation
 * Uses child_process.spawn for subprocess execution
 */

import { spawn, ChildProcess } from 'child_process';
import { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

const DEFAULT_KILL_GRACE_MS = 5000;

/**
 * Circular buffer to track last N lines of output
 */
export class TailBuffer {
  private lines: string[] = [];
  private buffer: string = '';
  private readonly maxLines: number;

  constructor(maxLines: number = 20) {
    this.maxLines = maxLines;
  }

  append(data: string): void {
    this.buffer += data;
    const parts = this.buffer.split('\n');
    // Keep incomplete line in buffer
    this.buffer = parts.pop() ?? '';
    for (const line of parts) {
      this.lines.push(line);
      if (this.lines.length > this.maxLines) {
        this.lines.shift();
      }
    }
  }

  getLines(): string[] {
    if (this.buffer) {
      return [...this.lines, this.buffer].slice(-this.maxLines);
    }
    return [...this.lines];
  }
}

/**
 * Real implementation of ProcessRunner using child_process
 */
export class RealProcessRunner implements ProcessRunner {
  private runningProcesses: Map<number, ChildProcess> = new Map();
  private processIdCounter = 0;

  async spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    const startTime = Date.now();
    const stdoutChunks: Buffer[] = [];
    const stderrTail = new TailBuffer(options.tailLines ?? 20);
    const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    const abortSignal = options.signal;

    return new Promise((resolve, reject) => {
      const env = options.env ? { ...process.env, ...options.env } : process.env;

      // Spawn the process (shell: false so prompts are never interpreted)
      const child = spawn(command, options.args, {
        cwd: options.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
      });

      const processId = ++this.processIdCounter;
      this.runningProcesses.set(processId, child);

      let settled = false;
      let aborted = false;
      let killTimer: NodeJS.Timeout | undefined;

      const onAbort = (): void => {
        aborted = true;
        child.kill('SIGTERM');
        // Escalate if the program ignores SIGTERM
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }, killGraceMs);
        killTimer.unref();
      };

      const release = (): void => {
        this.runningProcesses.delete(processId);
        abortSignal?.removeEventListener('abort', onAbort);
        if (killTimer) {
          clearTimeout(killTimer);
        }
      };

      if (abortSignal) {
        if (abortSignal.aborted) {
          onAbort();
        } else {
          abortSignal.addEventListener('abort', onAbort, { once: true });
        }
      }

      if (child.stdout) {
        child.stdout.on('data', (data: Buffer) => {
          stdoutChunks.push(data);
        });
      }

      if (child.stderr) {
        child.stderr.on('data', (data: Buffer) => {
          stderrTail.append(data.toString());
        });
      }

      child.on('close', (code, sig) => {
        release();
        if (settled) {
          return;
        }
        settled = true;
        resolve({
          exitCode: code,
          signal: sig ?? undefined,
          stdout: Buffer.concat(stdoutChunks),
          stderrTail: stderrTail.getLines(),
          durationMs: Date.now() - startTime,
          aborted,
        });
      });

      // Spawn failures (missing binary, permission denied)
      child.on('error', (error) => {
        release();
        if (settled) {
          return;
        }
        settled = true;
        reject(error);
      });
    });
  }

  runningCount(): number {
    return this.runningProcesses.size;
  }
}

/**
 * Create a real process runner instance
 */
export function createRealProcessRunner(): ProcessRunner {
  return new RealProcessRunner();
}
