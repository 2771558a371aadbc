/**
 * Mock ProcessRunner implementation
 * For testing - returns predefined results without spawning real processes
 */

import { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

/**
 * Configuration for mock process behavior
 */
export interface MockProcessConfig {
  /** Exit code to return (default: 0) */
  exitCode?: number | null;
  /** Signal that terminated the process */
  signal?: NodeJS.Signals;
  /** Stdout content to return */
  stdout?: string;
  /** Stderr lines to return */
  stderrLines?: string[];
  /** Duration to report in milliseconds (default: 100) */
  durationMs?: number;
  /** Delay before returning (simulates actual process time) */
  simulatedDelayMs?: number;
  /** Never exit on its own; only an abort ends the process */
  hang?: boolean;
  /** Error to throw (simulates spawn failure) */
  throwError?: Error;
}

/**
 * Mock implementation of ProcessRunner for testing
 */
export class MockProcessRunner implements ProcessRunner {
  private defaultConfig: MockProcessConfig;
  private commandConfigs: Map<string, MockProcessConfig> = new Map();
  private callHistory: Array<{ command: string; options: SpawnOptions }> = [];
  private running = 0;

  constructor(defaultConfig: MockProcessConfig = {}) {
    this.defaultConfig = {
      exitCode: 0,
      durationMs: 100,
      stdout: '',
      stderrLines: [],
      simulatedDelayMs: 0,
      hang: false,
      ...defaultConfig,
    };
  }

  /**
   * Configure behavior for a specific command
   */
  setCommandConfig(command: string, config: MockProcessConfig): void {
    this.commandConfigs.set(command, config);
  }

  /**
   * Get the call history for verification in tests
   */
  getCallHistory(): Array<{ command: string; options: SpawnOptions }> {
    return [...this.callHistory];
  }

  clearCallHistory(): void {
    this.callHistory = [];
  }

  async spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    this.callHistory.push({ command, options });

    const config = { ...this.defaultConfig, ...this.commandConfigs.get(command) };

    if (config.throwError) {
      throw config.throwError;
    }

    this.running++;
    try {
      const aborted = await this.waitForExit(config, options.signal);
      if (aborted) {
        return {
          exitCode: null,
          signal: 'SIGTERM',
          stdout: Buffer.alloc(0),
          stderrTail: [],
          durationMs: config.durationMs ?? 100,
          aborted: true,
        };
      }
      return {
        exitCode: config.exitCode === undefined ? 0 : config.exitCode,
        signal: config.signal,
        stdout: Buffer.from(config.stdout ?? ''),
        stderrTail: config.stderrLines ?? [],
        durationMs: config.durationMs ?? 100,
        aborted: false,
      };
    } finally {
      this.running--;
    }
  }

  runningCount(): number {
    return this.running;
  }

  /**
   * Resolve true when the signal aborted the simulated process
   */
  private waitForExit(config: MockProcessConfig, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(true);
    }
    const delayMs = config.simulatedDelayMs ?? 0;
    if (!config.hang && delayMs <= 0) {
      return Promise.resolve(false);
    }
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const onAbort = (): void => {
        if (timer) {
          clearTimeout(timer);
        }
        resolve(true);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      if (!config.hang) {
        timer = setTimeout(() => {
          signal?.removeEventListener('abort', onAbort);
          resolve(false);
        }, delayMs);
      }
    });
  }
}

/**
 * Create a mock process runner with optional default config
 */
export function createMockProcessRunner(config?: MockProcessConfig): MockProcessRunner {
  return new MockProcessRunner(config);
}

/**
 * Create a mock process runner that simulates success
 */
export function createSuccessfulMockRunner(stdout: string = ''): MockProcessRunner {
  return new MockProcessRunner({ exitCode: 0, stdout });
}

/**
 * Create a mock process runner that simulates a non-zero exit
 */
export function createFailingMockRunner(
  exitCode: number = 1,
  stderrLines: string[] = ['Error occurred']
): MockProcessRunner {
  return new MockProcessRunner({ exitCode, stderrLines });
}

/**
 * Create a mock process runner whose process never exits on its own
 */
export function createHangingMockRunner(): MockProcessRunner {
  return new MockProcessRunner({ hang: true });
}
