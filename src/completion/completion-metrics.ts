/**
 * Completion request counters
 * Shared by every request a service handles; all updates are synchronous.
 */

import { ExecutionOutcomeKind } from '../types/execution-outcome';

export interface CompletionMetricsSnapshot {
  requestCount: number;
  successCount: number;
  errorCount: number;
  timeoutCount: number;
  cancelledCount: number;
  totalDurationMs: number;
  averageDurationMs: number;
}

export class CompletionMetrics {
  private requestCount = 0;
  private successCount = 0;
  private errorCount = 0;
  private timeoutCount = 0;
  private cancelledCount = 0;
  private totalDurationMs = 0;

  recordRequest(): void {
    this.requestCount++;
  }

  /**
   * Count a request that was rejected before anything ran
   */
  recordRejected(): void {
    this.errorCount++;
  }

  recordOutcome(kind: ExecutionOutcomeKind): void {
    switch (kind) {
      case 'output':
        this.successCount++;
        break;
      case 'failed':
        this.errorCount++;
        break;
      case 'timed_out':
        this.timeoutCount++;
        break;
      case 'cancelled':
        this.cancelledCount++;
        break;
    }
  }

  recordDuration(durationMs: number): void {
    this.totalDurationMs += durationMs;
  }

  averageDurationMs(): number {
    return this.requestCount === 0 ? 0 : Math.round(this.totalDurationMs / this.requestCount);
  }

  snapshot(): CompletionMetricsSnapshot {
    return {
      requestCount: this.requestCount,
      successCount: this.successCount,
      errorCount: this.errorCount,
      timeoutCount: this.timeoutCount,
      cancelledCount: this.cancelledCount,
      totalDurationMs: this.totalDurationMs,
      averageDurationMs: this.averageDurationMs(),
    };
  }
}
