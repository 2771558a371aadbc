/**
 * Tests for completion counters
 */

import { describe, it, expect } from 'vitest';
import { CompletionMetrics } from './completion-metrics';

describe('CompletionMetrics', () => {
  it('should start empty', () => {
    expect(new CompletionMetrics().snapshot()).toEqual({
      requestCount: 0,
      successCount: 0,
      errorCount: 0,
      timeoutCount: 0,
      cancelledCount: 0,
      totalDurationMs: 0,
      averageDurationMs: 0,
    });
  });

  it('should count each outcome kind', () => {
    const metrics = new CompletionMetrics();
    for (const kind of ['output', 'output', 'failed', 'timed_out', 'cancelled'] as const) {
      metrics.recordRequest();
      metrics.recordOutcome(kind);
    }
    metrics.recordRequest();
    metrics.recordRejected();

    expect(metrics.snapshot()).toMatchObject({
      requestCount: 6,
      successCount: 2,
      errorCount: 2,
      timeoutCount: 1,
      cancelledCount: 1,
    });
  });

  it('should average durations over all requests, rounded', () => {
    const metrics = new CompletionMetrics();
    metrics.recordRequest();
    metrics.recordDuration(100);
    metrics.recordRequest();
    metrics.recordDuration(201);

    expect(metrics.averageDurationMs()).toBe(151);
    expect(metrics.snapshot().totalDurationMs).toBe(301);
  });
});
