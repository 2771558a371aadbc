/**
 * Per-request cancellation scope
 * One AbortSignal carries both the request deadline and any external
 * cancellation (server shutdown).
 */

/**
 * Abort reason used when the deadline elapses.
 * Named like the reason of AbortSignal.timeout() so both classify the same.
 */
export class DeadlineExceededError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`deadline of ${timeoutMs}ms exceeded`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Largest delay setTimeout honours; anything above fires after 1ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface RequestScope {
  /** Aborted when the deadline passes or the parent is aborted */
  readonly signal: AbortSignal;
  /** Release the deadline timer and the parent listener */
  dispose(): void;
}

/**
 * Create a scope that aborts after `timeoutMs` or when `parent` aborts
 */
export function createRequestScope(timeoutMs: number, parent?: AbortSignal): RequestScope {
  const controller = new AbortController();

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };

  // Longer deadlines are covered by re-arming the timer until none remains
  let remainingMs = timeoutMs;
  let timer: NodeJS.Timeout;
  const arm = (): void => {
    const delay = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
    timer = setTimeout(() => {
      remainingMs -= delay;
      if (remainingMs > 0) {
        arm();
      } else {
        controller.abort(new DeadlineExceededError(timeoutMs));
      }
    }, delay);
    timer.unref();
  };
  arm();

  if (parent) {
    if (parent.aborted) {
      onParentAbort();
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Whether an abort reason means the deadline elapsed
 */
export function isTimeoutReason(reason: unknown): boolean {
  return typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError';
}
