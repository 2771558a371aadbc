/**
 * Engines module - subprocess execution
 */

export { RealProcessRunner, TailBuffer, createRealProcessRunner } from './real-process-runner';

export type { MockProcessConfig } from './mock-process-runner';
export {
  MockProcessRunner,
  createMockProcessRunner,
  createSuccessfulMockRunner,
  createFailingMockRunner,
  createHangingMockRunner,
} from './mock-process-runner';

export type { RequestScope } from './request-scope';
export { DeadlineExceededError, MAX_TIMER_DELAY_MS, createRequestScope, isTimeoutReason } from './request-scope';

export type { CancellableExecutorOptions } from './cancellable-executor';
export { CancellableExecutor, createCancellableExecutor } from './cancellable-executor';
