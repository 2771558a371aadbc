/**
 * Clock interface
 * Abstracts time operations for testability and determinism
 */

/**
 * Interface for time operations
 * Implementations can be real (system clock) or mock (for testing)
 */
export interface Clock {
  /**
   * Get the current time as a Unix timestamp (milliseconds)
   */
  timestamp(): number;

  /**
   * Get the current time as an ISO 8601 string
   */
  iso(): string;
}

/**
 * Real implementation of Clock using system time
 */
export class SystemClock implements Clock {
  timestamp(): number {
    return Date.now();
  }

  iso(): string {
    return new Date().toISOString();
  }
}

/**
 * Mock implementation of Clock for testing
 * Time only moves when advanced
 */
export class MockClock implements Clock {
  private currentTime: number;

  constructor(initialTime?: Date) {
    this.currentTime = (initialTime ?? new Date('2025-01-01T00:00:00.000Z')).getTime();
  }

  timestamp(): number {
    return this.currentTime;
  }

  iso(): string {
    return new Date(this.currentTime).toISOString();
  }

  /**
   * Advance time by the specified duration
   */
  advance(ms: number): void {
    this.currentTime += ms;
  }
}
