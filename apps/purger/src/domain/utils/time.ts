/**
 * Time provider abstraction for testable time-dependent code.
 * Request signing and caller references both embed the current time.
 */

export interface TimeProvider {
  /** Get current timestamp in milliseconds */
  now(): number;
}

export class SystemTimeProvider implements TimeProvider {
  now(): number {
    return Date.now();
  }
}

/**
 * Mock time provider for testing.
 */
export class MockTimeProvider implements TimeProvider {
  private currentTime: number;

  constructor(initialTime: number = 0) {
    this.currentTime = initialTime;
  }

  now(): number {
    return this.currentTime;
  }

  advanceBy(ms: number): void {
    this.currentTime += ms;
  }
}

/**
 * Compact UTC timestamp, e.g. 2024-01-15T10:30:00.123Z -> "20240115T103000Z"
 */
export function toCompactUtc(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
}
