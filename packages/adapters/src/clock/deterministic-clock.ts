import type { ClockPort } from '@valuation/domain';

/**
 * Clock pinned to a fixed instant, for tests and reproducible runs.
 * `now()` returns the same time until `advance()` or `set()` moves it.
 */
export class DeterministicClock implements ClockPort {
  private currentMs: number;

  constructor(epoch: Date | number) {
    this.currentMs = typeof epoch === 'number' ? epoch : epoch.getTime();
  }

  now(): Date {
    return new Date(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }

  advanceDays(days: number): void {
    this.advance(days * 86_400_000);
  }

  set(at: Date): void {
    this.currentMs = at.getTime();
  }
}

/** Wall-clock implementation for live mode. */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}
