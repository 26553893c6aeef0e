/**
 * Sliding-window rate limiter.
 * Keeps the timestamps of admitted events and rejects a new one when the
 * trailing window already holds `limit` of them.
 */
export class RateLimiter {
  private readonly windowMs: number;
  private readonly limit: number;
  private timestamps: number[] = [];

  constructor(windowMs: number, limit: number) {
    this.windowMs = windowMs;
    this.limit = limit;
  }

  /** Drop timestamps that are at least `windowMs` old. */
  prune(now: number): void {
    this.timestamps = this.timestamps.filter((t) => now - t < this.windowMs);
  }

  /**
   * Admit and record an event at `now`, or reject it without recording.
   */
  tryAcquire(now: number): boolean {
    this.prune(now);
    if (this.timestamps.length >= this.limit) {
      return false;
    }
    this.timestamps.push(now);
    return true;
  }

  /** Record an event without checking the limit. */
  record(now: number): void {
    this.timestamps.push(now);
  }

  get size(): number {
    return this.timestamps.length;
  }
}
