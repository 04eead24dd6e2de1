/**
 * Sliding-window limiter for model calls
 *
 * Keeps the timestamps of the calls made in the last window; a call is
 * allowed while fewer than `limit` remain.
 */
export class RateLimiter {
  private calls: number[] = [];

  constructor(
    private readonly limit: number,
    private readonly windowMs: number = 60_000,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Record a call if the limit allows it
   *
   * @returns false when the call must be refused
   */
  tryAcquire(): boolean {
    const now = this.now();
    this.calls = this.calls.filter((at) => now - at < this.windowMs);
    if (this.calls.length >= this.limit) {
      return false;
    }
    this.calls.push(now);
    return true;
  }

  /**
   * Milliseconds until the next call would be allowed (0 when allowed now)
   */
  retryAfterMs(): number {
    const now = this.now();
    const active = this.calls.filter((at) => now - at < this.windowMs);
    if (active.length < this.limit) {
      return 0;
    }
    const oldest = active[0] ?? now;
    return Math.max(0, this.windowMs - (now - oldest));
  }

  reset(): void {
    this.calls = [];
  }
}
