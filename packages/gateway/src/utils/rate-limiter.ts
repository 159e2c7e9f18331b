/**
 * Sliding window rate limiter.
 *
 * Keeps a pruned list of attempt timestamps per key (a source address)
 * and rejects once `limit` attempts fall inside the rolling window.
 * Rejected attempts are not recorded.
 */
export class SlidingWindowRateLimiter {
  private readonly limit: number;
  private readonly windowMs: number;
  private attempts: Map<string, readonly number[]> = new Map();

  constructor(limit: number, windowMs = 60_000) {
    this.limit = limit;
    this.windowMs = windowMs;
  }

  /**
   * Record an attempt for the given key.
   * Returns true if allowed, false if rate limited.
   */
  allow(key: string): boolean {
    const now = Date.now();
    const recent = this.recent(key, now);

    if (recent.length >= this.limit) {
      this.attempts.set(key, recent);
      return false;
    }

    this.attempts.set(key, [...recent, now]);
    return true;
  }

  /**
   * Drop keys whose attempts have all left the window.
   */
  sweep(): void {
    const now = Date.now();
    for (const key of [...this.attempts.keys()]) {
      if (this.recent(key, now).length === 0) {
        this.attempts.delete(key);
      }
    }
  }

  /**
   * Clear all tracking state.
   */
  clear(): void {
    this.attempts = new Map();
  }

  /** Number of keys currently tracked. */
  get size(): number {
    return this.attempts.size;
  }

  private recent(key: string, now: number): readonly number[] {
    return (this.attempts.get(key) ?? []).filter((at) => now - at < this.windowMs);
  }
}
