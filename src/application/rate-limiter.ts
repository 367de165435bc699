export interface AuthFailureLimiterOptions {
  /** Failures allowed per origin inside one window before it is blocked. */
  maxFailures: number;
  windowMs: number;
  /** Upper bound on tracked origins; the oldest counter is evicted first. */
  maxOrigins: number;
  nowFn?: () => number;
}

interface FailureCounter {
  count: number;
  windowStart: number;
}

/**
 * Per-origin counter of authentication failures.
 *
 * Windows are fixed, starting at the first failure. Expired counters are
 * dropped lazily on access and by `sweep()`. The map keeps insertion
 * order, so eviction at `maxOrigins` removes the least recently failing
 * origin.
 */
export class AuthFailureLimiter {
  private readonly counters: Map<string, FailureCounter> = new Map();
  private readonly maxFailures: number;
  private readonly windowMs: number;
  private readonly maxOrigins: number;
  private readonly nowFn: () => number;

  constructor(options: AuthFailureLimiterOptions) {
    this.maxFailures = options.maxFailures;
    this.windowMs = options.windowMs;
    this.maxOrigins = options.maxOrigins;
    this.nowFn = options.nowFn ?? Date.now;
  }

  isBlocked(origin: string): boolean {
    const counter = this.live(origin);
    return counter !== undefined && counter.count >= this.maxFailures;
  }

  /** Records one failure and returns the origin's count in the current window. */
  recordFailure(origin: string): number {
    const counter = this.live(origin) ?? { count: 0, windowStart: this.nowFn() };
    counter.count++;

    // re-insert so the map order tracks recency
    this.counters.delete(origin);
    this.counters.set(origin, counter);

    while (this.counters.size > this.maxOrigins) {
      const oldest = this.counters.keys().next();
      if (oldest.done) break;
      this.counters.delete(oldest.value);
    }

    return counter.count;
  }

  reset(origin: string): void {
    this.counters.delete(origin);
  }

  /** Drops every expired counter. Returns how many were removed. */
  sweep(): number {
    let removed = 0;
    const now = this.nowFn();
    for (const [origin, counter] of this.counters) {
      if (now - counter.windowStart >= this.windowMs) {
        this.counters.delete(origin);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.counters.size;
  }

  private live(origin: string): FailureCounter | undefined {
    const counter = this.counters.get(origin);
    if (counter === undefined) return undefined;
    if (this.nowFn() - counter.windowStart >= this.windowMs) {
      this.counters.delete(origin);
      return undefined;
    }
    return counter;
  }
}
