/**
 * Sliding-Window Rate Limiter — per-client admission control
 *
 * Keeps the timestamps (ms) of recent requests per client key. A timestamp
 * counts while `now - t < windowMs`; older ones are pruned lazily whenever
 * the key is touched. The default clock is monotonic; an injected clock may
 * step backwards, so entries are not assumed to be in order.
 *
 * Two ways to use it:
 *   - admit() then record(): check-then-act, left to the caller
 *   - tryAcquire(): admit-and-record in one synchronous step. Handlers run
 *     on a single thread, so no other request can interleave and the quota
 *     is a hard limit.
 *
 * Keys are never removed by admission itself; evictStale() drops keys whose
 * timestamps have all left the window and is meant to run on a schedule.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
  /** Clock in milliseconds. Defaults to a monotonic epoch-based clock. */
  now?: () => number;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Time until a slot frees up; 0 when allowed. */
  retryAfterMs: number;
}

/** Wall-clock epoch that never steps backwards within a process. */
function monotonicNow(): number {
  return performance.timeOrigin + performance.now();
}

// ---------------------------------------------------------------------------
// Limiter
// ---------------------------------------------------------------------------

export class SlidingWindowRateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  private readonly now: () => number;
  private readonly hits = new Map<string, number[]>();

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.maxRequests) || options.maxRequests < 1) {
      throw new RangeError(`maxRequests must be a positive integer, got ${options.maxRequests}`);
    }
    if (!Number.isFinite(options.windowMs) || options.windowMs <= 0) {
      throw new RangeError(`windowMs must be positive, got ${options.windowMs}`);
    }
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs;
    this.now = options.now ?? monotonicNow;
  }

  private isLive(timestamp: number, now: number): boolean {
    return now - timestamp < this.windowMs;
  }

  /** Drop timestamps that left the window; returns what remains. */
  private prune(clientKey: string, now: number): number[] {
    const timestamps = this.hits.get(clientKey);
    if (!timestamps) return [];

    const live = timestamps.filter((t) => this.isLive(t, now));
    if (live.length !== timestamps.length) this.hits.set(clientKey, live);
    return live;
  }

  /** True iff the client has fewer than `maxRequests` requests in the window. */
  admit(clientKey: string): boolean {
    return this.prune(clientKey, this.now()).length < this.maxRequests;
  }

  /** Append the current time for the client. Call only after admit() returned true. */
  record(clientKey: string): void {
    const now = this.now();
    const timestamps = this.hits.get(clientKey);
    if (timestamps) {
      timestamps.push(now);
    } else {
      this.hits.set(clientKey, [now]);
    }
  }

  /** Atomic admit-and-record. */
  tryAcquire(clientKey: string): RateLimitDecision {
    const now = this.now();
    const timestamps = this.prune(clientKey, now);

    if (timestamps.length >= this.maxRequests) {
      return {
        allowed: false,
        limit: this.maxRequests,
        remaining: 0,
        retryAfterMs: this.retryAfter(timestamps, now),
      };
    }

    timestamps.push(now);
    this.hits.set(clientKey, timestamps);

    return {
      allowed: true,
      limit: this.maxRequests,
      remaining: this.maxRequests - timestamps.length,
      retryAfterMs: 0,
    };
  }

  /**
   * Time until enough entries expire to fall below the quota. record() may
   * have pushed a key past `maxRequests`, so this is not always the oldest.
   */
  private retryAfter(timestamps: readonly number[], now: number): number {
    const sorted = [...timestamps].sort((a, b) => a - b);
    const freesSlot = sorted[sorted.length - this.maxRequests];
    return Math.max(0, freesSlot + this.windowMs - now);
  }

  /**
   * Remove clients with no timestamps inside the window.
   * Returns the number of keys removed.
   */
  evictStale(): number {
    const now = this.now();
    let evicted = 0;
    for (const [clientKey, timestamps] of this.hits) {
      if (!timestamps.some((t) => this.isLive(t, now))) {
        this.hits.delete(clientKey);
        evicted++;
      }
    }
    return evicted;
  }

  /** Number of client keys currently held in memory. */
  trackedClients(): number {
    return this.hits.size;
  }

  reset(): void {
    this.hits.clear();
  }
}
