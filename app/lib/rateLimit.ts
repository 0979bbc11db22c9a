/**
 * In-memory sliding window rate limiter.
 *
 * Each instance owns its own key → timestamps map, so the standard and strict
 * tiers never share counters and tests get a fresh limiter per case. State is
 * lost on restart.
 *
 * `check` is synchronous: on the Node event loop the prune, count and record
 * steps for a key cannot interleave with another request's check.
 */

export type Clock = () => number;

export type RateLimitResult =
  | { limited: false; remaining: number }
  | { limited: true; retryAfterMs: number };

export interface RateLimiterOptions {
  /** Max admitted requests per key within the window. */
  limit: number;
  windowMs: number;
  now?: Clock;
  /** How often idle keys are swept (default 5 min). */
  cleanupIntervalMs?: number;
}

export class RateLimiter {
  readonly limit: number;
  readonly windowMs: number;
  private readonly now: Clock;
  private readonly cleanupIntervalMs: number;
  private readonly store = new Map<string, number[]>();
  private lastCleanup: number;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new RangeError(`Rate limit must be a positive integer, got ${options.limit}`);
    }
    if (!(options.windowMs > 0)) {
      throw new RangeError(`Rate limit window must be positive, got ${options.windowMs}`);
    }
    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? 5 * 60 * 1000;
    this.lastCleanup = this.now();
  }

  /**
   * Admit or reject one request for `key`. An admitted request is recorded;
   * a rejected one is not.
   */
  check(key: string): RateLimitResult {
    const now = this.now();
    this.cleanup(now);

    const cutoff = now - this.windowMs;
    const timestamps = (this.store.get(key) ?? []).filter((t) => t > cutoff);

    if (timestamps.length >= this.limit) {
      this.store.set(key, timestamps);
      // Oldest relevant timestamp determines when the window slides enough.
      const retryAfterMs = timestamps[0] + this.windowMs - now;
      return { limited: true, retryAfterMs: Math.max(retryAfterMs, 1) };
    }

    timestamps.push(now);
    this.store.set(key, timestamps);
    return { limited: false, remaining: this.limit - timestamps.length };
  }

  /** Number of keys currently tracked. */
  size(): number {
    return this.store.size;
  }

  reset(): void {
    this.store.clear();
    this.lastCleanup = this.now();
  }

  // Periodic sweep to prevent unbounded memory growth.
  private cleanup(now: number): void {
    if (now - this.lastCleanup < this.cleanupIntervalMs) return;
    this.lastCleanup = now;
    const cutoff = now - this.windowMs;
    for (const [key, timestamps] of this.store) {
      const live = timestamps.filter((t) => t > cutoff);
      if (live.length === 0) this.store.delete(key);
      else this.store.set(key, live);
    }
  }
}

/**
 * Client identity for admission: first X-Forwarded-For hop, then X-Real-IP.
 */
export function clientKey(headers: Headers): string {
  return (
    headers.get("x-forwarded-for")?.split(",")[0]?.trim() ||
    headers.get("x-real-ip")?.trim() ||
    "unknown"
  );
}
