export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
}

/**
 * Counts requests per caller key. Implementations backed by a shared store
 * must make the check and the increment a single atomic step.
 */
export interface RateLimiter {
  consume(key: string): Promise<RateLimitDecision>;
}

export interface SlidingWindowOptions {
  limit: number;
  windowMs: number;
  now?: () => number;
}

/**
 * Process-local sliding-window log. The check and the record happen in one
 * synchronous step, so concurrent requests for the same key cannot both slip
 * under the limit.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly windows = new Map<string, number[]>();
  private readonly now: () => number;

  constructor(private readonly options: SlidingWindowOptions) {
    this.now = options.now ?? Date.now;
  }

  async consume(key: string): Promise<RateLimitDecision> {
    return this.hit(key);
  }

  hit(key: string): RateLimitDecision {
    const now = this.now();
    const cutoff = now - this.options.windowMs;
    const log = (this.windows.get(key) ?? []).filter(time => time > cutoff);

    const oldest = log[0];
    if (log.length >= this.options.limit && oldest !== undefined) {
      this.windows.set(key, log);
      return {
        allowed: false,
        remaining: 0,
        retryAfterMs: oldest + this.options.windowMs - now,
      };
    }

    log.push(now);
    this.windows.set(key, log);

    return {
      allowed: true,
      remaining: this.options.limit - log.length,
      retryAfterMs: 0,
    };
  }

  /** Drops keys whose whole log has aged out of the window. */
  prune(): number {
    const cutoff = this.now() - this.options.windowMs;
    let dropped = 0;
    for (const [key, log] of this.windows) {
      if (log.every(time => time <= cutoff)) {
        this.windows.delete(key);
        dropped += 1;
      }
    }
    return dropped;
  }

  get trackedKeys(): number {
    return this.windows.size;
  }
}
