/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Enforces per-identity request quotas (session recovery: 3 / hour by default).
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: "rl" })
 * - await limiter.hitOrThrow({ key: "recovery:identity:...", limit: 3, windowSeconds: 3600 })
 * - const decision = await limiter.hit({ key, limit, windowSeconds, sliding: true })
 *
 * TWO MODES:
 * - hitOrThrow: increments counter → throws RateLimitError if over limit.
 * - hit: increments counter → returns a decision with a retry-after hint (no throw),
 *   so the caller can audit the rejection before reporting it.
 *
 * ATOMICITY:
 * - Both methods use INCR-then-check, not check-then-INCR.
 * - INCR is atomic in Redis. Two concurrent requests both increment; the one
 *   that pushes over the limit gets back a value > limit and is rejected.
 *   There is no TOCTOU race.
 */

import type { Cache } from '../cache/cache';

export type RateLimitInput = {
  key: string;
  limit: number;
  windowSeconds: number;
  /** Re-apply the window on every hit instead of only on the first one. */
  sliding?: boolean;
};

export type RateLimitDecision =
  | { allowed: true; count: number }
  | { allowed: false; count: number; retryAfterSeconds: number };

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
    public readonly retryAfterSeconds: number,
  ) {
    super('Rate limit exceeded');
  }
}

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string },
  ) {}

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  /**
   * Increments the counter for `key` and reports whether the caller is still within `limit`.
   * The retry-after hint is the counter's remaining TTL (falls back to the full window).
   */
  async hit(input: RateLimitInput): Promise<RateLimitDecision> {
    const fullKey = this.buildKey(input.key);
    const count = await this.cache.incr(fullKey, {
      ttlSeconds: input.windowSeconds,
      sliding: input.sliding ?? false,
    });

    if (count <= input.limit) {
      return { allowed: true, count };
    }

    const remaining = await this.cache.ttl(fullKey);
    return {
      allowed: false,
      count,
      retryAfterSeconds: remaining ?? input.windowSeconds,
    };
  }

  /**
   * Increments the counter for `key`.
   * Throws RateLimitError if the counter exceeds `limit`.
   */
  async hitOrThrow(input: RateLimitInput): Promise<void> {
    const decision = await this.hit(input);

    if (!decision.allowed) {
      throw new RateLimitError(
        this.buildKey(input.key),
        input.limit,
        input.windowSeconds,
        decision.retryAfterSeconds,
      );
    }
  }
}
