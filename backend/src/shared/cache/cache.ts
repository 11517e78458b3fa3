/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Recovery tokens, rate-limit counters and client credentials are short-lived
 *   and must be fast and externalized.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.getDel(key) -> atomic read-and-delete (one-time tokens)
 * - cache.expire(key, ttlSeconds) -> reset the lifetime of an existing key
 * - cache.incr(key, { ttlSeconds }) -> counter with expiration
 * - cache.incr(key, { ttlSeconds, sliding: true }) -> every hit pushes expiry out again
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export interface CacheIncrOptions {
  ttlSeconds?: number;

  /**
   * When true the TTL is re-applied on every increment (window slides with activity).
   * When false the TTL is only applied if the key has none yet (fixed window).
   */
  sliding?: boolean;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /**
   * Atomically returns the value and deletes the key.
   * Two concurrent callers can never both observe the same value.
   */
  getDel(key: string): Promise<string | null>;

  /**
   * Atomically increment a counter and (optionally) ensure it expires.
   * Returns the new value.
   */
  incr(key: string, opts?: CacheIncrOptions): Promise<number>;

  /**
   * Resets the lifetime of an existing key. Returns false when the key is missing
   * (a missing key is never recreated).
   */
  expire(key: string, ttlSeconds: number): Promise<boolean>;

  /**
   * Remaining lifetime in seconds, or null when the key is missing or has no expiry.
   */
  ttl(key: string): Promise<number | null>;
}
