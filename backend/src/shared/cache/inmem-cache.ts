/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev if Redis is down) to run without external infra.
 * - The clock is injectable so tests can move time past a TTL without sleeping.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - const cache = new InMemCache(() => clock.nowMs)
 *
 * ATOMICITY:
 * - Every method body runs synchronously before its promise resolves, so no other
 *   caller can observe a half-applied getDel/incr.
 */

import type { Cache, CacheIncrOptions, CacheSetOptions } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();

  constructor(private readonly clock: () => number = Date.now) {}

  private now(): number {
    return this.clock();
  }

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    const expiresAtMs = opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null;

    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    return Promise.resolve();
  }

  getDel(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    if (!entry) return Promise.resolve(null);

    this.store.delete(key);
    return Promise.resolve(entry.value);
  }

  expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.getEntry(key);
    if (!entry) return Promise.resolve(false);

    entry.expiresAtMs = this.now() + ttlSeconds * 1000;
    return Promise.resolve(true);
  }

  incr(key: string, opts?: CacheIncrOptions): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    let expiresAtMs = entry?.expiresAtMs ?? null;
    if (opts?.ttlSeconds && (opts.sliding || expiresAtMs === null)) {
      expiresAtMs = this.now() + opts.ttlSeconds * 1000;
    }

    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }

  ttl(key: string): Promise<number | null> {
    const entry = this.getEntry(key);
    if (!entry || entry.expiresAtMs === null) return Promise.resolve(null);

    return Promise.resolve(Math.ceil((entry.expiresAtMs - this.now()) / 1000));
  }
}
