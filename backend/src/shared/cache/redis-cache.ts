/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache used for rate limiting, recovery tokens and credentials.
 *
 * IMPORTANT:
 * - In monorepos, importing RedisClientType can cause type conflicts if multiple copies of
 *   @redis/client exist. We avoid that by deriving the client type from createClient().
 * - getDel relies on GETDEL (Redis >= 6.2). It is the one-time-use guarantee for
 *   recovery tokens; never replace it with GET followed by DEL.
 *
 * LOGGING:
 * - Redis connection errors fire outside any request context (they are client-level events,
 *   not request-level). We use the global logger directly.
 */

import { createClient } from 'redis';
import type { Cache, CacheIncrOptions, CacheSetOptions } from './cache';
import { logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      // Connection-level error: no request context available.
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    if (opts?.ttlSeconds) {
      await this.client.set(key, value, { EX: opts.ttlSeconds });
      return;
    }
    await this.client.set(key, value);
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async getDel(key: string): Promise<string | null> {
    return this.client.getDel(key);
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    return this.client.expire(key, ttlSeconds);
  }

  async incr(key: string, opts?: CacheIncrOptions): Promise<number> {
    const value = await this.client.incr(key);

    if (opts?.ttlSeconds) {
      if (opts.sliding) {
        await this.client.expire(key, opts.ttlSeconds);
      } else {
        const ttl = await this.client.ttl(key);
        if (ttl < 0) {
          await this.client.expire(key, opts.ttlSeconds);
        }
      }
    }

    return value;
  }

  async ttl(key: string): Promise<number | null> {
    const ttl = await this.client.ttl(key);
    // -2: key missing, -1: no expiry
    return ttl < 0 ? null : ttl;
  }
}
