import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { TestClock } from '../../../helpers/test-clock';

function setup() {
  const clock = new TestClock();
  return { clock, cache: new InMemCache(clock.ms) };
}

describe('InMemCache', () => {
  it('expires keys once their TTL has elapsed', async () => {
    const { clock, cache } = setup();
    await cache.set('k', 'v', { ttlSeconds: 10 });

    clock.advanceSeconds(9);
    await expect(cache.get('k')).resolves.toBe('v');
    await expect(cache.ttl('k')).resolves.toBe(1);

    clock.advanceSeconds(1);
    await expect(cache.get('k')).resolves.toBeNull();
  });

  it('getDel returns the value once', async () => {
    const { cache } = setup();
    await cache.set('k', 'v');

    await expect(cache.getDel('k')).resolves.toBe('v');
    await expect(cache.getDel('k')).resolves.toBeNull();
  });

  it('overwriting without a TTL clears the old expiry', async () => {
    const { clock, cache } = setup();
    await cache.set('k', 'v1', { ttlSeconds: 60 });
    clock.advanceSeconds(30);

    await cache.set('k', 'v2');

    await expect(cache.get('k')).resolves.toBe('v2');
    await expect(cache.ttl('k')).resolves.toBeNull();
  });

  it('fixed-window incr keeps the first expiry', async () => {
    const { clock, cache } = setup();
    await cache.incr('c', { ttlSeconds: 60 });
    clock.advanceSeconds(40);

    await expect(cache.incr('c', { ttlSeconds: 60 })).resolves.toBe(2);
    await expect(cache.ttl('c')).resolves.toBe(20);
  });

  it('sliding incr pushes the expiry out on every hit', async () => {
    const { clock, cache } = setup();
    await cache.incr('c', { ttlSeconds: 60, sliding: true });
    clock.advanceSeconds(40);

    await expect(cache.incr('c', { ttlSeconds: 60, sliding: true })).resolves.toBe(2);
    await expect(cache.ttl('c')).resolves.toBe(60);
  });

  it('ttl is null for keys without expiry and for missing keys', async () => {
    const { cache } = setup();
    await cache.set('k', 'v');

    await expect(cache.ttl('k')).resolves.toBeNull();
    await expect(cache.ttl('missing')).resolves.toBeNull();
  });

  it('expire resets the lifetime of a live key only', async () => {
    const { clock, cache } = setup();
    await cache.set('k', 'v', { ttlSeconds: 60 });

    clock.advanceSeconds(50);
    await expect(cache.expire('k', 60)).resolves.toBe(true);
    await expect(cache.ttl('k')).resolves.toBe(60);

    clock.advanceSeconds(60);
    await expect(cache.expire('k', 60)).resolves.toBe(false);
    await expect(cache.get('k')).resolves.toBeNull();
    await expect(cache.expire('missing', 60)).resolves.toBe(false);
  });
});
