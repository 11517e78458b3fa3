import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { CredentialStore } from '../../../../src/shared/credential/credential.store';
import { CREDENTIAL_KEY_PREFIX } from '../../../../src/shared/credential/credential.types';
import { Sha256TokenHasher } from '../../../../src/shared/security/sha256-token-hasher';
import { TestClock } from '../../../helpers/test-clock';

const SESSION_ID = '6f1c2a34-5b6d-4e7f-8a9b-0c1d2e3f4a5b';
const hasher = new Sha256TokenHasher();

function setup(ttlSeconds = 3600) {
  const clock = new TestClock();
  const cache = new InMemCache(clock.ms);
  return { clock, cache, store: new CredentialStore(cache, hasher, ttlSeconds) };
}

function data(origin: 'created' | 'recovered' | 'refreshed' = 'created') {
  return { sessionId: SESSION_ID, origin, issuedAt: '2026-03-02T09:00:00.000Z' };
}

describe('CredentialStore', () => {
  it('issues a credential that resolves to its session', async () => {
    const { clock, store } = setup();
    const now = clock.now();

    const issued = await store.issue(data(), { now, notAfter: new Date(now.getTime() + 86_400_000) });

    expect(issued.expiresAt).toEqual(new Date(now.getTime() + 3600 * 1000));
    await expect(store.get(issued.credential)).resolves.toEqual(data());
  });

  it('caps the lifetime at the session expiry', async () => {
    const { clock, cache, store } = setup();
    const now = clock.now();

    const issued = await store.issue(data(), { now, notAfter: new Date(now.getTime() + 600_000) });

    expect(issued.expiresAt).toEqual(new Date(now.getTime() + 600_000));
    await expect(cache.ttl(`${CREDENTIAL_KEY_PREFIX}:${hasher.hash(issued.credential)}`)).resolves.toBe(600);

    clock.advanceSeconds(600);
    await expect(store.get(issued.credential)).resolves.toBeNull();
  });

  it('keeps earlier credentials for the same session valid', async () => {
    const { clock, store } = setup();
    const now = clock.now();
    const notAfter = new Date(now.getTime() + 86_400_000);

    const first = await store.issue(data('created'), { now, notAfter });
    const second = await store.issue(data('recovered'), { now, notAfter });

    expect(second.credential).not.toBe(first.credential);
    await expect(store.get(first.credential)).resolves.toEqual(data('created'));
    await expect(store.get(second.credential)).resolves.toEqual(data('recovered'));
  });

  it('extends a live credential up to the configured TTL from now', async () => {
    const { clock, store } = setup();
    const notAfter = new Date(clock.nowMs + 86_400_000);
    const issued = await store.issue(data(), { now: clock.now(), notAfter });

    clock.advanceMinutes(50);
    const extended = await store.extend(issued.credential, { now: clock.now(), notAfter });

    expect(extended).toEqual(new Date(Date.parse('2026-03-02T10:50:00.000Z')));

    clock.advanceMinutes(15);
    await expect(store.get(issued.credential)).resolves.toEqual(data());
  });

  it('never extends past the session expiry', async () => {
    const { clock, cache, store } = setup();
    const notAfter = new Date(clock.nowMs + 20 * 60_000);
    const issued = await store.issue(data(), { now: clock.now(), notAfter });

    clock.advanceMinutes(5);
    const extended = await store.extend(issued.credential, { now: clock.now(), notAfter });

    expect(extended).toEqual(notAfter);
    await expect(cache.ttl(`${CREDENTIAL_KEY_PREFIX}:${hasher.hash(issued.credential)}`)).resolves.toBe(900);
  });

  it('does not revive an expired credential', async () => {
    const { clock, store } = setup();
    const notAfter = new Date(clock.nowMs + 86_400_000);
    const issued = await store.issue(data(), { now: clock.now(), notAfter });

    clock.advanceSeconds(3600);

    await expect(store.extend(issued.credential, { now: clock.now(), notAfter })).resolves.toBeNull();
    await expect(store.get(issued.credential)).resolves.toBeNull();
  });

  it('rotate issues a replacement and revokes only the presented credential', async () => {
    const { clock, store } = setup();
    const now = clock.now();
    const notAfter = new Date(now.getTime() + 86_400_000);
    const presented = await store.issue(data('created'), { now, notAfter });
    const otherDevice = await store.issue(data('recovered'), { now, notAfter });

    const rotated = await store.rotate(presented.credential, data('refreshed'), { now, notAfter });

    await expect(store.get(presented.credential)).resolves.toBeNull();
    await expect(store.get(rotated.credential)).resolves.toEqual(data('refreshed'));
    await expect(store.get(otherDevice.credential)).resolves.toEqual(data('recovered'));
  });

  it('drops a corrupted entry and treats it as unknown', async () => {
    const { cache, store } = setup();
    const key = `${CREDENTIAL_KEY_PREFIX}:${hasher.hash('test-credential')}`;
    await cache.set(key, '{not json');

    await expect(store.get('test-credential')).resolves.toBeNull();
    await expect(cache.get(key)).resolves.toBeNull();
  });

  it('drops an entry with the wrong shape', async () => {
    const { cache, store } = setup();
    const key = `${CREDENTIAL_KEY_PREFIX}:${hasher.hash('test-credential')}`;
    await cache.set(key, JSON.stringify({ sessionId: SESSION_ID, origin: 'stolen' }));

    await expect(store.get('test-credential')).resolves.toBeNull();
    await expect(cache.get(key)).resolves.toBeNull();
  });
});
