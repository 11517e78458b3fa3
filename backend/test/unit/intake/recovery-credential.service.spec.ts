import { describe, it, expect, vi } from 'vitest';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';
import { logger } from '../../../src/shared/logger/logger';
import { RateLimiter } from '../../../src/shared/security/rate-limit';
import { Sha256TokenHasher } from '../../../src/shared/security/sha256-token-hasher';
import {
  RECOVERY_TOKEN_KEY_PREFIX,
  RecoveryCredentialService,
} from '../../../src/modules/intake/recovery/recovery-credential.service';
import { TestClock } from '../../helpers/test-clock';

const SESSION_ID = '6f1c2a34-5b6d-4e7f-8a9b-0c1d2e3f4a5b';
const hasher = new Sha256TokenHasher();

function buildService(cache: InMemCache, clock: TestClock) {
  return new RecoveryCredentialService({
    cache,
    rateLimiter: new RateLimiter(cache, { prefix: 'rl' }),
    tokenHasher: hasher,
    logger,
    policy: { tokenTtlSeconds: 900, rateLimit: 3, rateWindowSeconds: 3600 },
    now: clock.now,
  });
}

function setup() {
  const clock = new TestClock();
  const cache = new InMemCache(clock.ms);
  return { clock, cache, service: buildService(cache, clock) };
}

/**
 * Holds every getDel until release() so two consumers are provably in flight together.
 */
class GatedCache extends InMemCache {
  pending = 0;
  private gate: Promise<void>;
  private open: () => void = () => undefined;

  constructor(clock: () => number) {
    super(clock);
    this.gate = new Promise<void>((resolve) => {
      this.open = resolve;
    });
  }

  release(): void {
    this.open();
  }

  override async getDel(key: string): Promise<string | null> {
    this.pending += 1;
    await this.gate;
    return super.getDel(key);
  }
}

describe('RecoveryCredentialService.requestRecovery', () => {
  it('allows three attempts per identity, then reports the remaining window', async () => {
    const { service } = setup();

    const results = [];
    for (let i = 0; i < 4; i++) {
      results.push(await service.requestRecovery('parent@example.com', SESSION_ID));
    }

    expect(results.slice(0, 3)).toEqual([
      { ok: true, attempt: 1 },
      { ok: true, attempt: 2 },
      { ok: true, attempt: 3 },
    ]);
    expect(results[3]).toEqual({
      ok: false,
      error: { kind: 'RateLimited', retryAfterSeconds: 3600 },
    });
  });

  it('keeps separate quotas per identity', async () => {
    const { service } = setup();
    for (let i = 0; i < 4; i++) await service.requestRecovery('a@example.com', SESSION_ID);

    await expect(service.requestRecovery('b@example.com', SESSION_ID)).resolves.toEqual({
      ok: true,
      attempt: 1,
    });
  });

  it('normalizes case and whitespace before counting', async () => {
    const { service } = setup();

    await service.requestRecovery('Parent@Example.com', SESSION_ID);
    await service.requestRecovery('  parent@example.com ', SESSION_ID);
    const third = await service.requestRecovery('PARENT@EXAMPLE.COM', SESSION_ID);

    expect(third).toEqual({ ok: true, attempt: 3 });
    expect(service.identityKey('Parent@Example.com')).toBe(service.identityKey('parent@example.com'));
  });

  it('the window slides with every attempt and resets after a quiet hour', async () => {
    const { clock, service } = setup();

    for (let i = 0; i < 3; i++) {
      await service.requestRecovery('parent@example.com', SESSION_ID);
      clock.advanceSeconds(1200);
    }

    // 3600s since the first attempt, but only 1200s since the last one.
    const blocked = await service.requestRecovery('parent@example.com', SESSION_ID);
    expect(blocked).toEqual({ ok: false, error: { kind: 'RateLimited', retryAfterSeconds: 3600 } });

    clock.advanceSeconds(3601);
    await expect(service.requestRecovery('parent@example.com', SESSION_ID)).resolves.toEqual({
      ok: true,
      attempt: 1,
    });
  });
});

describe('RecoveryCredentialService tokens', () => {
  it('issues a URL-safe 256-bit token stored under its hash', async () => {
    const { cache, clock, service } = setup();

    const issued = await service.issueToken(SESSION_ID);

    expect(issued.token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(issued.expiresAt).toEqual(new Date(clock.nowMs + 900 * 1000));
    await expect(cache.get(`${RECOVERY_TOKEN_KEY_PREFIX}:${hasher.hash(issued.token)}`)).resolves.toBe(
      SESSION_ID,
    );
    await expect(cache.get(`${RECOVERY_TOKEN_KEY_PREFIX}:${issued.token}`)).resolves.toBeNull();
  });

  it('consumes a token exactly once', async () => {
    const { service } = setup();
    const { token } = await service.issueToken(SESSION_ID);

    await expect(service.consumeToken(token)).resolves.toEqual({ ok: true, sessionId: SESSION_ID });
    await expect(service.consumeToken(token)).resolves.toEqual({
      ok: false,
      error: { kind: 'TokenInvalid' },
    });
  });

  it('rejects a token after its TTL', async () => {
    const { clock, service } = setup();
    const { token } = await service.issueToken(SESSION_ID);

    clock.advanceMinutes(16);

    await expect(service.consumeToken(token)).resolves.toEqual({
      ok: false,
      error: { kind: 'TokenInvalid' },
    });
  });

  it('rejects unknown and empty tokens the same way', async () => {
    const { service } = setup();

    await expect(service.consumeToken('not-a-real-token')).resolves.toEqual({
      ok: false,
      error: { kind: 'TokenInvalid' },
    });
    await expect(service.consumeToken('')).resolves.toEqual({
      ok: false,
      error: { kind: 'TokenInvalid' },
    });
  });

  it('two concurrent redemptions: exactly one wins', async () => {
    const clock = new TestClock();
    const cache = new GatedCache(clock.ms);
    const service = buildService(cache, clock);
    const getSpy = vi.spyOn(cache, 'get');

    const { token } = await service.issueToken(SESSION_ID);

    const first = service.consumeToken(token);
    const second = service.consumeToken(token);

    await vi.waitFor(() => expect(cache.pending).toBe(2));
    cache.release();

    const results = await Promise.all([first, second]);

    expect(results.filter((r) => r.ok)).toEqual([{ ok: true, sessionId: SESSION_ID }]);
    expect(results.filter((r) => !r.ok)).toHaveLength(1);
    expect(getSpy).not.toHaveBeenCalled();
  });
});
