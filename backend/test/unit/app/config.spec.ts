import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';
import { TEST_FIELD_KEY_BASE64 } from '../../helpers/build-test-app';

const REQUIRED = {
  DATABASE_URL: 'postgres://localhost:5432/intake',
  REDIS_URL: 'redis://localhost:6379',
  FIELD_ENCRYPTION_KEY_BASE64: TEST_FIELD_KEY_BASE64,
};

describe('buildConfig', () => {
  it('applies the documented defaults', () => {
    const config = buildConfig({ ...REQUIRED });

    expect(config.nodeEnv).toBe('development');
    expect(config.session).toEqual({
      initialTtlSeconds: 86_400,
      activityWindowSeconds: 3600,
      credentialTtlSeconds: 3600,
    });
    expect(config.recovery).toEqual({
      tokenTtlSeconds: 900,
      rateLimit: 3,
      rateWindowSeconds: 3600,
      linkBaseUrl: 'http://localhost:5173',
    });
    expect(config.ipLimits).toEqual({
      createSession: { limit: 30, windowSeconds: 3600 },
      redeemToken: { limit: 10, windowSeconds: 900 },
    });
    expect(config.progress).toEqual({ paceMultiplierMin: 0.5, paceMultiplierMax: 2 });
    expect(config.conflictRetry).toEqual({ attempts: 3, backoffMs: 25 });
  });

  it('coerces numeric overrides from strings', () => {
    const config = buildConfig({ ...REQUIRED, RECOVERY_RATE_LIMIT: '5', PORT: '8080' });

    expect(config.recovery.rateLimit).toBe(5);
    expect(config.port).toBe(8080);
  });

  it('reads the per-IP throttles from env', () => {
    const config = buildConfig({
      ...REQUIRED,
      CREATE_SESSION_IP_LIMIT: '100',
      CREATE_SESSION_IP_WINDOW_SECONDS: '600',
      REDEEM_TOKEN_IP_LIMIT: '4',
      REDEEM_TOKEN_IP_WINDOW_SECONDS: '300',
    });

    expect(config.ipLimits).toEqual({
      createSession: { limit: 100, windowSeconds: 600 },
      redeemToken: { limit: 4, windowSeconds: 300 },
    });
  });

  it('rejects an inverted pace range', () => {
    expect(() =>
      buildConfig({ ...REQUIRED, PACE_MULTIPLIER_MIN: '3', PACE_MULTIPLIER_MAX: '2' }),
    ).toThrow(/PACE_MULTIPLIER_MIN must not exceed PACE_MULTIPLIER_MAX/);
  });

  it('requires the field encryption key', () => {
    expect(() =>
      buildConfig({ DATABASE_URL: REQUIRED.DATABASE_URL, REDIS_URL: REQUIRED.REDIS_URL }),
    ).toThrow();
  });
});
