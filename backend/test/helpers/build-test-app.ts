import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import type { AppInfra } from '../../src/app/di';
import { InMemAuditRepo } from '../../src/shared/audit/inmem-audit.repo';
import { InMemCache } from '../../src/shared/cache/inmem-cache';
import { InMemQueue } from '../../src/shared/messaging/inmem-queue';
import { InMemSessionRepo } from '../../src/modules/intake/dal/inmem-session.repo';
import type { SessionRepo } from '../../src/modules/intake/dal/session.repo';
import { TestClock } from './test-clock';

/** Placeholder 32-byte AES key for tests only. */
export const TEST_FIELD_KEY_BASE64 = Buffer.alloc(32, 7).toString('base64');

export function buildTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  const base: AppConfig = {
    nodeEnv: 'test',
    port: 0,

    // Never dialed: tests hand buildApp an in-memory AppInfra.
    databaseUrl: 'postgres://unused',
    redisUrl: 'redis://unused',

    logLevel: process.env.LOG_LEVEL ?? 'error',
    serviceName: 'intake-core-backend',

    session: {
      initialTtlSeconds: 86_400,
      activityWindowSeconds: 3600,
      credentialTtlSeconds: 3600,
    },

    recovery: {
      tokenTtlSeconds: 900,
      rateLimit: 3,
      rateWindowSeconds: 3600,
      linkBaseUrl: 'http://localhost:5173',
    },

    ipLimits: {
      createSession: { limit: 30, windowSeconds: 3600 },
      redeemToken: { limit: 10, windowSeconds: 900 },
    },

    progress: {
      paceMultiplierMin: 0.5,
      paceMultiplierMax: 2.0,
    },

    // No sleeping between conflict retries in tests.
    conflictRetry: { attempts: 3, backoffMs: 0 },

    fieldEncryptionKeyBase64: TEST_FIELD_KEY_BASE64,
  };

  return {
    ...base,
    ...overrides,
    // ensure nested objects merge correctly
    session: { ...base.session, ...(overrides.session ?? {}) },
    recovery: { ...base.recovery, ...(overrides.recovery ?? {}) },
    ipLimits: { ...base.ipLimits, ...(overrides.ipLimits ?? {}) },
    progress: { ...base.progress, ...(overrides.progress ?? {}) },
    conflictRetry: { ...base.conflictRetry, ...(overrides.conflictRetry ?? {}) },
  };
}

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - No Postgres, no Redis: the stores are the in-memory implementations and the
 *   clock is a TestClock shared by the app and the cache.
 */
export async function buildTestApp(
  opts: { config?: Partial<AppConfig>; clock?: TestClock; sessionRepo?: SessionRepo } = {},
) {
  const clock = opts.clock ?? new TestClock();
  const cache = new InMemCache(clock.ms);
  const sessionRepo = opts.sessionRepo ?? new InMemSessionRepo();
  const auditRepo = new InMemAuditRepo();
  const queue = new InMemQueue();

  const infra: AppInfra = {
    cache,
    sessionRepo,
    auditRepo,
    queue,
    now: clock.now,
    close: () => Promise.resolve(),
  };

  const built = await buildApp(buildTestConfig(opts.config), infra);

  return {
    app: built.app,
    deps: built.deps,
    clock,
    cache,
    sessionRepo,
    auditRepo,
    queue,
    close: built.close,
  };
}
