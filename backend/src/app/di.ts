/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Keeps modules testable: tests hand in an in-memory AppInfra instead of connectInfra().
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';
import { EncryptionService } from '../shared/security/encryption';
import type { FieldCipher } from '../shared/security/encryption';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { KyselyAuditRepo } from '../shared/audit/audit.repo';
import type { AuditRepo } from '../shared/audit/audit.repo';
import { CredentialStore } from '../shared/credential/credential.store';

import { InMemQueue } from '../shared/messaging/inmem-queue';
import type { Queue } from '../shared/messaging/queue';

import { KyselySessionRepo } from '../modules/intake/dal/session.repo';
import type { SessionRepo } from '../modules/intake/dal/session.repo';
import { DEFAULT_PHASE_DEFINITION, firstPhase } from '../modules/intake/phases/phase-definition';
import type { PhaseDefinition } from '../modules/intake/phases/phase-definition';
import { createIntakeModule } from '../modules/intake/intake.module';
import type { IntakeModule } from '../modules/intake/intake.module';

/**
 * The two external stores plus the outbound queue.
 * Production: Postgres + Redis. Tests: InMemSessionRepo + InMemCache.
 */
export type AppInfra = {
  cache: Cache;
  sessionRepo: SessionRepo;
  auditRepo: AuditRepo;
  queue: Queue;
  /** Clock shared by every time-dependent rule; tests pin it. */
  now?: () => Date;
  close: () => Promise<void>;
};

export type AppDeps = {
  cache: Cache;
  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  cipher: FieldCipher;

  sessionRepo: SessionRepo;
  auditRepo: AuditRepo;
  credentialStore: CredentialStore;
  phases: PhaseDefinition;

  // messaging
  queue: Queue;

  // modules
  intake: IntakeModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function connectInfra(
  config: AppConfig,
  phases: PhaseDefinition = DEFAULT_PHASE_DEFINITION,
): Promise<AppInfra> {
  const db = createDb(config.databaseUrl);

  // Redis is mandatory (dev + prod)
  const redis = await RedisCache.connect(config.redisUrl);

  // Phase 1: in-memory queue (swap for SQS/SendGrid adapter here in production)
  const queue: Queue = new InMemQueue();

  return {
    cache: redis,
    sessionRepo: new KyselySessionRepo(db, firstPhase(phases).name),
    auditRepo: new KyselyAuditRepo(db),
    queue,
    close: async () => {
      await redis.close();
      await db.destroy();
    },
  };
}

export function buildDeps(
  config: AppConfig,
  infra: AppInfra,
  phases: PhaseDefinition = DEFAULT_PHASE_DEFINITION,
): AppDeps {
  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const cipher: FieldCipher = new EncryptionService(config.fieldEncryptionKeyBase64);

  const rateLimiter = new RateLimiter(infra.cache, { prefix: 'rl' });

  const credentialStore = new CredentialStore(
    infra.cache,
    tokenHasher,
    config.session.credentialTtlSeconds,
  );

  // modules (no HTTP / no business logic here)
  const intake = createIntakeModule({
    sessionRepo: infra.sessionRepo,
    phases,
    cache: infra.cache,
    rateLimiter,
    tokenHasher,
    cipher,
    credentialStore,
    auditRepo: infra.auditRepo,
    queue: infra.queue,
    logger,
    now: infra.now,
    policy: {
      initialTtlSeconds: config.session.initialTtlSeconds,
      activityWindowSeconds: config.session.activityWindowSeconds,
      paceBounds: {
        min: config.progress.paceMultiplierMin,
        max: config.progress.paceMultiplierMax,
      },
      conflictRetry: config.conflictRetry,
      recoveryLinkBaseUrl: config.recovery.linkBaseUrl,
      ipLimits: config.ipLimits,
    },
    recoveryPolicy: {
      tokenTtlSeconds: config.recovery.tokenTtlSeconds,
      rateLimit: config.recovery.rateLimit,
      rateWindowSeconds: config.recovery.rateWindowSeconds,
    },
  });

  return {
    cache: infra.cache,
    logger,
    rateLimiter,
    tokenHasher,
    cipher,
    sessionRepo: infra.sessionRepo,
    auditRepo: infra.auditRepo,
    credentialStore,
    phases,
    queue: infra.queue,
    intake,
    close: infra.close,
  };
}
