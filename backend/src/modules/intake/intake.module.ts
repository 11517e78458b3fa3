/**
 * src/modules/intake/intake.module.ts
 *
 * WHY:
 * - Encapsulates intake module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { Cache } from '../../shared/cache/cache';
import type { CredentialStore } from '../../shared/credential/credential.store';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { FieldCipher } from '../../shared/security/encryption';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';

import type { SessionRepo } from './dal/session.repo';
import type { IntakePolicy } from './intake.deps';
import type { PhaseDefinition } from './phases/phase-definition';
import type { RecoveryPolicy } from './recovery/recovery-credential.service';
import { RecoveryCredentialService } from './recovery/recovery-credential.service';
import { IntakeOrchestrator } from './intake.orchestrator';
import { IntakeController } from './intake.controller';
import { registerIntakeRoutes } from './intake.routes';

export type IntakeModule = ReturnType<typeof createIntakeModule>;

export function createIntakeModule(deps: {
  sessionRepo: SessionRepo;
  phases: PhaseDefinition;
  cache: Cache;
  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  cipher: FieldCipher;
  credentialStore: CredentialStore;
  auditRepo: AuditRepo;
  queue: Queue;
  logger: Logger;
  policy: IntakePolicy;
  recoveryPolicy: RecoveryPolicy;
  now?: () => Date;
}) {
  const now = deps.now ?? (() => new Date());

  const recovery = new RecoveryCredentialService({
    cache: deps.cache,
    rateLimiter: deps.rateLimiter,
    tokenHasher: deps.tokenHasher,
    logger: deps.logger,
    policy: deps.recoveryPolicy,
    now,
  });

  const orchestrator = new IntakeOrchestrator({
    sessionRepo: deps.sessionRepo,
    phases: deps.phases,
    cipher: deps.cipher,
    credentialStore: deps.credentialStore,
    recovery,
    rateLimiter: deps.rateLimiter,
    auditRepo: deps.auditRepo,
    queue: deps.queue,
    logger: deps.logger,
    policy: deps.policy,
    now,
  });

  const controller = new IntakeController(orchestrator);

  return {
    orchestrator,
    recovery,
    registerRoutes(app: FastifyInstance) {
      registerIntakeRoutes(app, controller);
    },
  };
}
