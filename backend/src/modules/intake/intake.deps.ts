/**
 * src/modules/intake/intake.deps.ts
 *
 * WHY:
 * - One dependency bag shared by every intake flow (built once in intake.module.ts).
 * - Policy numbers arrive from config; flows never read env or hard-code them.
 */

import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { CredentialStore } from '../../shared/credential/credential.store';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { FieldCipher } from '../../shared/security/encryption';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { SessionRepo } from './dal/session.repo';
import type { PhaseDefinition } from './phases/phase-definition';
import type { PaceBounds } from './progress/progress-tracker';
import type { RecoveryCredentialService } from './recovery/recovery-credential.service';

export type RateWindow = { limit: number; windowSeconds: number };

export type IntakePolicy = {
  initialTtlSeconds: number;
  activityWindowSeconds: number;
  paceBounds: PaceBounds;
  conflictRetry: { attempts: number; backoffMs: number };
  recoveryLinkBaseUrl: string;
  /** Hard 429 guards on the unauthenticated entry points, counted per client IP. */
  ipLimits: { createSession: RateWindow; redeemToken: RateWindow };
};

export type IntakeDeps = {
  sessionRepo: SessionRepo;
  phases: PhaseDefinition;
  cipher: FieldCipher;
  credentialStore: CredentialStore;
  recovery: RecoveryCredentialService;
  /** Per-IP guards on the two unauthenticated entry points (create, redeem). */
  rateLimiter: RateLimiter;
  auditRepo: AuditRepo;
  queue: Queue;
  logger: Logger;
  policy: IntakePolicy;
  now: () => Date;
};
