/**
 * backend/src/modules/intake/flows/session/create-session-flow.ts
 *
 * WHY:
 * - First client contact: creates the durable session in Started and attaches the
 *   client to it with a credential.
 *
 * RULES:
 * - The snapshot starts empty, positioned on the first phase that has fields.
 * - Rate limit by IP before any store work.
 * - Audit after the insert (nothing to roll back).
 */

import { randomUUID } from 'node:crypto';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { stampPhaseTimings } from '../../context/field-context';
import { issueSessionGrant } from '../../helpers/issue-session-grant';
import { auditSessionCreated } from '../../intake.audit';
import type { IntakeDeps } from '../../intake.deps';
import type { IntakeSession, RequestMeta, SessionGrant } from '../../intake.types';
import { firstPhase } from '../../phases/phase-definition';
import { emptySnapshot } from '../../progress/progress-snapshot';

export type CreateSessionParams = {
  referralSource: string | null;
  meta: RequestMeta;
};

export async function createSessionFlow(
  deps: IntakeDeps,
  params: CreateSessionParams,
): Promise<SessionGrant> {
  await deps.rateLimiter.hitOrThrow({
    key: `intake:create:ip:${params.meta.ip ?? 'unknown'}`,
    ...deps.policy.ipLimits.createSession,
  });

  const now = deps.now();

  const draft: IntakeSession = {
    id: randomUUID(),
    status: 'Started',
    progressSnapshot: stampPhaseTimings(emptySnapshot(firstPhase(deps.phases).name), deps.phases, now),
    collectedValues: {},
    referralSource: params.referralSource,
    expiresAt: new Date(now.getTime() + deps.policy.initialTtlSeconds * 1000),
    createdAt: now,
    updatedAt: now,
    version: 0,
  };

  const session = await deps.sessionRepo.insert(draft);
  const grant = await issueSessionGrant(deps, session, { origin: 'created', now });

  const audit = new AuditWriter(deps.auditRepo, { ...params.meta, sessionId: session.id });
  await auditSessionCreated(audit, { hasReferralSource: params.referralSource !== null });

  deps.logger.info({
    msg: 'intake.session.created',
    flow: 'intake.create-session',
    requestId: params.meta.requestId,
    sessionId: session.id,
  });

  return grant;
}
