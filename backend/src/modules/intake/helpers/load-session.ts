/**
 * backend/src/modules/intake/helpers/load-session.ts
 *
 * WHY:
 * - Every flow starts the same way: read the session fresh from the durable store,
 *   then apply the expiry check before any rule looks at it.
 *
 * EXPIRY ON READ:
 * - Nothing sweeps expired sessions in the background. A non-terminal session whose
 *   expiresAt has passed is moved to Expired here and persisted (CAS), so every
 *   later read agrees.
 * - Runs inside withConflictRetry; the caller writes the expiry audit afterwards.
 */

import { AuditWriter } from '../../../shared/audit/audit.writer';
import type { IntakeSession, RequestMeta, SessionStatus } from '../intake.types';
import type { IntakeDeps } from '../intake.deps';
import { IntakeErrors } from '../intake.errors';
import { auditSessionExpired } from '../intake.audit';
import { isInactiveStatus, transition } from '../state/session-state-machine';

export type LoadedSession = {
  session: IntakeSession;
  /** Status the session had before this read expired it; null when it did not. */
  expiredFrom: SessionStatus | null;
};

export function isPastExpiry(session: IntakeSession, now: Date): boolean {
  return session.expiresAt.getTime() <= now.getTime();
}

export async function loadSessionOrThrow(
  deps: Pick<IntakeDeps, 'sessionRepo'>,
  sessionId: string,
): Promise<IntakeSession> {
  const session = await deps.sessionRepo.get(sessionId);
  if (!session) throw IntakeErrors.sessionNotFound({ sessionId });
  return session;
}

export async function expireIfDue(
  deps: Pick<IntakeDeps, 'sessionRepo'>,
  session: IntakeSession,
  now: Date,
): Promise<LoadedSession> {
  if (isInactiveStatus(session.status) || !isPastExpiry(session, now)) {
    return { session, expiredFrom: null };
  }

  const result = transition(session, 'Expired', {
    now,
    activityWindowSeconds: 0,
  });

  // Expired is reachable from every non-exit status.
  if (!result.ok || !result.changed) return { session, expiredFrom: null };

  const stored = await deps.sessionRepo.put(result.session);
  return { session: stored, expiredFrom: result.previousStatus };
}

export async function loadFreshSession(
  deps: Pick<IntakeDeps, 'sessionRepo'>,
  sessionId: string,
  now: Date,
): Promise<LoadedSession> {
  const session = await loadSessionOrThrow(deps, sessionId);
  return expireIfDue(deps, session, now);
}

export async function writeExpiryAudit(
  deps: Pick<IntakeDeps, 'auditRepo' | 'logger'>,
  loaded: LoadedSession,
  meta: RequestMeta,
): Promise<void> {
  if (!loaded.expiredFrom) return;

  const audit = new AuditWriter(deps.auditRepo, { ...meta, sessionId: loaded.session.id });
  await auditSessionExpired(audit, { previousStatus: loaded.expiredFrom });

  deps.logger.info({
    msg: 'intake.session.expired',
    sessionId: loaded.session.id,
    previousStatus: loaded.expiredFrom,
  });
}
