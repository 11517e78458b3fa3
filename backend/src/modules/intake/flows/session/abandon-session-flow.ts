/**
 * backend/src/modules/intake/flows/session/abandon-session-flow.ts
 *
 * WHY:
 * - Explicit abandonment by the parent (or a client retry of it).
 *
 * RULES:
 * - Idempotent: abandoning twice succeeds twice with status Abandoned; only the
 *   first call writes and audits.
 * - A session that already expired stays Expired (exits are final) and is returned
 *   as such, not as an error.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { loadFreshSession, writeExpiryAudit } from '../../helpers/load-session';
import type { LoadedSession } from '../../helpers/load-session';
import { toSessionView } from '../../helpers/session-view';
import { withConflictRetry } from '../../helpers/with-conflict-retry';
import { auditSessionAbandoned } from '../../intake.audit';
import type { IntakeDeps } from '../../intake.deps';
import type { RequestMeta, SessionStatus, SessionView } from '../../intake.types';
import { transition } from '../../state/session-state-machine';

export type AbandonSessionParams = {
  sessionId: string;
  meta: RequestMeta;
};

type AbandonOutcome = {
  loaded: LoadedSession;
  abandonedFrom: SessionStatus | null;
};

export async function abandonSessionFlow(
  deps: IntakeDeps,
  params: AbandonSessionParams,
): Promise<SessionView> {
  const { loaded, abandonedFrom } = await withConflictRetry<AbandonOutcome>(
    async () => {
      const now = deps.now();
      const fresh = await loadFreshSession(deps, params.sessionId, now);
      if (fresh.expiredFrom) return { loaded: fresh, abandonedFrom: null };

      // Abandoned is reachable from every status; exits answer with a no-op.
      const result = transition(fresh.session, 'Abandoned', {
        now,
        activityWindowSeconds: deps.policy.activityWindowSeconds,
      });
      if (!result.ok || !result.changed) return { loaded: fresh, abandonedFrom: null };

      const stored = await deps.sessionRepo.put(result.session);
      return {
        loaded: { session: stored, expiredFrom: null },
        abandonedFrom: result.previousStatus,
      };
    },
    { ...deps.policy.conflictRetry, logger: deps.logger, sessionId: params.sessionId },
  );

  await writeExpiryAudit(deps, loaded, params.meta);

  if (abandonedFrom) {
    const audit = new AuditWriter(deps.auditRepo, { ...params.meta, sessionId: params.sessionId });
    await auditSessionAbandoned(audit, { previousStatus: abandonedFrom });

    deps.logger.info({
      msg: 'intake.session.abandoned',
      flow: 'intake.abandon-session',
      requestId: params.meta.requestId,
      sessionId: params.sessionId,
      previousStatus: abandonedFrom,
    });
  }

  return toSessionView(loaded.session);
}
