/**
 * backend/src/modules/intake/flows/session/advance-status-flow.ts
 *
 * WHY:
 * - Explicit forward moves requested by the surrounding system
 *   (insurance step reached, assessment done, final submission).
 *
 * RULES:
 * - The state machine decides legality; an illegal move is a 409 with
 *   attempted + current status, never retried.
 * - Abandoned/Expired sessions reject with sessionInactive.
 * - Repeating the current status is a no-op (no write, no audit).
 * - Any accepted request slides the presented credential, capped at the session expiry.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { loadFreshSession, writeExpiryAudit } from '../../helpers/load-session';
import type { LoadedSession } from '../../helpers/load-session';
import { toSessionView } from '../../helpers/session-view';
import { withConflictRetry } from '../../helpers/with-conflict-retry';
import { auditStatusChanged } from '../../intake.audit';
import type { IntakeDeps } from '../../intake.deps';
import { IntakeErrors } from '../../intake.errors';
import type { IntakeSession, RequestMeta, SessionStatus, SessionView } from '../../intake.types';
import { isExitStatus, transition } from '../../state/session-state-machine';

export type AdvanceStatusParams = {
  sessionId: string;
  credential: string;
  target: SessionStatus;
  meta: RequestMeta;
};

type AdvanceOutcome =
  | { kind: 'expired'; loaded: LoadedSession }
  | { kind: 'done'; session: IntakeSession; change: { from: SessionStatus; to: SessionStatus } | null };

export async function advanceStatusFlow(
  deps: IntakeDeps,
  params: AdvanceStatusParams,
): Promise<SessionView> {
  const outcome = await withConflictRetry<AdvanceOutcome>(
    async () => {
      const now = deps.now();
      const loaded = await loadFreshSession(deps, params.sessionId, now);
      if (loaded.expiredFrom) {
        return { kind: 'expired', loaded };
      }

      const session = loaded.session;
      if (isExitStatus(session.status)) throw IntakeErrors.sessionInactive(session.status);

      const result = transition(session, params.target, {
        now,
        activityWindowSeconds: deps.policy.activityWindowSeconds,
      });
      if (!result.ok) {
        throw IntakeErrors.invalidTransition(result.error.attempted, result.error.current);
      }
      if (!result.changed) return { kind: 'done', session, change: null };

      const stored = await deps.sessionRepo.put(result.session);
      return {
        kind: 'done',
        session: stored,
        change: { from: result.previousStatus, to: stored.status },
      };
    },
    { ...deps.policy.conflictRetry, logger: deps.logger, sessionId: params.sessionId },
  );

  if (outcome.kind === 'expired') {
    await writeExpiryAudit(deps, outcome.loaded, params.meta);
    throw IntakeErrors.sessionInactive(outcome.loaded.session.status);
  }

  await deps.credentialStore.extend(params.credential, {
    now: deps.now(),
    notAfter: outcome.session.expiresAt,
  });

  if (outcome.change) {
    const audit = new AuditWriter(deps.auditRepo, { ...params.meta, sessionId: params.sessionId });
    await auditStatusChanged(audit, outcome.change);

    deps.logger.info({
      msg: 'intake.session.status_changed',
      flow: 'intake.advance-status',
      requestId: params.meta.requestId,
      sessionId: params.sessionId,
      from: outcome.change.from,
      to: outcome.change.to,
    });
  }

  return toSessionView(outcome.session);
}
