/**
 * backend/src/modules/intake/flows/recovery/redeem-recovery-token-flow.ts
 *
 * WHY:
 * - A second device presents the emailed token and is attached to the existing session.
 *
 * RULES:
 * - Rate limit by IP (hard 429) before the token is consumed.
 * - Token first: consumeToken is the single atomic read-and-delete. Whatever happens
 *   afterwards, the token is spent.
 * - Invalid token (unknown / used / expired) → one generic 400.
 * - Submitted, Abandoned or Expired session → 409; the token is not refunded.
 *   Same rule as requesting a link: recovery only attaches devices to active sessions.
 * - Recovery is activity: expiresAt = max(expiresAt, now + activity window).
 * - A new credential is issued; credentials held by other devices stay valid.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { issueSessionGrant } from '../../helpers/issue-session-grant';
import { expireIfDue, writeExpiryAudit } from '../../helpers/load-session';
import type { LoadedSession } from '../../helpers/load-session';
import { withConflictRetry } from '../../helpers/with-conflict-retry';
import { auditRecoveryCompleted, auditRecoveryFailed } from '../../intake.audit';
import type { IntakeDeps } from '../../intake.deps';
import { IntakeErrors } from '../../intake.errors';
import type { IntakeSession, RequestMeta, SessionGrant } from '../../intake.types';
import { extendActivity, isInactiveStatus } from '../../state/session-state-machine';

export type RedeemRecoveryTokenParams = {
  token: string;
  meta: RequestMeta;
};

type RedeemOutcome =
  | { kind: 'missing' }
  | { kind: 'inactive'; loaded: LoadedSession }
  | { kind: 'resumed'; session: IntakeSession };

export async function redeemRecoveryTokenFlow(
  deps: IntakeDeps,
  params: RedeemRecoveryTokenParams,
): Promise<SessionGrant> {
  await deps.rateLimiter.hitOrThrow({
    key: `recovery:redeem:ip:${params.meta.ip ?? 'unknown'}`,
    ...deps.policy.ipLimits.redeemToken,
  });

  const audit = new AuditWriter(deps.auditRepo, params.meta);

  const consumed = await deps.recovery.consumeToken(params.token);
  if (!consumed.ok) {
    await auditRecoveryFailed(audit, { reason: 'token_invalid' });
    throw IntakeErrors.recoveryTokenInvalid();
  }

  const sessionId = consumed.sessionId;
  const sessionAudit = audit.withContext({ sessionId });

  const outcome = await withConflictRetry<RedeemOutcome>(
    async () => {
      const now = deps.now();

      const existing = await deps.sessionRepo.get(sessionId);
      if (!existing) return { kind: 'missing' };

      const loaded = await expireIfDue(deps, existing, now);
      if (loaded.expiredFrom || isInactiveStatus(loaded.session.status)) {
        return { kind: 'inactive', loaded };
      }

      const stored = await deps.sessionRepo.put(
        extendActivity(loaded.session, {
          now,
          activityWindowSeconds: deps.policy.activityWindowSeconds,
        }),
      );
      return { kind: 'resumed', session: stored };
    },
    { ...deps.policy.conflictRetry, logger: deps.logger, sessionId },
  );

  if (outcome.kind === 'missing') {
    await auditRecoveryFailed(audit, { reason: 'session_missing' });
    throw IntakeErrors.sessionNotFound();
  }

  if (outcome.kind === 'inactive') {
    await writeExpiryAudit(deps, outcome.loaded, params.meta);
    await auditRecoveryFailed(sessionAudit, { reason: 'session_inactive' });
    throw IntakeErrors.sessionInactive(outcome.loaded.session.status);
  }

  const grant = await issueSessionGrant(deps, outcome.session, {
    origin: 'recovered',
    now: deps.now(),
  });

  await auditRecoveryCompleted(sessionAudit, { status: outcome.session.status });

  deps.logger.info({
    msg: 'intake.recovery.completed',
    flow: 'intake.redeem-recovery-token',
    requestId: params.meta.requestId,
    sessionId,
  });

  return grant;
}
