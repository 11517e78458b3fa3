/**
 * backend/src/modules/intake/flows/recovery/request-recovery-flow.ts
 *
 * WHY:
 * - "Send me a link to continue on another device."
 *
 * ORDER:
 *   1. load fresh + expiry check (inactive → 409)
 *   2. contact identity must already be collected (encrypted field)
 *   3. quota (RecoveryCredentialService.requestRecovery), rejection → 429 + retry-after
 *   4. issue token → enqueue recovery email → audit 'sent'
 *
 * RULES:
 * - The quota is counted once per call: steps 3-4 run outside the conflict-retry loop.
 * - Both outcomes are audited (`outcome`), never with the email or the token.
 * - Enqueue is fire-and-forget from the core's view; delivery is the dispatcher's job.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { loadFreshSession, writeExpiryAudit } from '../../helpers/load-session';
import { withConflictRetry } from '../../helpers/with-conflict-retry';
import { auditRecoveryRequested } from '../../intake.audit';
import type { IntakeDeps } from '../../intake.deps';
import { IntakeErrors } from '../../intake.errors';
import type { RequestMeta } from '../../intake.types';
import { contactField } from '../../phases/phase-definition';
import { isInactiveStatus } from '../../state/session-state-machine';

export type RequestRecoveryParams = {
  sessionId: string;
  meta: RequestMeta;
};

export type RequestRecoveryResult = {
  expiresAt: string; // ISO
};

export function buildRecoveryUrl(baseUrl: string, token: string): string {
  const url = new URL('/recover-session', baseUrl);
  url.searchParams.set('token', token);
  return url.toString();
}

export async function requestRecoveryFlow(
  deps: IntakeDeps,
  params: RequestRecoveryParams,
): Promise<RequestRecoveryResult> {
  const loaded = await withConflictRetry(() => loadFreshSession(deps, params.sessionId, deps.now()), {
    ...deps.policy.conflictRetry,
    logger: deps.logger,
    sessionId: params.sessionId,
  });

  await writeExpiryAudit(deps, loaded, params.meta);

  const { session } = loaded;
  if (isInactiveStatus(session.status)) throw IntakeErrors.sessionInactive(session.status);

  const contact = contactField(deps.phases);
  const encrypted = contact ? session.collectedValues[contact.name] : undefined;
  if (!encrypted) throw IntakeErrors.contactMissing({ sessionId: session.id });

  const identity = deps.cipher.decrypt(encrypted);
  const audit = new AuditWriter(deps.auditRepo, { ...params.meta, sessionId: session.id });

  const quota = await deps.recovery.requestRecovery(identity, session.id);
  if (!quota.ok) {
    await auditRecoveryRequested(audit, { outcome: 'rate_limited' });
    throw IntakeErrors.rateLimited(quota.error.retryAfterSeconds);
  }

  const issued = await deps.recovery.issueToken(session.id);

  await deps.queue.enqueue({
    type: 'intake.recovery-email',
    kind: 'recovery',
    sessionId: session.id,
    email: identity,
    recoveryToken: issued.token,
    recoveryUrl: buildRecoveryUrl(deps.policy.recoveryLinkBaseUrl, issued.token),
    expiresAt: issued.expiresAt.toISOString(),
  });

  await auditRecoveryRequested(audit, { outcome: 'sent' });

  deps.logger.info({
    msg: 'intake.recovery.requested',
    flow: 'intake.request-recovery',
    requestId: params.meta.requestId,
    sessionId: session.id,
    attempt: quota.attempt,
  });

  return { expiresAt: issued.expiresAt.toISOString() };
}
