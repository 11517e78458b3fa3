/**
 * backend/src/modules/intake/flows/session/refresh-credential-flow.ts
 *
 * WHY:
 * - A client that is only reading (no field submissions, so nothing extends its
 *   credential) trades its live credential for a fresh one before it runs out.
 *
 * RULES:
 * - Rotation: the presented credential is revoked once the replacement is stored.
 *   Credentials held by other devices are untouched.
 * - Not activity: the session's expiresAt does not move, and it still caps the new
 *   credential's lifetime.
 * - Abandoned/Expired → 409. Submitted sessions stay readable, so they may refresh.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { loadFreshSession, writeExpiryAudit } from '../../helpers/load-session';
import { withConflictRetry } from '../../helpers/with-conflict-retry';
import { auditCredentialRefreshed } from '../../intake.audit';
import type { IntakeDeps } from '../../intake.deps';
import { IntakeErrors } from '../../intake.errors';
import type { CredentialGrant, RequestMeta } from '../../intake.types';
import { isExitStatus } from '../../state/session-state-machine';

export type RefreshCredentialParams = {
  sessionId: string;
  credential: string;
  meta: RequestMeta;
};

export async function refreshCredentialFlow(
  deps: IntakeDeps,
  params: RefreshCredentialParams,
): Promise<CredentialGrant> {
  const loaded = await withConflictRetry(() => loadFreshSession(deps, params.sessionId, deps.now()), {
    ...deps.policy.conflictRetry,
    logger: deps.logger,
    sessionId: params.sessionId,
  });

  await writeExpiryAudit(deps, loaded, params.meta);

  const { session } = loaded;
  if (isExitStatus(session.status)) throw IntakeErrors.sessionInactive(session.status);

  const now = deps.now();
  const issued = await deps.credentialStore.rotate(
    params.credential,
    { sessionId: session.id, origin: 'refreshed', issuedAt: now.toISOString() },
    { now, notAfter: session.expiresAt },
  );

  const audit = new AuditWriter(deps.auditRepo, { ...params.meta, sessionId: session.id });
  await auditCredentialRefreshed(audit, { status: session.status });

  deps.logger.info({
    msg: 'intake.credential.refreshed',
    flow: 'intake.refresh-credential',
    requestId: params.meta.requestId,
    sessionId: session.id,
  });

  return { credential: issued.credential, expiresAt: issued.expiresAt.toISOString() };
}
