/**
 * backend/src/modules/intake/helpers/issue-session-grant.ts
 *
 * WHY:
 * - Creation and recovery both end by handing the client a fresh credential plus the
 *   session state it needs to render. One helper keeps the two shapes identical.
 *
 * RULES:
 * - Never revokes earlier credentials for the same session.
 * - Credential lifetime is capped by the session's own expiry (CredentialStore).
 */

import type { CredentialOrigin } from '../../../shared/credential/credential.types';
import type { IntakeDeps } from '../intake.deps';
import type { IntakeSession, SessionGrant } from '../intake.types';
import { computeProgress } from '../progress/progress-tracker';
import { toSessionView } from './session-view';

export async function issueSessionGrant(
  deps: Pick<IntakeDeps, 'credentialStore' | 'phases' | 'policy'>,
  session: IntakeSession,
  opts: { origin: CredentialOrigin; now: Date },
): Promise<SessionGrant> {
  const issued = await deps.credentialStore.issue(
    { sessionId: session.id, origin: opts.origin, issuedAt: opts.now.toISOString() },
    { now: opts.now, notAfter: session.expiresAt },
  );

  return {
    session: toSessionView(session),
    progress: computeProgress(session.progressSnapshot, deps.phases, {
      paceBounds: deps.policy.paceBounds,
    }),
    credential: {
      credential: issued.credential,
      expiresAt: issued.expiresAt.toISOString(),
    },
  };
}
