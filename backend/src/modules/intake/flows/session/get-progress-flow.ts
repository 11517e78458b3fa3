/**
 * backend/src/modules/intake/flows/session/get-progress-flow.ts
 *
 * WHY:
 * - Read path used when a client (re)opens the conversation: where are we, what is next.
 *
 * RULES:
 * - Never fails on a broken snapshot (Progress Tracker degrades to its default).
 * - A session found past its expiry is expired and persisted here, then returned
 *   with status Expired instead of being rejected: reading is harmless, and the
 *   client needs to learn the outcome.
 * - Inactive sessions have no pending questions.
 */

import { withConflictRetry } from '../../helpers/with-conflict-retry';
import { loadFreshSession, writeExpiryAudit } from '../../helpers/load-session';
import { toSessionView } from '../../helpers/session-view';
import { pendingQuestions } from '../../context/field-context';
import type { IntakeDeps } from '../../intake.deps';
import type { ProgressView, RequestMeta } from '../../intake.types';
import { computeProgress } from '../../progress/progress-tracker';
import { isInactiveStatus } from '../../state/session-state-machine';

export type GetProgressParams = {
  sessionId: string;
  meta: RequestMeta;
};

export async function getProgressFlow(
  deps: IntakeDeps,
  params: GetProgressParams,
): Promise<ProgressView> {
  const loaded = await withConflictRetry(() => loadFreshSession(deps, params.sessionId, deps.now()), {
    ...deps.policy.conflictRetry,
    logger: deps.logger,
    sessionId: params.sessionId,
  });

  await writeExpiryAudit(deps, loaded, params.meta);

  const { session } = loaded;

  return {
    session: toSessionView(session),
    progress: computeProgress(session.progressSnapshot, deps.phases, {
      paceBounds: deps.policy.paceBounds,
    }),
    pendingQuestions: isInactiveStatus(session.status) ? [] : pendingQuestions(session, deps.phases),
  };
}
