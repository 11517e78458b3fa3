/**
 * backend/src/modules/intake/flows/fields/submit-field-flow.ts
 *
 * WHY:
 * - "Parent responded": one extraction from the language collaborator is applied to
 *   the session and the next system action is decided.
 *
 * ORDER (one read-modify-write cycle, re-run on CAS conflict):
 *   1. load fresh + expiry check
 *   2. reject inactive sessions and unknown fields
 *   3. clarification → touch activity only, re-ask the same field
 *   4. Started → InProgress (first accepted field)
 *   5. record field (set semantics, metadata overwritten)
 *   6. recompute progress, persist the clamped percentage as lastPercentage
 *   7. put (CAS)
 *   8. slide the presented credential out to the new session expiry
 *
 * RULES:
 * - Audits and logs happen after the loop: a retried cycle never audits twice.
 * - Fields from any phase are accepted; questions still come from the current phase.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { pendingQuestions, recordField } from '../../context/field-context';
import { loadFreshSession, writeExpiryAudit } from '../../helpers/load-session';
import type { LoadedSession } from '../../helpers/load-session';
import { withConflictRetry } from '../../helpers/with-conflict-retry';
import { auditFieldRecorded, auditStatusChanged } from '../../intake.audit';
import type { IntakeDeps } from '../../intake.deps';
import { IntakeErrors } from '../../intake.errors';
import type {
  FieldExtraction,
  IntakeSession,
  NextAction,
  PhaseName,
  ProgressResult,
  Question,
  RequestMeta,
  SessionStatus,
} from '../../intake.types';
import { findField } from '../../phases/phase-definition';
import { computeProgress } from '../../progress/progress-tracker';
import { extendActivity, isInactiveStatus, transition } from '../../state/session-state-machine';

export type SubmitFieldParams = {
  sessionId: string;
  credential: string;
  extraction: FieldExtraction;
  meta: RequestMeta;
};

type SubmitOutcome =
  | { kind: 'expired'; loaded: LoadedSession }
  | { kind: 'clarify'; session: IntakeSession; question: Question }
  | {
      kind: 'recorded';
      session: IntakeSession;
      phase: PhaseName;
      repeated: boolean;
      before: ProgressResult;
      statusChange: { from: SessionStatus; to: SessionStatus } | null;
    };

/**
 * Pure: picks the next action from the progress before/after the write.
 */
export function decideNextAction(
  session: IntakeSession,
  before: ProgressResult,
  after: ProgressResult,
  deps: Pick<IntakeDeps, 'phases'>,
): NextAction {
  if (after.completedPhases.length === deps.phases.phases.length) {
    return { kind: 'intake_complete', progress: after };
  }

  const newlyCompleted = after.completedPhases.find((name) => !before.completedPhases.includes(name));
  if (newlyCompleted) {
    return {
      kind: 'phase_complete',
      completedPhase: newlyCompleted,
      nextPhase: after.currentPhase,
      progress: after,
    };
  }

  const [question] = pendingQuestions(session, deps.phases);
  if (!question) return { kind: 'intake_complete', progress: after };

  return { kind: 'ask', question, progress: after };
}

export async function submitFieldFlow(
  deps: IntakeDeps,
  params: SubmitFieldParams,
): Promise<NextAction> {
  const { extraction } = params;
  const progressOpts = { paceBounds: deps.policy.paceBounds };

  const outcome = await withConflictRetry<SubmitOutcome>(
    async () => {
      const now = deps.now();
      const activity = { now, activityWindowSeconds: deps.policy.activityWindowSeconds };

      const loaded = await loadFreshSession(deps, params.sessionId, now);
      if (loaded.expiredFrom) return { kind: 'expired', loaded };

      const session = loaded.session;
      if (isInactiveStatus(session.status)) throw IntakeErrors.sessionInactive(session.status);

      const located = findField(deps.phases, extraction.fieldName);
      if (!located) throw IntakeErrors.unknownField(extraction.fieldName);

      if (extraction.needsClarification) {
        const stored = await deps.sessionRepo.put(extendActivity(session, activity));
        return {
          kind: 'clarify',
          session: stored,
          question: {
            phase: located.phase.name,
            fieldName: located.field.name,
            prompt: located.field.prompt,
          },
        };
      }

      const before = computeProgress(session.progressSnapshot, deps.phases, progressOpts);

      let next = session;
      let statusChange: { from: SessionStatus; to: SessionStatus } | null = null;

      if (session.status === 'Started') {
        const moved = transition(session, 'InProgress', activity);
        if (!moved.ok) throw IntakeErrors.invalidTransition(moved.error.attempted, moved.error.current);
        next = moved.session;
        if (moved.changed) statusChange = { from: moved.previousStatus, to: 'InProgress' };
      }

      const repeated = session.progressSnapshot.completedFields.includes(extraction.fieldName);

      next = recordField(
        next,
        {
          fieldName: extraction.fieldName,
          value: extraction.extractedValue,
          confidence: extraction.confidence,
          now,
        },
        { def: deps.phases, cipher: deps.cipher },
      );
      next = extendActivity(next, activity);

      // The clamped percentage must be written back or monotonicity does not hold.
      const computed = computeProgress(next.progressSnapshot, deps.phases, progressOpts);
      next = {
        ...next,
        progressSnapshot: { ...next.progressSnapshot, lastPercentage: computed.percentage },
      };

      const stored = await deps.sessionRepo.put(next);

      return {
        kind: 'recorded',
        session: stored,
        phase: located.phase.name,
        repeated,
        before,
        statusChange,
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

  const progress = computeProgress(outcome.session.progressSnapshot, deps.phases, progressOpts);

  if (outcome.kind === 'clarify') {
    deps.logger.info({
      msg: 'intake.field.clarification_requested',
      flow: 'intake.submit-field',
      requestId: params.meta.requestId,
      sessionId: params.sessionId,
      fieldName: outcome.question.fieldName,
    });

    return { kind: 'clarify', question: outcome.question, progress };
  }

  const audit = new AuditWriter(deps.auditRepo, { ...params.meta, sessionId: params.sessionId });

  if (outcome.statusChange) {
    await auditStatusChanged(audit, outcome.statusChange);
  }

  await auditFieldRecorded(audit, {
    fieldName: extraction.fieldName,
    phase: outcome.phase,
    repeated: outcome.repeated,
    percentage: progress.percentage,
    completedPhases: progress.completedPhases,
  });

  deps.logger.info({
    msg: 'intake.field.recorded',
    flow: 'intake.submit-field',
    requestId: params.meta.requestId,
    sessionId: params.sessionId,
    fieldName: extraction.fieldName,
    repeated: outcome.repeated,
    percentage: progress.percentage,
  });

  return decideNextAction(outcome.session, outcome.before, progress, deps);
}
