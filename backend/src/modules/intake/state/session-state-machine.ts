/**
 * backend/src/modules/intake/state/session-state-machine.ts
 *
 * WHY:
 * - Pure decision + mutation for session status moves.
 * - Keeps the orchestrator (flows) separate from the transition table (rules).
 *
 * RULES:
 * - Forward order: Started → InProgress → InsurancePending → AssessmentComplete → Submitted.
 *   Only the immediate next step is legal (no skipping, no going back).
 * - Abandoned and Expired are reachable from every status, Submitted included.
 * - Once Abandoned/Expired, every request is a no-op that returns the session unchanged.
 * - Requesting the current status is a no-op success (client retries are expected).
 * - An applied transition stamps updatedAt and extends expiresAt, never shortens it.
 * - Pure: "now" is passed in; returns a new session object.
 */

import type { IntakeSession, SessionStatus } from '../intake.types';

export const FORWARD_ORDER = [
  'Started',
  'InProgress',
  'InsurancePending',
  'AssessmentComplete',
  'Submitted',
] as const satisfies readonly SessionStatus[];

export const TERMINAL_EXITS = ['Abandoned', 'Expired'] as const satisfies readonly SessionStatus[];

type ExitStatus = (typeof TERMINAL_EXITS)[number];

export type TransitionError = {
  kind: 'InvalidTransition';
  attempted: SessionStatus;
  current: SessionStatus;
};

export type TransitionResult =
  | {
      ok: true;
      session: IntakeSession;
      /** false for idempotent no-ops; callers skip persistence/audit when false. */
      changed: boolean;
      previousStatus: SessionStatus;
    }
  | { ok: false; error: TransitionError };

export type TransitionOptions = {
  now: Date;
  activityWindowSeconds: number;
};

export function isExitStatus(status: SessionStatus): status is ExitStatus {
  return status === 'Abandoned' || status === 'Expired';
}

/**
 * Submitted, Abandoned and Expired accept no further intake activity.
 * (Submitted can still be abandoned/expired by the state machine.)
 */
export function isInactiveStatus(status: SessionStatus): boolean {
  return status === 'Submitted' || isExitStatus(status);
}

function forwardIndex(status: SessionStatus): number {
  return FORWARD_ORDER.findIndex((s) => s === status);
}

export function isLegalTransition(current: SessionStatus, target: SessionStatus): boolean {
  if (isExitStatus(current)) return false;
  if (isExitStatus(target)) return true;

  const from = forwardIndex(current);
  const to = forwardIndex(target);
  return from >= 0 && to === from + 1;
}

/**
 * Activity stamp shared by transitions and plain activity (field recorded, recovery redeemed).
 */
export function extendActivity(session: IntakeSession, opts: TransitionOptions): IntakeSession {
  const windowEnd = opts.now.getTime() + opts.activityWindowSeconds * 1000;

  return {
    ...session,
    updatedAt: opts.now,
    expiresAt: new Date(Math.max(session.expiresAt.getTime(), windowEnd)),
  };
}

export function transition(
  session: IntakeSession,
  target: SessionStatus,
  opts: TransitionOptions,
): TransitionResult {
  const current = session.status;

  if (isExitStatus(current) || current === target) {
    return { ok: true, session, changed: false, previousStatus: current };
  }

  if (!isLegalTransition(current, target)) {
    return { ok: false, error: { kind: 'InvalidTransition', attempted: target, current } };
  }

  return {
    ok: true,
    session: { ...extendActivity(session, opts), status: target },
    changed: true,
    previousStatus: current,
  };
}
