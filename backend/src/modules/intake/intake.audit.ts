/**
 * src/modules/intake/intake.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the intake module.
 * - Keeps audit metadata consistent per domain action.
 *
 * RULES:
 * - Each function maps one domain action to one audit write.
 * - Metadata carries statuses, field/phase names, counts and flags. Never values,
 *   never the contact email, never tokens.
 *
 * RECOVERY AUDIT PATTERN:
 * - intake.recovery.requested is written on every accepted request, `outcome`
 *   distinguishing 'sent' from 'rate_limited'.
 * - intake.recovery.completed / intake.recovery.failed on token redemption.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { PhaseName, SessionStatus } from './intake.types';

export function auditSessionCreated(
  writer: AuditWriter,
  data: { hasReferralSource: boolean },
): Promise<void> {
  return writer.append('intake.session.created', {
    hasReferralSource: data.hasReferralSource,
  });
}

export function auditStatusChanged(
  writer: AuditWriter,
  data: { from: SessionStatus; to: SessionStatus },
): Promise<void> {
  return writer.append('intake.session.status_changed', { from: data.from, to: data.to });
}

export function auditFieldRecorded(
  writer: AuditWriter,
  data: {
    fieldName: string;
    phase: PhaseName;
    repeated: boolean;
    percentage: number;
    completedPhases: readonly string[];
  },
): Promise<void> {
  return writer.append('intake.field.recorded', {
    fieldName: data.fieldName,
    phase: data.phase,
    repeated: data.repeated,
    percentage: data.percentage,
    completedPhases: data.completedPhases,
  });
}

export function auditSessionAbandoned(
  writer: AuditWriter,
  data: { previousStatus: SessionStatus },
): Promise<void> {
  return writer.append('intake.session.abandoned', { previousStatus: data.previousStatus });
}

export function auditSessionExpired(
  writer: AuditWriter,
  data: { previousStatus: SessionStatus },
): Promise<void> {
  return writer.append('intake.session.expired', { previousStatus: data.previousStatus });
}

export function auditCredentialRefreshed(
  writer: AuditWriter,
  data: { status: SessionStatus },
): Promise<void> {
  return writer.append('intake.credential.refreshed', { status: data.status });
}

export function auditRecoveryRequested(
  writer: AuditWriter,
  data: { outcome: 'sent' | 'rate_limited' },
): Promise<void> {
  return writer.append('intake.recovery.requested', { outcome: data.outcome });
}

export function auditRecoveryCompleted(
  writer: AuditWriter,
  data: { status: SessionStatus },
): Promise<void> {
  return writer.append('intake.recovery.completed', { status: data.status });
}

/**
 * reason is coarse on purpose: token_invalid covers unknown, used and expired tokens.
 */
export function auditRecoveryFailed(
  writer: AuditWriter,
  data: { reason: 'token_invalid' | 'session_missing' | 'session_inactive' },
): Promise<void> {
  return writer.append('intake.recovery.failed', { reason: data.reason });
}
