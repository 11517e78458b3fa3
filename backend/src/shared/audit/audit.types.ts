/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit event types (compliance trail stored in DB).
 * - AuditContext groups the request-level fields that repeat on every event.
 * - AuditAction uses a union + escape hatch to catch typos early.
 *
 * RULES:
 * - Metadata values are scalars or lists of names: statuses, field names, counts, flags.
 *   Raw PHI (collected values, emails) never goes into an audit event.
 * - Never import module types here (shared must stay module-agnostic).
 */

export type KnownAuditAction =
  | 'intake.session.created'
  | 'intake.session.status_changed'
  | 'intake.session.abandoned'
  | 'intake.session.expired'
  | 'intake.field.recorded'
  | 'intake.credential.refreshed'
  | 'intake.recovery.requested'
  | 'intake.recovery.completed'
  | 'intake.recovery.failed';

// Escape hatch: allows new actions without updating this file every time.
export type AuditAction = KnownAuditAction | (string & {});

export type AuditMetadataValue = string | number | boolean | null | readonly string[];

export type AuditMetadata = Record<string, AuditMetadataValue>;

/**
 * Request-level context that is identical across every audit event within a request.
 * sessionId is null until the request has resolved which intake session it acts on
 * (e.g. a recovery token that turned out to be invalid).
 */
export type AuditContext = {
  sessionId: string | null;
  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};
