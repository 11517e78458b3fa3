/**
 * backend/src/modules/intake/intake.types.ts
 *
 * WHY:
 * - Domain types for the intake session core.
 * - DAL maps DB rows into these types (keeps snake_case and jsonb shapes isolated).
 *
 * RULES:
 * - progressSnapshot is fully typed; JSON parsing happens once in the DAL mapper.
 * - completedFields has set semantics: unique names, insertion order preserved.
 * - collectedValues holds ciphertext only (see FieldCipher).
 */

export const SESSION_STATUSES = [
  'Started',
  'InProgress',
  'InsurancePending',
  'AssessmentComplete',
  'Submitted',
  'Abandoned',
  'Expired',
] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

export type FieldName = string;
export type PhaseName = string;

export type FieldMetadata = {
  collectedAt: string; // ISO
  /** Extraction confidence reported by the language collaborator, 0..1. */
  confidence: number;
};

export type PhaseTiming = {
  startedAt: string; // ISO
  completedAt: string | null; // ISO
};

export type ProgressSnapshot = {
  currentPhase: PhaseName;
  completedFields: readonly FieldName[];
  fieldMetadata: Readonly<Record<FieldName, FieldMetadata>>;
  /** 0..100, never decreases over the session's lifetime. */
  lastPercentage: number;
  phaseTimings: Readonly<Record<PhaseName, PhaseTiming>>;
};

export type IntakeSession = {
  id: string;
  status: SessionStatus;
  progressSnapshot: ProgressSnapshot;
  collectedValues: Readonly<Record<FieldName, string>>;
  referralSource: string | null;
  expiresAt: Date;
  createdAt: Date;
  updatedAt: Date;
  /** Optimistic-concurrency counter owned by the session store. */
  version: number;
};

export type ProgressResult = {
  percentage: number;
  currentPhase: PhaseName;
  completedPhases: PhaseName[];
  nextPhase: PhaseName | null;
  estimatedMinutesRemaining: number;
};

export type Question = {
  phase: PhaseName;
  fieldName: FieldName;
  prompt: string;
};

/**
 * One extraction produced by the language collaborator for a single turn.
 * The core treats it as opaque input and never calls back into the producer.
 */
export type FieldExtraction = {
  fieldName: FieldName;
  extractedValue: string;
  confidence: number;
  needsClarification: boolean;
};

export type NextAction =
  | { kind: 'ask'; question: Question; progress: ProgressResult }
  | { kind: 'clarify'; question: Question; progress: ProgressResult }
  | {
      kind: 'phase_complete';
      completedPhase: PhaseName;
      nextPhase: PhaseName | null;
      progress: ProgressResult;
    }
  | { kind: 'intake_complete'; progress: ProgressResult };

/**
 * Client-safe projection of a session (no collected values).
 */
export type SessionView = {
  id: string;
  status: SessionStatus;
  currentPhase: PhaseName;
  completedFields: FieldName[];
  lastPercentage: number;
  expiresAt: string;
  createdAt: string;
  updatedAt: string;
};

export type RequestMeta = {
  requestId: string;
  ip: string | null;
  userAgent: string | null;
};

export type CredentialGrant = {
  /** Bearer value for the Authorization header. */
  credential: string;
  expiresAt: string; // ISO
};

/**
 * Returned when a client attaches to a session (creation or recovery).
 */
export type SessionGrant = {
  session: SessionView;
  progress: ProgressResult;
  credential: CredentialGrant;
};

export type ProgressView = {
  session: SessionView;
  progress: ProgressResult;
  pendingQuestions: Question[];
};
