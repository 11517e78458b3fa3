/**
 * backend/src/modules/intake/context/field-context.ts
 *
 * WHY:
 * - Tracks which fields have been collected and decides what to ask next.
 * - "Never ask twice" is driven purely by set membership in completedFields,
 *   never by conversation history.
 *
 * RULES:
 * - Pure functions; "now" and the cipher are passed in.
 * - recordField is idempotent on presence: a repeat keeps one entry in completedFields
 *   but overwrites fieldMetadata (and the stored value) with the latest attempt.
 * - Raw values are encrypted before they reach the session object.
 * - Phase timings are stamped once: startedAt when a phase becomes current,
 *   completedAt when its last required field arrives. Phases without required
 *   fields, and phases completed out of order while another phase was current,
 *   carry no timing (they would skew the pace multiplier).
 */

import type { FieldCipher } from '../../../shared/security/encryption';
import type {
  FieldName,
  IntakeSession,
  PhaseTiming,
  ProgressSnapshot,
  Question,
} from '../intake.types';
import type { PhaseDefinition } from '../phases/phase-definition';
import { isPhaseComplete, resolveCurrentPhase } from '../phases/phase-definition';

export type RecordFieldInput = {
  fieldName: FieldName;
  value: string;
  confidence: number;
  now: Date;
};

export function completedSet(snapshot: ProgressSnapshot): ReadonlySet<FieldName> {
  return new Set(snapshot.completedFields);
}

/**
 * Re-derives currentPhase from the completed set and stamps phase timings.
 */
export function stampPhaseTimings(
  snapshot: ProgressSnapshot,
  def: PhaseDefinition,
  now: Date,
): ProgressSnapshot {
  const completed = completedSet(snapshot);
  const stamp = now.toISOString();
  const timings: Record<string, PhaseTiming> = { ...snapshot.phaseTimings };

  for (const phase of def.phases) {
    if (phase.fields.length === 0 || !isPhaseComplete(phase, completed)) continue;

    // A phase finished before it ever became current has no observed duration.
    const existing = timings[phase.name];
    if (existing && existing.completedAt === null) {
      timings[phase.name] = { ...existing, completedAt: stamp };
    }
  }

  const current = resolveCurrentPhase(def, completed);
  if (current.fields.length > 0 && !timings[current.name]) {
    timings[current.name] = { startedAt: stamp, completedAt: null };
  }

  return { ...snapshot, currentPhase: current.name, phaseTimings: timings };
}

export function recordField(
  session: IntakeSession,
  input: RecordFieldInput,
  deps: { def: PhaseDefinition; cipher: FieldCipher },
): IntakeSession {
  const prev = session.progressSnapshot;

  const completedFields = prev.completedFields.includes(input.fieldName)
    ? prev.completedFields
    : [...prev.completedFields, input.fieldName];

  const snapshot = stampPhaseTimings(
    {
      ...prev,
      completedFields,
      fieldMetadata: {
        ...prev.fieldMetadata,
        [input.fieldName]: {
          collectedAt: input.now.toISOString(),
          confidence: input.confidence,
        },
      },
    },
    deps.def,
    input.now,
  );

  return {
    ...session,
    progressSnapshot: snapshot,
    collectedValues: {
      ...session.collectedValues,
      [input.fieldName]: deps.cipher.encrypt(input.value),
    },
  };
}

/**
 * Questions for the current phase only, in declared field order, skipping collected fields.
 * Empty once every required field is collected.
 */
export function pendingQuestions(session: IntakeSession, def: PhaseDefinition): Question[] {
  const completed = completedSet(session.progressSnapshot);
  const current = resolveCurrentPhase(def, completed);

  return current.fields
    .filter((field) => !completed.has(field.name))
    .map((field) => ({ phase: current.name, fieldName: field.name, prompt: field.prompt }));
}
