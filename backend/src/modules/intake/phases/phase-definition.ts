/**
 * backend/src/modules/intake/phases/phase-definition.ts
 *
 * WHY:
 * - The ordered phase table drives percentage, current-phase and time-estimate math.
 * - It is configuration, loaded once at startup, validated, frozen and injected.
 *   Changing phases means editing intake-phases.json and bumping its version;
 *   phase-definition.spec.ts pins the shipped order and field counts.
 *
 * RULES:
 * - Pure module: no I/O beyond the static JSON import.
 * - Field names are unique across ALL phases (a field belongs to exactly one phase).
 * - At most one field is the contact identity used for session recovery.
 */

import { z } from 'zod';
import rawDefaultPhases from './intake-phases.json';
import type { FieldName, PhaseName } from '../intake.types';

const fieldSpecSchema = z.object({
  name: z.string().min(1),
  prompt: z.string().min(1),
  contact: z.boolean().optional(),
});

const phaseSpecSchema = z.object({
  name: z.string().min(1),
  baselineMinutes: z.number().nonnegative(),
  description: z.string().optional(),
  fields: z.array(fieldSpecSchema),
});

export const phaseDefinitionSchema = z
  .object({
    version: z.number().int().positive(),
    phases: z.array(phaseSpecSchema).min(1),
  })
  .superRefine((def, ctx) => {
    const phaseNames = new Set<string>();
    const fieldNames = new Set<string>();
    let contactFields = 0;

    for (const phase of def.phases) {
      if (phaseNames.has(phase.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate phase: ${phase.name}` });
      }
      phaseNames.add(phase.name);

      for (const field of phase.fields) {
        if (fieldNames.has(field.name)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate field: ${field.name}` });
        }
        fieldNames.add(field.name);
        if (field.contact) contactFields += 1;
      }
    }

    if (contactFields > 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'more than one contact field' });
    }
  });

export type FieldSpec = Readonly<{
  name: FieldName;
  prompt: string;
  contact: boolean;
}>;

export type PhaseSpec = Readonly<{
  name: PhaseName;
  baselineMinutes: number;
  description: string | null;
  fields: readonly FieldSpec[];
}>;

export type PhaseDefinition = Readonly<{
  version: number;
  phases: readonly PhaseSpec[];
}>;

/**
 * Validates and freezes a phase table. Throws (ZodError) on invalid input:
 * a broken table must stop startup, not degrade silently.
 */
export function loadPhaseDefinition(raw: unknown): PhaseDefinition {
  const parsed = phaseDefinitionSchema.parse(raw);

  const phases = parsed.phases.map((phase) =>
    Object.freeze({
      name: phase.name,
      baselineMinutes: phase.baselineMinutes,
      description: phase.description ?? null,
      fields: Object.freeze(
        phase.fields.map((field) =>
          Object.freeze({
            name: field.name,
            prompt: field.prompt,
            contact: field.contact ?? false,
          }),
        ),
      ),
    }),
  );

  return Object.freeze({ version: parsed.version, phases: Object.freeze(phases) });
}

export const DEFAULT_PHASE_DEFINITION: PhaseDefinition = loadPhaseDefinition(rawDefaultPhases);

// ── Lookups ──────────────────────────────────────────────────

export function firstPhase(def: PhaseDefinition): PhaseSpec {
  const phase = def.phases[0];
  if (!phase) throw new Error('phase definition has no phases');
  return phase;
}

export function lastPhase(def: PhaseDefinition): PhaseSpec {
  const phase = def.phases[def.phases.length - 1];
  if (!phase) throw new Error('phase definition has no phases');
  return phase;
}

export function findPhase(def: PhaseDefinition, name: PhaseName): PhaseSpec | undefined {
  return def.phases.find((phase) => phase.name === name);
}

export function phaseIndex(def: PhaseDefinition, name: PhaseName): number {
  return def.phases.findIndex((phase) => phase.name === name);
}

export function findField(
  def: PhaseDefinition,
  fieldName: FieldName,
): { phase: PhaseSpec; field: FieldSpec } | undefined {
  for (const phase of def.phases) {
    const field = phase.fields.find((f) => f.name === fieldName);
    if (field) return { phase, field };
  }
  return undefined;
}

export function contactField(def: PhaseDefinition): FieldSpec | undefined {
  for (const phase of def.phases) {
    const field = phase.fields.find((f) => f.contact);
    if (field) return field;
  }
  return undefined;
}

export function totalRequiredFields(def: PhaseDefinition): number {
  return def.phases.reduce((sum, phase) => sum + phase.fields.length, 0);
}

export function isPhaseComplete(phase: PhaseSpec, completed: ReadonlySet<FieldName>): boolean {
  return phase.fields.every((field) => completed.has(field.name));
}

/**
 * First phase (in order) with an outstanding required field; the last phase when none is left.
 */
export function resolveCurrentPhase(
  def: PhaseDefinition,
  completed: ReadonlySet<FieldName>,
): PhaseSpec {
  return def.phases.find((phase) => !isPhaseComplete(phase, completed)) ?? lastPhase(def);
}
