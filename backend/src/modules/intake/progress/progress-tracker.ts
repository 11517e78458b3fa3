/**
 * backend/src/modules/intake/progress/progress-tracker.ts
 *
 * WHY:
 * - Pure computation of progress indicators from a snapshot + the phase table.
 * - Read path for every conversational turn: it must never throw. A snapshot that does
 *   not fit the schema, or that points at a phase the table does not know, yields the
 *   safe default instead.
 *
 * MONOTONICITY:
 * - percentage = max(floor(completed / total * 100), snapshot.lastPercentage).
 *   Callers persist the returned percentage as the new lastPercentage; the clamp only
 *   holds across calls if they do.
 *
 * TIME ESTIMATE:
 * - Sum of baselines of the phases not yet complete, scaled by the pace multiplier:
 *   (actual minutes over timed completed phases) / (baseline minutes over the same phases),
 *   clamped to the configured bounds. Zero-length and inverted timings are ignored.
 *   No timed completed phase → multiplier 1.
 */

import type { PhaseName, ProgressResult, ProgressSnapshot } from '../intake.types';
import type { PhaseDefinition } from '../phases/phase-definition';
import {
  findPhase,
  firstPhase,
  isPhaseComplete,
  phaseIndex,
  resolveCurrentPhase,
  totalRequiredFields,
} from '../phases/phase-definition';
import { progressSnapshotSchema } from './progress-snapshot';

export type PaceBounds = Readonly<{ min: number; max: number }>;

export const DEFAULT_PACE_BOUNDS: PaceBounds = { min: 0.5, max: 2.0 };

export type ProgressTrackerOptions = {
  paceBounds?: PaceBounds;
};

function nextPhaseName(def: PhaseDefinition, current: PhaseName): PhaseName | null {
  const idx = phaseIndex(def, current);
  return def.phases[idx + 1]?.name ?? null;
}

function baselineSum(def: PhaseDefinition, phases: readonly PhaseName[]): number {
  return phases.reduce((sum, name) => sum + (findPhase(def, name)?.baselineMinutes ?? 0), 0);
}

/**
 * Returned whenever the snapshot cannot be trusted.
 */
export function defaultProgress(def: PhaseDefinition): ProgressResult {
  const first = firstPhase(def);

  return {
    percentage: 0,
    currentPhase: first.name,
    completedPhases: [],
    nextPhase: nextPhaseName(def, first.name),
    estimatedMinutesRemaining: baselineSum(
      def,
      def.phases.map((p) => p.name),
    ),
  };
}

export function paceMultiplier(
  snapshot: ProgressSnapshot,
  def: PhaseDefinition,
  bounds: PaceBounds = DEFAULT_PACE_BOUNDS,
): number {
  let totalActual = 0;
  let totalBaseline = 0;

  for (const [name, timing] of Object.entries(snapshot.phaseTimings)) {
    if (!timing.completedAt) continue;

    const phase = findPhase(def, name);
    if (!phase) continue;

    const startedMs = Date.parse(timing.startedAt);
    const completedMs = Date.parse(timing.completedAt);
    if (Number.isNaN(startedMs) || Number.isNaN(completedMs) || completedMs <= startedMs) continue;

    totalActual += (completedMs - startedMs) / 60_000;
    totalBaseline += phase.baselineMinutes;
  }

  if (totalBaseline === 0) return 1;

  return Math.min(bounds.max, Math.max(bounds.min, totalActual / totalBaseline));
}

export function computeProgress(
  snapshot: ProgressSnapshot,
  def: PhaseDefinition,
  opts: ProgressTrackerOptions = {},
): ProgressResult {
  const checked = progressSnapshotSchema.safeParse(snapshot);
  if (!checked.success || !findPhase(def, checked.data.currentPhase)) {
    return defaultProgress(def);
  }

  const trusted = checked.data;
  const completed = new Set(trusted.completedFields);

  const total = totalRequiredFields(def);
  const done = def.phases.reduce(
    (sum, phase) => sum + phase.fields.filter((f) => completed.has(f.name)).length,
    0,
  );
  const raw = total === 0 ? 100 : Math.floor((done * 100) / total);
  const percentage = Math.min(100, Math.max(raw, trusted.lastPercentage));

  const completedPhases = def.phases
    .filter((phase) => isPhaseComplete(phase, completed))
    .map((phase) => phase.name);

  const current = resolveCurrentPhase(def, completed);

  const remaining = def.phases
    .filter((phase) => !isPhaseComplete(phase, completed))
    .map((phase) => phase.name);

  const multiplier = paceMultiplier(trusted, def, opts.paceBounds);

  return {
    percentage,
    currentPhase: current.name,
    completedPhases,
    nextPhase: nextPhaseName(def, current.name),
    estimatedMinutesRemaining: Math.ceil(baselineSum(def, remaining) * multiplier),
  };
}
