/**
 * backend/src/modules/intake/progress/progress-snapshot.ts
 *
 * WHY:
 * - Runtime schema for ProgressSnapshot. Snapshots live in a jsonb column, so the shape
 *   is re-checked whenever it crosses a trust boundary (DAL read, Progress Tracker input).
 */

import { z } from 'zod';
import type { PhaseName, ProgressSnapshot } from '../intake.types';

const isoString = z.string().min(1);

export const progressSnapshotSchema = z.object({
  currentPhase: z.string().min(1),
  completedFields: z.array(z.string().min(1)),
  fieldMetadata: z.record(
    z.object({
      collectedAt: isoString,
      confidence: z.number().min(0).max(1),
    }),
  ),
  lastPercentage: z.number().int().min(0).max(100),
  phaseTimings: z.record(
    z.object({
      startedAt: isoString,
      completedAt: isoString.nullable(),
    }),
  ),
});

export function emptySnapshot(currentPhase: PhaseName): ProgressSnapshot {
  return {
    currentPhase,
    completedFields: [],
    fieldMetadata: {},
    lastPercentage: 0,
    phaseTimings: {},
  };
}
