/**
 * backend/src/modules/intake/dal/session.mapper.ts
 *
 * WHY:
 * - Single place where onboarding_sessions rows become IntakeSession objects.
 * - jsonb columns are parsed (zod) exactly once, here.
 *
 * RULES:
 * - A progress blob that does not parse is replaced by an empty snapshot that still
 *   carries the last_percentage column, so a broken blob never lowers visible progress.
 * - status and collected_values must parse; a row that breaks them is a store failure
 *   and throws.
 */

import type { Selectable } from 'kysely';
import { z } from 'zod';
import type { OnboardingSessions } from '../../../shared/db/database.types';
import { SESSION_STATUSES } from '../intake.types';
import type { IntakeSession, PhaseName, ProgressSnapshot } from '../intake.types';
import { emptySnapshot, progressSnapshotSchema } from '../progress/progress-snapshot';

export type SessionRow = Selectable<OnboardingSessions>;

const statusSchema = z.enum(SESSION_STATUSES);
const collectedValuesSchema = z.record(z.string());

function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value);
}

export function toProgressSnapshot(
  raw: unknown,
  lastPercentageColumn: number,
  fallbackPhase: PhaseName,
): ProgressSnapshot {
  const parsed = progressSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    return { ...emptySnapshot(fallbackPhase), lastPercentage: lastPercentageColumn };
  }

  return {
    ...parsed.data,
    lastPercentage: Math.max(parsed.data.lastPercentage, lastPercentageColumn),
  };
}

export function toIntakeSession(row: SessionRow, fallbackPhase: PhaseName): IntakeSession {
  return {
    id: row.id,
    status: statusSchema.parse(row.status),
    progressSnapshot: toProgressSnapshot(row.progress, row.last_percentage, fallbackPhase),
    collectedValues: collectedValuesSchema.parse(row.collected_values),
    referralSource: row.referral_source,
    expiresAt: toDate(row.expires_at),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
    version: row.version,
  };
}
