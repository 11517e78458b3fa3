/**
 * backend/src/modules/intake/dal/session.repo.ts
 *
 * WHY:
 * - Durable session store contract + its Postgres implementation.
 *
 * RULES:
 * - put() is a compare-and-swap on `version`. A miss throws SessionConflictError;
 *   it is never swallowed (the orchestrator owns the retry loop).
 * - last_percentage and expires_at are protected inside the UPDATE itself (GREATEST),
 *   so even a writer holding a stale copy cannot move either one backward.
 * - No AppError. No policies. No transactions started here.
 */

import { sql } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { IntakeSession, PhaseName } from '../intake.types';
import { toIntakeSession } from './session.mapper';

export class SessionConflictError extends Error {
  constructor(
    public readonly sessionId: string,
    public readonly expectedVersion: number,
  ) {
    super('Session was modified concurrently');
    this.name = 'SessionConflictError';
  }
}

export interface SessionRepo {
  get(sessionId: string): Promise<IntakeSession | null>;

  /** Persists a brand-new session (version 0). */
  insert(session: IntakeSession): Promise<IntakeSession>;

  /**
   * Writes the session if the stored version still equals session.version.
   * Returns the stored session (version + 1).
   */
  put(session: IntakeSession): Promise<IntakeSession>;
}

export class KyselySessionRepo implements SessionRepo {
  constructor(
    private readonly db: DbExecutor,
    private readonly fallbackPhase: PhaseName,
  ) {}

  async get(sessionId: string): Promise<IntakeSession | null> {
    const row = await this.db
      .selectFrom('onboarding_sessions')
      .selectAll()
      .where('id', '=', sessionId)
      .executeTakeFirst();

    return row ? toIntakeSession(row, this.fallbackPhase) : null;
  }

  async insert(session: IntakeSession): Promise<IntakeSession> {
    const row = await this.db
      .insertInto('onboarding_sessions')
      .values({
        id: session.id,
        status: session.status,
        progress: JSON.stringify(session.progressSnapshot),
        collected_values: JSON.stringify(session.collectedValues),
        last_percentage: session.progressSnapshot.lastPercentage,
        referral_source: session.referralSource,
        expires_at: session.expiresAt,
        created_at: session.createdAt,
        updated_at: session.updatedAt,
        version: session.version,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toIntakeSession(row, this.fallbackPhase);
  }

  async put(session: IntakeSession): Promise<IntakeSession> {
    const row = await this.db
      .updateTable('onboarding_sessions')
      .set({
        status: session.status,
        progress: JSON.stringify(session.progressSnapshot),
        collected_values: JSON.stringify(session.collectedValues),
        last_percentage: sql<number>`GREATEST(last_percentage, ${session.progressSnapshot.lastPercentage})`,
        expires_at: sql<Date>`GREATEST(expires_at, ${session.expiresAt})`,
        updated_at: session.updatedAt,
        version: session.version + 1,
      })
      .where('id', '=', session.id)
      .where('version', '=', session.version)
      .returningAll()
      .executeTakeFirst();

    if (!row) throw new SessionConflictError(session.id, session.version);

    return toIntakeSession(row, this.fallbackPhase);
  }
}
