/**
 * backend/src/modules/intake/dal/inmem-session.repo.ts
 *
 * WHY:
 * - Durable-store stand-in for tests and local runs without Postgres.
 * - Same contract as KyselySessionRepo: CAS on version, GREATEST on lastPercentage
 *   and expiresAt.
 *
 * RULES:
 * - Stores clones; callers never hold a reference into the map.
 */

import type { IntakeSession } from '../intake.types';
import type { SessionRepo } from './session.repo';
import { SessionConflictError } from './session.repo';

export class InMemSessionRepo implements SessionRepo {
  private readonly rows = new Map<string, IntakeSession>();

  get(sessionId: string): Promise<IntakeSession | null> {
    const row = this.rows.get(sessionId);
    return Promise.resolve(row ? structuredClone(row) : null);
  }

  insert(session: IntakeSession): Promise<IntakeSession> {
    if (this.rows.has(session.id)) {
      return Promise.reject(new Error(`duplicate session id: ${session.id}`));
    }

    this.rows.set(session.id, structuredClone(session));
    return Promise.resolve(structuredClone(session));
  }

  put(session: IntakeSession): Promise<IntakeSession> {
    const stored = this.rows.get(session.id);
    if (!stored || stored.version !== session.version) {
      return Promise.reject(new SessionConflictError(session.id, session.version));
    }

    const next: IntakeSession = {
      ...structuredClone(session),
      progressSnapshot: {
        ...structuredClone(session.progressSnapshot),
        lastPercentage: Math.max(
          stored.progressSnapshot.lastPercentage,
          session.progressSnapshot.lastPercentage,
        ),
      },
      expiresAt: new Date(Math.max(stored.expiresAt.getTime(), session.expiresAt.getTime())),
      version: session.version + 1,
    };

    this.rows.set(session.id, next);
    return Promise.resolve(structuredClone(next));
  }
}
