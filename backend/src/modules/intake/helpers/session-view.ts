/**
 * backend/src/modules/intake/helpers/session-view.ts
 *
 * WHY:
 * - Client-safe projection of a session. Collected values never leave the server
 *   through this shape (not even encrypted).
 */

import type { IntakeSession, SessionView } from '../intake.types';

export function toSessionView(session: IntakeSession): SessionView {
  return {
    id: session.id,
    status: session.status,
    currentPhase: session.progressSnapshot.currentPhase,
    completedFields: [...session.progressSnapshot.completedFields],
    lastPercentage: session.progressSnapshot.lastPercentage,
    expiresAt: session.expiresAt.toISOString(),
    createdAt: session.createdAt.toISOString(),
    updatedAt: session.updatedAt.toISOString(),
  };
}
