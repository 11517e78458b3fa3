/**
 * backend/src/modules/intake/helpers/with-conflict-retry.ts
 *
 * WHY:
 * - Concurrent devices writing the same session are expected. A CAS miss re-runs the
 *   whole read-modify-write cycle instead of surfacing to the user.
 *
 * RULES:
 * - Bounded: `attempts` total runs, exponential backoff between them
 *   (backoffMs, 2×, 4× ...).
 * - Only SessionConflictError is retried; every other error propagates untouched.
 * - Exhaustion surfaces IntakeErrors.transientFailure (503).
 * - The callback must be safe to re-run: no audits, no queue writes inside it.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../../../shared/logger/logger';
import { SessionConflictError } from '../dal/session.repo';
import { IntakeErrors } from '../intake.errors';

export type ConflictRetryOptions = {
  attempts: number;
  backoffMs: number;
  logger: Logger;
  sessionId: string;
};

export async function withConflictRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: ConflictRetryOptions,
): Promise<T> {
  const attempts = Math.max(1, opts.attempts);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!(err instanceof SessionConflictError)) throw err;

      opts.logger.warn({
        msg: 'intake.session.write_conflict',
        sessionId: opts.sessionId,
        attempt,
        attempts,
      });

      if (attempt < attempts && opts.backoffMs > 0) {
        await sleep(opts.backoffMs * 2 ** (attempt - 1));
      }
    }
  }

  throw IntakeErrors.transientFailure({ sessionId: opts.sessionId, attempts });
}
