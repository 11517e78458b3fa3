/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only audit sink. The intake core only knows the AuditRepo contract;
 *   KyselyAuditRepo persists to Postgres, InMemAuditRepo backs tests.
 *
 * RULES:
 * - DAL-style component: DB concerns only.
 * - No business rules here.
 * - No AppError.
 */

import type { DbExecutor } from '../db/db';
import type { AuditEventInsert } from './audit.types';

export interface AuditRepo {
  append(event: AuditEventInsert): Promise<void>;
}

export class KyselyAuditRepo implements AuditRepo {
  constructor(private readonly db: DbExecutor) {}

  async append(event: AuditEventInsert): Promise<void> {
    await this.db
      .insertInto('audit_events')
      .values({
        action: event.action,
        session_id: event.sessionId,
        request_id: event.requestId,
        ip: event.ip,
        user_agent: event.userAgent,
        metadata: JSON.stringify(event.metadata ?? {}),
        // created_at is Generated in DB
      })
      .execute();
  }
}
