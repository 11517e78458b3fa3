/**
 * src/shared/audit/inmem-audit.repo.ts
 *
 * WHY:
 * - Tests assert on audit events without a database.
 * - drain() mirrors InMemQueue: returns everything appended so far and clears it.
 */

import type { AuditRepo } from './audit.repo';
import type { AuditEventInsert } from './audit.types';

export class InMemAuditRepo implements AuditRepo {
  private readonly events: AuditEventInsert[] = [];

  append(event: AuditEventInsert): Promise<void> {
    this.events.push(event);
    return Promise.resolve();
  }

  drain(): AuditEventInsert[] {
    return this.events.splice(0, this.events.length);
  }
}
