/**
 * src/shared/db/migrations/0002_audit_events.ts
 *
 * - audit_events: append-only compliance trail for intake actions.
 * - session_id is nullable (failed recovery attempts are not tied to a session).
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('audit_events')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('action', 'text', (col) => col.notNull())
    .addColumn('session_id', 'uuid', (col) =>
      col.references('onboarding_sessions.id').onDelete('set null'),
    )
    .addColumn('request_id', 'text')
    .addColumn('ip', 'text')
    .addColumn('user_agent', 'text')
    .addColumn('metadata', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('audit_events_session_id_created_at_idx')
    .on('audit_events')
    .columns(['session_id', 'created_at'])
    .execute();

  await db.schema
    .createIndex('audit_events_action_idx')
    .on('audit_events')
    .column('action')
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('audit_events').execute();
}
