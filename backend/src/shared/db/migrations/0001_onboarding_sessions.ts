/**
 * src/shared/db/migrations/0001_onboarding_sessions.ts
 *
 * - onboarding_sessions: durable intake session record.
 * - version: optimistic-concurrency counter; every accepted write bumps it.
 * - last_percentage is kept as its own column so the monotonic progress value can be
 *   protected by the UPDATE itself (GREATEST), independent of the progress JSON.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await sql`CREATE EXTENSION IF NOT EXISTS "pgcrypto";`.execute(db);

  await db.schema
    .createTable('onboarding_sessions')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('progress', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('collected_values', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('last_percentage', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('referral_source', 'text')
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('version', 'integer', (col) => col.notNull().defaultTo(0))
    .execute();

  await sql`
    ALTER TABLE onboarding_sessions
      ADD CONSTRAINT onboarding_sessions_status_check
      CHECK (status IN (
        'Started','InProgress','InsurancePending','AssessmentComplete',
        'Submitted','Abandoned','Expired'
      ));
  `.execute(db);

  await sql`
    ALTER TABLE onboarding_sessions
      ADD CONSTRAINT onboarding_sessions_last_percentage_check
      CHECK (last_percentage BETWEEN 0 AND 100);
  `.execute(db);

  await db.schema
    .createIndex('onboarding_sessions_status_expires_at_idx')
    .on('onboarding_sessions')
    .columns(['status', 'expires_at'])
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('onboarding_sessions').execute();
}
