/**
 * backend/src/shared/db/database.types.ts
 *
 * WHY:
 * - Kysely table interfaces for the intake schema (see migrations/).
 * - Keep in lockstep with the migrations: every column added there is added here.
 *
 * RULES:
 * - snake_case mirrors the DB; DAL mappers translate to domain types.
 * - jsonb columns are written as JSON strings and read back as parsed values (pg).
 */

import type { ColumnType, Generated } from 'kysely';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type Json = ColumnType<JsonValue, string, string>;

export type Timestamp = ColumnType<Date, Date | string, Date | string>;
export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export interface OnboardingSessions {
  id: string;
  status: string;
  progress: Json;
  collected_values: Json;
  last_percentage: number;
  referral_source: string | null;
  expires_at: Timestamp;
  created_at: GeneratedTimestamp;
  updated_at: Timestamp;
  version: number;
}

export interface AuditEvents {
  id: Generated<string>;
  action: string;
  session_id: string | null;
  request_id: string | null;
  ip: string | null;
  user_agent: string | null;
  metadata: Json;
  created_at: GeneratedTimestamp;
}

export interface DB {
  onboarding_sessions: OnboardingSessions;
  audit_events: AuditEvents;
}
