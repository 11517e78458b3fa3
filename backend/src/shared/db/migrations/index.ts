/**
 * src/shared/db/migrations/index.ts
 *
 * Static migration registry. Adding a migration file means adding it here;
 * names sort lexically, so keep the numeric prefix.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_onboarding_sessions';
import * as m0002 from './0002_audit_events';

export const migrations: Record<string, Migration> = {
  '0001_onboarding_sessions': m0001,
  '0002_audit_events': m0002,
};
