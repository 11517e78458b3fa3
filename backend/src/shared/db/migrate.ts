/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably from the compiled output (no TS loader needed).
 *
 * HOW TO USE:
 * - npm run build && npm run db:migrate --workspace backend
 */

import 'dotenv/config';

import { Migrator } from 'kysely';
import { createDb } from './db';
import { migrations } from './migrations';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  const migrator = new Migrator({
    db,
    provider: {
      getMigrations: () => Promise.resolve(migrations),
    },
  });

  logger.info('db.migrate.start', { count: Object.keys(migrations).length });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('db.migrate.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('db.migrate.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('db.migrate.failed', { err: error });
    process.exitCode = 1;
    return;
  }

  logger.info('db.migrate.done');
}

void runMigrations().catch((err: unknown) => {
  logger.error('db.migrate.fatal', { err });
  process.exitCode = 1;
});
