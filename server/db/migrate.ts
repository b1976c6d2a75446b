import { Migrator, type Kysely, type Migration, type MigrationProvider } from 'kysely';
import type { Logger } from '../logger.js';
import * as initial from './migrations/001_initial.js';

/** Migrations are registered here in order; no directory scanning. */
const MIGRATIONS: Record<string, Migration> = {
  '001_initial': initial,
};

const staticMigrationProvider: MigrationProvider = {
  async getMigrations() {
    return MIGRATIONS;
  },
};

export async function runMigrations<DB>(db: Kysely<DB>, logger: Logger): Promise<void> {
  const migrator = new Migrator({ db, provider: staticMigrationProvider });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((it) => {
    if (it.status === 'Success') {
      logger.info(`Migration "${it.migrationName}" was executed successfully`);
    } else if (it.status === 'Error') {
      logger.error(`Failed to execute migration "${it.migrationName}"`);
    }
  });

  if (error) {
    logger.error('Failed to run migrations');
    throw error;
  }
}
