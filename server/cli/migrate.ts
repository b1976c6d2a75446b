import logger from '../logger.js';
import { loadAnalyzerConfig } from '../config.js';
import { createDatabase } from '../db.js';
import { runMigrations } from '../db/migrate.js';
import { errorMessage } from '../lib/errors.js';

async function main(): Promise<number> {
  const { databaseUrl } = loadAnalyzerConfig();
  if (!databaseUrl) {
    logger.error('DATABASE_URL is not set; nothing to migrate');
    return 1;
  }
  const database = createDatabase(databaseUrl, logger);
  try {
    await runMigrations(database.db, logger);
    return 0;
  } finally {
    await database.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error({ event: 'migrate_failed', error: errorMessage(err) }, 'Migration failed');
    process.exitCode = 1;
  });
