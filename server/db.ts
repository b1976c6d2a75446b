import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';
import type { Logger } from './logger.js';
import type { Database } from './db/types.js';

export interface DatabaseHandle {
  db: Kysely<Database>;
  close(): Promise<void>;
}

/**
 * Open a pooled Postgres connection for the result sink. SSL verification
 * follows DB_SSL_REJECT_UNAUTHORIZED (default on outside localhost).
 */
export function createDatabase(connectionString: string, logger: Logger, env: NodeJS.ProcessEnv = process.env): DatabaseHandle {
  const isLocal = /@(localhost|127\.0\.0\.1)(:\d+)?\//.test(connectionString);
  const rejectUnauthorized =
    String(env.DB_SSL_REJECT_UNAUTHORIZED || (isLocal ? 'false' : 'true')).toLowerCase() !== 'false';
  const pool = new pg.Pool({
    connectionString,
    ssl: isLocal ? undefined : { rejectUnauthorized },
    max: 4,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    statement_timeout: 30000,
  });

  pool.on('error', (err) => {
    logger.error({ event: 'db_pool_error', error: err.message }, 'Unexpected idle Postgres client error');
  });

  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });

  return {
    db,
    async close() {
      // Kysely's destroy ends the underlying pool.
      await db.destroy();
    },
  };
}
