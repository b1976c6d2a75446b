import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  // analysis_runs
  await db.schema
    .createTable('analysis_runs')
    .ifNotExists()
    .addColumn('run_id', 'varchar(64)', (col) => col.primaryKey())
    .addColumn('started_at', 'timestamptz', (col) => col.notNull())
    .addColumn('finished_at', 'timestamptz', (col) => col.notNull())
    .addColumn('market_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('failure_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .execute();

  // market_performance
  await db.schema
    .createTable('market_performance')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('run_id', 'varchar(64)', (col) => col.notNull().references('analysis_runs.run_id').onDelete('cascade'))
    .addColumn('category', 'varchar(40)', (col) => col.notNull())
    .addColumn('epic', 'varchar(64)', (col) => col.notNull())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('currency', 'varchar(10)')
    .addColumn('current_price', 'numeric(20, 6)')
    .addColumn('price_change_pct', 'numeric(14, 4)')
    .addColumn('perf_1w', 'numeric(14, 4)')
    .addColumn('perf_1m', 'numeric(14, 4)')
    .addColumn('perf_3m', 'numeric(14, 4)')
    .addColumn('perf_6m', 'numeric(14, 4)')
    .addColumn('perf_ytd', 'numeric(14, 4)')
    .addColumn('perf_1y', 'numeric(14, 4)')
    .addColumn('perf_5y', 'numeric(14, 4)')
    .addColumn('perf_10y', 'numeric(14, 4)')
    .addColumn('market_status', 'varchar(40)')
    .addColumn('instrument_type', 'varchar(40)')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .execute();

  await db.schema
    .createIndex('market_performance_run_category_epic_key')
    .ifNotExists()
    .on('market_performance')
    .columns(['run_id', 'category', 'epic'])
    .unique()
    .execute();

  await db.schema
    .createIndex('idx_market_performance_epic_created')
    .ifNotExists()
    .on('market_performance')
    .columns(['epic', 'created_at'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('market_performance').ifExists().execute();
  await db.schema.dropTable('analysis_runs').ifExists().execute();
}
