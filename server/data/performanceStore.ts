import type { Kysely } from 'kysely';
import type { Logger } from '../logger.js';
import type { Database, NewMarketPerformance } from '../db/types.js';
import type { MarketAnalysis } from '../services/marketRows.js';
import type { ResultSink, RunMeta } from './resultSink.js';

const UPSERT_BATCH_SIZE = 200;

export function toMarketPerformanceInsert(analysis: MarketAnalysis, runId: string): NewMarketPerformance {
  const perf = analysis.performance;
  return {
    run_id: runId,
    category: analysis.category,
    epic: analysis.epic,
    name: analysis.name,
    currency: analysis.currency,
    current_price: analysis.currentPrice,
    price_change_pct: analysis.priceChangePct,
    perf_1w: perf['1W'],
    perf_1m: perf['1M'],
    perf_3m: perf['3M'],
    perf_6m: perf['6M'],
    perf_ytd: perf.YTD,
    perf_1y: perf['1Y'],
    perf_5y: perf['5Y'],
    perf_10y: perf['10Y'],
    market_status: analysis.marketStatus,
    instrument_type: analysis.instrumentType,
  };
}

/**
 * One row per (category, epic); the last occurrence wins. A market listed
 * under two categories keeps a row for each.
 */
export function uniqueByConflictKey(rows: NewMarketPerformance[]): NewMarketPerformance[] {
  const byKey = new Map<string, NewMarketPerformance>();
  for (const row of rows) {
    byKey.set(`${row.category}\u0000${row.epic}`, row);
  }
  return [...byKey.values()];
}

export function buildRunInsertQuery(db: Kysely<Database>, meta: RunMeta, marketCount: number) {
  return db
    .insertInto('analysis_runs')
    .values({
      run_id: meta.runId,
      started_at: meta.startedAt,
      finished_at: meta.finishedAt,
      market_count: marketCount,
      failure_count: meta.failureCount,
    })
    .onConflict((oc) =>
      oc.column('run_id').doUpdateSet((eb) => ({
        finished_at: eb.ref('excluded.finished_at'),
        market_count: eb.ref('excluded.market_count'),
        failure_count: eb.ref('excluded.failure_count'),
      })),
    );
}

export function buildPerformanceUpsertQuery(db: Kysely<Database>, rows: NewMarketPerformance[]) {
  return db
    .insertInto('market_performance')
    .values(rows)
    .onConflict((oc) =>
      oc.columns(['run_id', 'category', 'epic']).doUpdateSet((eb) => ({
        name: eb.ref('excluded.name'),
        currency: eb.ref('excluded.currency'),
        current_price: eb.ref('excluded.current_price'),
        price_change_pct: eb.ref('excluded.price_change_pct'),
        perf_1w: eb.ref('excluded.perf_1w'),
        perf_1m: eb.ref('excluded.perf_1m'),
        perf_3m: eb.ref('excluded.perf_3m'),
        perf_6m: eb.ref('excluded.perf_6m'),
        perf_ytd: eb.ref('excluded.perf_ytd'),
        perf_1y: eb.ref('excluded.perf_1y'),
        perf_5y: eb.ref('excluded.perf_5y'),
        perf_10y: eb.ref('excluded.perf_10y'),
        market_status: eb.ref('excluded.market_status'),
        instrument_type: eb.ref('excluded.instrument_type'),
      })),
    );
}

export class PostgresResultSink implements ResultSink {
  readonly name = 'postgres';
  private readonly db: Kysely<Database>;
  private readonly logger: Logger;

  constructor(options: { db: Kysely<Database>; logger: Logger }) {
    this.db = options.db;
    this.logger = options.logger;
  }

  async write(_rows: unknown[], analyses: MarketAnalysis[], meta: RunMeta): Promise<void> {
    const inserts = uniqueByConflictKey(analyses.map((analysis) => toMarketPerformanceInsert(analysis, meta.runId)));
    await this.db.transaction().execute(async (trx) => {
      await buildRunInsertQuery(trx, meta, inserts.length).execute();
      for (let i = 0; i < inserts.length; i += UPSERT_BATCH_SIZE) {
        await buildPerformanceUpsertQuery(trx, inserts.slice(i, i + UPSERT_BATCH_SIZE)).execute();
      }
    });
    this.logger.info({ event: 'db_written', runId: meta.runId, rows: inserts.length }, 'Results stored in Postgres');
  }
}
