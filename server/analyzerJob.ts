import * as path from 'path';
import type { AnalyzerConfig } from './config.js';
import { createDatabase, type DatabaseHandle } from './db.js';
import { runMigrations } from './db/migrate.js';
import { CsvResultSink } from './data/csvStore.js';
import { PostgresResultSink } from './data/performanceStore.js';
import { writeToSinks, type ResultSink } from './data/resultSink.js';
import { CatalogUnavailableError, errorMessage, isAuthError } from './lib/errors.js';
import { runAnalyzeMarkets, type AnalyzeMarketsResult } from './orchestrators/analyzeMarketsOrchestrator.js';
import { createCapitalApiClient, type ClientContext } from './services/capitalApi.js';
import { MarketCatalog } from './services/marketCatalog.js';
import { PerformanceCalculator } from './services/performance.js';
import { HistoricalPriceResolver } from './services/priceResolver.js';

export interface AnalyzerJobOptions {
  openDatabase?: (connectionString: string) => DatabaseHandle;
}

export interface AnalyzerJobOutcome {
  exitCode: number;
  result: AnalyzeMarketsResult | null;
}

/**
 * Full analyzer run: authenticate, analyze every configured category,
 * write results to CSV (and Postgres when configured), then log out.
 */
export async function runAnalyzerJob(
  config: AnalyzerConfig,
  context: ClientContext,
  options: AnalyzerJobOptions = {},
): Promise<AnalyzerJobOutcome> {
  const { logger } = context;
  const client = createCapitalApiClient(config, context);
  const resolver = new HistoricalPriceResolver({ client, logger, now: context.now });
  const calculator = new PerformanceCalculator({ resolver, logger });
  const catalog = new MarketCatalog({ client, logger, nodeOverrides: config.categoryNodeOverrides });

  try {
    let result: AnalyzeMarketsResult;
    try {
      await client.session.authenticate();
      result = await runAnalyzeMarkets(
        { client, catalog, calculator, logger, now: context.now },
        { categories: config.categories, categoryLimits: config.categoryLimits },
      );
    } catch (err: unknown) {
      if (isAuthError(err)) {
        logger.error({ event: 'run_aborted', reason: 'auth', error: errorMessage(err) }, 'Authentication failed; aborting run');
      } else if (err instanceof CatalogUnavailableError) {
        logger.error({ event: 'run_aborted', reason: 'catalog', categories: err.failedCategories }, errorMessage(err));
      } else {
        throw err;
      }
      return { exitCode: 1, result: null };
    }

    const stats = client.limiter.getStats();
    logger.info({ event: 'limiter_stats', ...stats, authentications: client.session.authenticationCount }, 'Request statistics');

    let database: DatabaseHandle | null = null;
    const sinks: ResultSink[] = [new CsvResultSink({ filePath: path.resolve(config.outputFilename), logger })];
    if (config.databaseUrl) {
      try {
        database = (options.openDatabase ?? ((url: string) => createDatabase(url, logger)))(config.databaseUrl);
        await runMigrations(database.db, logger);
        sinks.push(new PostgresResultSink({ db: database.db, logger }));
      } catch (err: unknown) {
        logger.error({ event: 'db_unavailable', error: errorMessage(err) }, 'Postgres sink disabled for this run');
      }
    }

    try {
      const outcomes = await writeToSinks(
        sinks,
        result.rows,
        result.analyses,
        {
          runId: result.runId,
          startedAt: result.startedAt,
          finishedAt: result.finishedAt,
          failureCount: result.failures.length,
        },
        logger,
      );
      const allFailed = outcomes.length > 0 && outcomes.every((outcome) => !outcome.ok);
      return { exitCode: allFailed ? 1 : 0, result };
    } finally {
      if (database) await database.close();
    }
  } finally {
    await client.session.logout();
  }
}
