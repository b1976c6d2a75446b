import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../logger.js';
import {
  CatalogUnavailableError,
  UnknownCategoryError,
  errorMessage,
  isFetchLikeError,
} from '../lib/errors.js';
import type { CapitalApiClient } from '../services/capitalApi.js';
import type { Instrument, MarketCatalog } from '../services/marketCatalog.js';
import { toMarketRow, type MarketAnalysis, type MarketRow } from '../services/marketRows.js';
import type { PerformanceCalculator } from '../services/performance.js';

export interface AnalyzeMarketsDeps {
  client: CapitalApiClient;
  catalog: MarketCatalog;
  calculator: PerformanceCalculator;
  logger: Logger;
  now?: () => number;
}

export interface AnalyzeMarketsOptions {
  categories: string[];
  /** Cap per category; missing or null lists every market. */
  categoryLimits?: Readonly<Record<string, number | null>>;
}

export interface RunFailure {
  scope: 'category' | 'instrument';
  category: string;
  epic: string | null;
  error: string;
}

export interface AnalyzeMarketsResult {
  runId: string;
  analyses: MarketAnalysis[];
  rows: MarketRow[];
  failures: RunFailure[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

function finiteOrNull(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

async function analyzeInstrument(
  deps: AnalyzeMarketsDeps,
  instrument: Instrument,
  runDate: Date,
): Promise<MarketAnalysis> {
  const details = await deps.client.getMarketDetails(instrument.epic);
  const currentPrice = finiteOrNull(details.snapshot.bid);
  const performance = await deps.calculator.calculate(instrument.epic, currentPrice, runDate);
  return {
    category: instrument.category,
    epic: instrument.epic,
    name: instrument.name,
    currentPrice,
    currency: details.instrument.currency || instrument.currency,
    priceChangePct: finiteOrNull(details.snapshot.percentageChange),
    performance,
    marketStatus: details.snapshot.marketStatus || instrument.marketStatus,
    instrumentType: details.instrument.type || instrument.instrumentType,
  };
}

/**
 * One sequential analyzer run: categories → instruments → lookback windows.
 * Category and instrument failures are recorded and skipped; auth failures
 * abort the run, and so does every category failing.
 */
export async function runAnalyzeMarkets(
  deps: AnalyzeMarketsDeps,
  options: AnalyzeMarketsOptions,
): Promise<AnalyzeMarketsResult> {
  const now = deps.now ?? Date.now;
  const { logger } = deps;
  const runId = uuidv4();
  const startedMs = now();
  const runDate = new Date(startedMs);
  const analyses: MarketAnalysis[] = [];
  const failures: RunFailure[] = [];
  const failedCategories: string[] = [];

  logger.info({ event: 'run_started', runId, categories: options.categories }, 'Market analysis started');

  for (const category of options.categories) {
    const limit = options.categoryLimits?.[category.toLowerCase()] ?? null;
    let instruments: Instrument[];
    try {
      instruments = await deps.catalog.fetchCategory(category, { limit });
    } catch (err: unknown) {
      if (!(err instanceof UnknownCategoryError) && !isFetchLikeError(err)) throw err;
      logger.error({ event: 'category_failed', runId, category, error: errorMessage(err) }, `Category ${category} failed`);
      failures.push({ scope: 'category', category, epic: null, error: errorMessage(err) });
      failedCategories.push(category);
      continue;
    }

    for (const [index, instrument] of instruments.entries()) {
      logger.info(
        { event: 'instrument_started', runId, category, epic: instrument.epic, position: index + 1, total: instruments.length },
        `[${index + 1}/${instruments.length}] ${instrument.name} (${instrument.epic})`,
      );
      try {
        analyses.push(await analyzeInstrument(deps, instrument, runDate));
      } catch (err: unknown) {
        if (!isFetchLikeError(err)) throw err;
        logger.warn(
          { event: 'instrument_failed', runId, category, epic: instrument.epic, error: errorMessage(err) },
          `Could not fetch details for ${instrument.epic}`,
        );
        failures.push({ scope: 'instrument', category, epic: instrument.epic, error: errorMessage(err) });
      }
    }
  }

  if (options.categories.length > 0 && failedCategories.length === options.categories.length) {
    throw new CatalogUnavailableError(failedCategories);
  }

  const finishedMs = now();
  logger.info(
    {
      event: 'run_finished',
      runId,
      markets: analyses.length,
      failures: failures.length,
      durationMs: finishedMs - startedMs,
    },
    `Processed ${analyses.length} markets across ${options.categories.length} categories`,
  );

  return {
    runId,
    analyses,
    rows: analyses.map(toMarketRow),
    failures,
    startedAt: new Date(startedMs).toISOString(),
    finishedAt: new Date(finishedMs).toISOString(),
    durationMs: finishedMs - startedMs,
  };
}
