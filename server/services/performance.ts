import type { Logger } from '../logger.js';
import { DAY_MS, utcDayOfYear } from '../lib/dateUtils.js';
import { errorMessage, isFetchLikeError } from '../lib/errors.js';
import type { HistoricalPriceResolver } from './priceResolver.js';

export const LOOKBACK_LABELS = ['1W', '1M', '3M', '6M', 'YTD', '1Y', '5Y', '10Y'] as const;

export type LookbackLabel = (typeof LOOKBACK_LABELS)[number];

/** Percentage change per window; null means unavailable, never zero. */
export type PerformanceRecord = Readonly<Record<LookbackLabel, number | null>>;

/** Fixed day offsets; YTD is computed per run by `lookbackOffsetDays`. */
export const FIXED_LOOKBACK_DAYS: Readonly<Record<Exclude<LookbackLabel, 'YTD'>, number>> = {
  '1W': 7,
  '1M': 30,
  '3M': 90,
  '6M': 180,
  '1Y': 365,
  '5Y': 1825,
  '10Y': 3650,
};

/** Days from January 1st of the current UTC year to `now`, counting both ends. */
export function ytdOffsetDays(now: Date): number {
  return utcDayOfYear(now);
}

export function lookbackOffsetDays(label: LookbackLabel, now: Date): number {
  return label === 'YTD' ? ytdOffsetDays(now) : FIXED_LOOKBACK_DAYS[label];
}

export function lookbackTargetDate(label: LookbackLabel, now: Date): Date {
  return new Date(now.getTime() - lookbackOffsetDays(label, now) * DAY_MS);
}

/**
 * ((current - historical) / historical) * 100, or null when either price is
 * missing or the historical price is not a positive number.
 */
export function computePerformance(
  currentPrice: number | null | undefined,
  historicalPrice: number | null | undefined,
): number | null {
  if (typeof historicalPrice !== 'number' || !Number.isFinite(historicalPrice) || historicalPrice <= 0) return null;
  if (typeof currentPrice !== 'number' || !Number.isFinite(currentPrice)) return null;
  return ((currentPrice - historicalPrice) / historicalPrice) * 100;
}

export function emptyPerformanceRecord(): PerformanceRecord {
  return { '1W': null, '1M': null, '3M': null, '6M': null, YTD: null, '1Y': null, '5Y': null, '10Y': null };
}

export class PerformanceCalculator {
  private readonly resolver: HistoricalPriceResolver;
  private readonly logger: Logger;

  constructor(deps: { resolver: HistoricalPriceResolver; logger: Logger }) {
    this.resolver = deps.resolver;
    this.logger = deps.logger;
  }

  /**
   * Resolve one historical price per window and compute the change against
   * `currentPrice`. A window whose fetch fails is logged and left null;
   * auth failures propagate.
   */
  async calculate(epic: string, currentPrice: number | null, now: Date): Promise<PerformanceRecord> {
    const record: Record<LookbackLabel, number | null> = { ...emptyPerformanceRecord() };
    if (currentPrice === null || !Number.isFinite(currentPrice)) {
      this.logger.warn({ event: 'performance_skipped', epic }, `No current price for ${epic}; performance unavailable`);
      return record;
    }

    for (const label of LOOKBACK_LABELS) {
      const targetDate = lookbackTargetDate(label, now);
      try {
        const historicalPrice = await this.resolver.resolvePrice(epic, targetDate);
        record[label] = computePerformance(currentPrice, historicalPrice);
      } catch (err: unknown) {
        if (!isFetchLikeError(err)) throw err;
        this.logger.warn(
          { event: 'performance_window_failed', epic, window: label, error: errorMessage(err) },
          `Could not resolve ${label} price for ${epic}`,
        );
      }
    }
    return record;
  }
}
