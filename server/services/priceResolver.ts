import type { Logger } from '../logger.js';
import type { PriceBar } from '../lib/apiSchemas.js';
import { addUtcDays, formatProviderDateTime, minDate } from '../lib/dateUtils.js';
import { FetchError } from '../lib/errors.js';
import type { CapitalApiClient } from './capitalApi.js';

/** Days added after the target date so weekends and holidays still hit a bar. */
export const PRICE_WINDOW_PAD_DAYS = 4;
const PRICE_WINDOW_MAX_BARS = 10;

export interface PricePoint {
  snapshotTime: string | null;
  closePrice: number;
}

function positiveOrNull(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : null;
}

/** Close price of a bar: bid, else ask. */
export function closePriceOf(bar: PriceBar): number | null {
  const close = bar.closePrice;
  if (!close) return null;
  return positiveOrNull(close.bid) ?? positiveOrNull(close.ask);
}

/** The provider answers "no bars in this window" with 404 / error.prices.not-found. */
export function isNoPriceDataError(err: unknown): boolean {
  if (!(err instanceof FetchError)) return false;
  if (err.errorCode && /prices\.not-found|not-found/i.test(err.errorCode)) return true;
  return err.httpStatus === 404;
}

export class HistoricalPriceResolver {
  private readonly client: CapitalApiClient;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: { client: CapitalApiClient; logger: Logger; now?: () => number }) {
    this.client = deps.client;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
  }

  /** First daily bar at or after `targetDate`, within the padded window. */
  async resolvePricePoint(epic: string, targetDate: Date): Promise<PricePoint | null> {
    const to = minDate(addUtcDays(targetDate, PRICE_WINDOW_PAD_DAYS), new Date(this.now()));
    let bars: PriceBar[];
    try {
      const response = await this.client.getPriceHistory(epic, {
        resolution: 'DAY',
        from: formatProviderDateTime(targetDate),
        to: formatProviderDateTime(to),
        max: PRICE_WINDOW_MAX_BARS,
      });
      bars = response.prices;
    } catch (err: unknown) {
      if (isNoPriceDataError(err)) {
        this.logger.debug({ event: 'price_not_found', epic, target: formatProviderDateTime(targetDate) }, 'No price data');
        return null;
      }
      throw err;
    }

    for (const bar of bars) {
      const closePrice = closePriceOf(bar);
      if (closePrice !== null) {
        return { snapshotTime: bar.snapshotTimeUTC ?? bar.snapshotTime ?? null, closePrice };
      }
    }
    return null;
  }

  /** Close price nearest `targetDate`, or null when the provider has no data for it. */
  async resolvePrice(epic: string, targetDate: Date): Promise<number | null> {
    const point = await this.resolvePricePoint(epic, targetDate);
    return point ? point.closePrice : null;
  }
}
