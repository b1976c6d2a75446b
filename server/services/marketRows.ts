import type { LookbackLabel, PerformanceRecord } from './performance.js';

export const NOT_AVAILABLE = 'N/A';

export interface MarketAnalysis {
  category: string;
  epic: string;
  name: string;
  currentPrice: number | null;
  currency: string | null;
  /** Today's change from the market snapshot. */
  priceChangePct: number | null;
  performance: PerformanceRecord;
  marketStatus: string | null;
  instrumentType: string | null;
}

export type PerformanceColumn = `Perf % ${LookbackLabel}`;

export function performanceColumn(label: LookbackLabel): PerformanceColumn {
  return `Perf % ${label}`;
}

export const MARKET_ROW_COLUMNS = [
  'Category',
  'Symbol',
  'Name',
  'Current Price',
  'Currency',
  'Price Change %',
  'Perf % 1W',
  'Perf % 1M',
  'Perf % 3M',
  'Perf % 6M',
  'Perf % YTD',
  'Perf % 1Y',
  'Perf % 5Y',
  'Perf % 10Y',
  'Market Status',
  'Type',
] as const satisfies readonly string[];

export type MarketRowColumn = (typeof MARKET_ROW_COLUMNS)[number];

/** One CSV line: every cell is display text, absent values are "N/A". */
export type MarketRow = Record<MarketRowColumn, string>;

export function formatPercentage(value: number | null | undefined): string {
  if (typeof value !== 'number' || !Number.isFinite(value)) return NOT_AVAILABLE;
  return `${value.toFixed(2)}%`;
}

/** Inverse of formatPercentage; "N/A" and junk parse to null. */
export function parsePercentage(text: string | null | undefined): number | null {
  const raw = String(text ?? '').trim();
  if (!raw || raw === NOT_AVAILABLE) return null;
  const value = Number(raw.replace(/%$/, ''));
  return Number.isFinite(value) ? value : null;
}

export function titleCase(value: string): string {
  return value.toLowerCase().replace(/\b([a-z])/g, (letter) => letter.toUpperCase());
}

export function toMarketRow(analysis: MarketAnalysis): MarketRow {
  const perf = analysis.performance;
  return {
    Category: titleCase(analysis.category),
    Symbol: analysis.epic,
    Name: analysis.name,
    'Current Price': analysis.currentPrice === null ? NOT_AVAILABLE : String(analysis.currentPrice),
    Currency: analysis.currency || NOT_AVAILABLE,
    'Price Change %': formatPercentage(analysis.priceChangePct),
    'Perf % 1W': formatPercentage(perf['1W']),
    'Perf % 1M': formatPercentage(perf['1M']),
    'Perf % 3M': formatPercentage(perf['3M']),
    'Perf % 6M': formatPercentage(perf['6M']),
    'Perf % YTD': formatPercentage(perf.YTD),
    'Perf % 1Y': formatPercentage(perf['1Y']),
    'Perf % 5Y': formatPercentage(perf['5Y']),
    'Perf % 10Y': formatPercentage(perf['10Y']),
    'Market Status': analysis.marketStatus || NOT_AVAILABLE,
    Type: analysis.instrumentType || analysis.category.toUpperCase(),
  };
}

/** Rebuild a row from loosely-typed CSV/JSON cells; missing cells become "N/A". */
export function normalizeMarketRow(record: Readonly<Record<string, string | undefined>>): MarketRow {
  const cell = (column: MarketRowColumn): string => String(record[column] ?? '').trim() || NOT_AVAILABLE;
  return {
    Category: cell('Category'),
    Symbol: cell('Symbol'),
    Name: cell('Name'),
    'Current Price': cell('Current Price'),
    Currency: cell('Currency'),
    'Price Change %': cell('Price Change %'),
    'Perf % 1W': cell('Perf % 1W'),
    'Perf % 1M': cell('Perf % 1M'),
    'Perf % 3M': cell('Perf % 3M'),
    'Perf % 6M': cell('Perf % 6M'),
    'Perf % YTD': cell('Perf % YTD'),
    'Perf % 1Y': cell('Perf % 1Y'),
    'Perf % 5Y': cell('Perf % 5Y'),
    'Perf % 10Y': cell('Perf % 10Y'),
    'Market Status': cell('Market Status'),
    Type: cell('Type'),
  };
}
