import type { ColumnType, Generated, Insertable } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

/** pg returns NUMERIC as text; inserts take numbers. */
export type Numeric = ColumnType<string | null, number | null, number | null>;

export interface AnalysisRuns {
  run_id: string;
  started_at: Timestamp;
  finished_at: Timestamp;
  market_count: number;
  failure_count: number;
  created_at: Generated<Timestamp>;
}

export interface MarketPerformance {
  id: Generated<number>;
  run_id: string;
  category: string;
  epic: string;
  name: string;
  currency: string | null;
  current_price: Numeric;
  price_change_pct: Numeric;
  perf_1w: Numeric;
  perf_1m: Numeric;
  perf_3m: Numeric;
  perf_6m: Numeric;
  perf_ytd: Numeric;
  perf_1y: Numeric;
  perf_5y: Numeric;
  perf_10y: Numeric;
  market_status: string | null;
  instrument_type: string | null;
  created_at: Generated<Timestamp>;
}

export interface Database {
  analysis_runs: AnalysisRuns;
  market_performance: MarketPerformance;
}

export type NewMarketPerformance = Insertable<MarketPerformance>;
