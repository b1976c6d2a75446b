// Viewer HTTP contract: route handlers build these, the dashboard reads them.

import type { CsvFileStats } from '../server/data/csvStore.js';
import type { MarketRow } from '../server/services/marketRows.js';
import type { RankedPerformer, RankOrder } from '../server/services/summaryService.js';

export interface MarketsResponse {
  markets: MarketRow[];
  stats: CsvFileStats | null;
  count: number;
}

export interface CategoriesResponse {
  categories: string[];
  count: number;
}

export interface PerformersResponse {
  metric: string;
  order: RankOrder;
  performers: RankedPerformer[];
}

export interface HealthResponse {
  status: 'ok';
  uptimeSeconds: number;
  timestamp: string;
}

export interface ErrorResponse {
  error: string;
}
