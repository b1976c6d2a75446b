import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { CategoriesResponse, ErrorResponse, MarketsResponse, PerformersResponse } from '../../shared/api-types.js';
import type { CsvFileStats } from '../data/csvStore.js';
import { LOOKBACK_LABELS } from '../services/performance.js';
import { performanceColumn, type MarketRow } from '../services/marketRows.js';
import { rankPerformers } from '../services/summaryService.js';

interface MarketRoutesOptions {
  app: FastifyInstance;
  loadRows: () => Promise<MarketRow[]>;
  loadStats: () => Promise<CsvFileStats | null>;
  loadDashboardHtml: () => Promise<string>;
}

const marketsQuery = z.object({
  category: z.string().trim().optional(),
  search: z.string().trim().optional(),
});

const performersQuery = z.object({
  metric: z.enum(LOOKBACK_LABELS).default('1M'),
  order: z.enum(['top', 'bottom']).default('top'),
  limit: z.coerce.number().int().min(1).max(100).default(5),
});

function filterRows(rows: MarketRow[], category?: string, search?: string): MarketRow[] {
  const wantedCategory = String(category || '').toLowerCase();
  const needle = String(search || '').toLowerCase();
  return rows.filter((row) => {
    if (wantedCategory && wantedCategory !== 'all' && row.Category.toLowerCase() !== wantedCategory) return false;
    if (needle && !row.Name.toLowerCase().includes(needle) && !row.Symbol.toLowerCase().includes(needle)) return false;
    return true;
  });
}

function registerMarketRoutes(options: MarketRoutesOptions): void {
  const { app, loadRows, loadStats, loadDashboardHtml } = options;

  if (!app) {
    throw new Error('registerMarketRoutes requires app');
  }

  app.get('/', async (_req: FastifyRequest, res: FastifyReply) => {
    const html = await loadDashboardHtml();
    return res.code(200).type('text/html; charset=utf-8').send(html);
  });

  app.get('/api/markets', async (req: FastifyRequest, res: FastifyReply) => {
    const parsed = marketsQuery.safeParse(req.query);
    if (!parsed.success) {
      const body: ErrorResponse = { error: 'Invalid query' };
      return res.code(400).send(body);
    }
    const [rows, stats] = await Promise.all([loadRows(), loadStats()]);
    const markets = filterRows(rows, parsed.data.category, parsed.data.search);
    const body: MarketsResponse = { markets, stats, count: markets.length };
    return res.code(200).send(body);
  });

  app.get('/api/categories', async (_req: FastifyRequest, res: FastifyReply) => {
    const rows = await loadRows();
    const categories = [...new Set(rows.map((row) => row.Category || 'Unknown'))].sort();
    const body: CategoriesResponse = { categories, count: categories.length };
    return res.code(200).send(body);
  });

  app.get('/api/performers', async (req: FastifyRequest, res: FastifyReply) => {
    const parsed = performersQuery.safeParse(req.query);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const body: ErrorResponse = { error: `Invalid ${issue ? issue.path.join('.') : 'query'}` };
      return res.code(400).send(body);
    }
    const { order, limit } = parsed.data;
    const metric = performanceColumn(parsed.data.metric);
    const rows = await loadRows();
    const body: PerformersResponse = { metric, order, performers: rankPerformers(rows, metric, { limit, order }) };
    return res.code(200).send(body);
  });
}

export { registerMarketRoutes, filterRows };
