import type { Logger } from '../logger.js';
import { UnknownCategoryError } from '../lib/errors.js';
import type { CapitalApiClient } from './capitalApi.js';

/**
 * Category name → Capital.com market-navigation node id. The only place the
 * provider's hierarchy ids appear; override per run with CATEGORY_NODE_IDS.
 */
export const CATEGORY_NODE_IDS: Readonly<Record<string, string>> = {
  commodities: 'hierarchy_v1.commodities',
  forex: 'hierarchy_v1.currencies',
  indices: 'hierarchy_v1.indices',
  shares: 'hierarchy_v1.shares',
  etf: 'hierarchy_v1.etfs',
  cryptocurrencies: 'hierarchy_v1.cryptocurrencies',
};

export interface Instrument {
  epic: string;
  name: string;
  category: string;
  /** Null until market details are fetched; listings carry no currency. */
  currency: string | null;
  instrumentType: string | null;
  marketStatus: string | null;
}

export interface FetchCategoryOptions {
  /** Stop after this many instruments; null/undefined for all. */
  limit?: number | null;
  /** How many levels of child nodes to walk when a node lists no markets. */
  maxDepth?: number;
}

const DEFAULT_MAX_DEPTH = 2;

export function resolveCategoryNodeId(category: string, overrides: Readonly<Record<string, string>> = {}): string {
  const key = String(category || '').trim().toLowerCase();
  const nodeId = overrides[key] || CATEGORY_NODE_IDS[key];
  if (!nodeId) throw new UnknownCategoryError(category);
  return nodeId;
}

export class MarketCatalog {
  private readonly client: CapitalApiClient;
  private readonly logger: Logger;
  private readonly nodeOverrides: Readonly<Record<string, string>>;

  constructor(deps: { client: CapitalApiClient; logger: Logger; nodeOverrides?: Record<string, string> }) {
    this.client = deps.client;
    this.logger = deps.logger;
    this.nodeOverrides = deps.nodeOverrides ?? {};
  }

  /**
   * List the tradable instruments of a category in provider order. Nodes
   * that only hold sub-nodes are walked depth-first. Epics are unique in
   * the result.
   */
  async fetchCategory(category: string, options: FetchCategoryOptions = {}): Promise<Instrument[]> {
    const rootNodeId = resolveCategoryNodeId(category, this.nodeOverrides);
    const limit = options.limit && options.limit > 0 ? Math.floor(options.limit) : null;
    const maxDepth = Math.max(0, options.maxDepth ?? DEFAULT_MAX_DEPTH);
    const instruments: Instrument[] = [];
    const seenEpics = new Set<string>();
    const isFull = () => limit !== null && instruments.length >= limit;

    const walk = async (nodeId: string, depth: number): Promise<void> => {
      const page = await this.client.getMarketNavigation(nodeId, limit ?? undefined);
      for (const market of page.markets ?? []) {
        if (isFull()) return;
        if (seenEpics.has(market.epic)) continue;
        seenEpics.add(market.epic);
        instruments.push({
          epic: market.epic,
          name: market.instrumentName || market.epic,
          category,
          currency: null,
          instrumentType: market.instrumentType ?? null,
          marketStatus: market.marketStatus ?? null,
        });
      }
      if ((page.markets ?? []).length > 0 || depth >= maxDepth) return;
      for (const child of page.nodes ?? []) {
        if (isFull()) return;
        await walk(child.id, depth + 1);
      }
    };

    await walk(rootNodeId, 0);
    this.logger.info(
      { event: 'category_fetched', category, nodeId: rootNodeId, count: instruments.length, limit },
      `Fetched ${instruments.length} ${category} markets`,
    );
    return instruments;
  }
}
