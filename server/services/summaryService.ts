import { parsePercentage, type MarketRow, type PerformanceColumn } from './marketRows.js';

export interface CategoryCount {
  category: string;
  count: number;
}

export interface RankedPerformer {
  rank: number;
  symbol: string;
  name: string;
  category: string;
  value: number;
}

export type RankOrder = 'top' | 'bottom';

export function summarizeByCategory(rows: MarketRow[]): CategoryCount[] {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const category = row.Category || 'Unknown';
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([category, count]) => ({ category, count }))
    .sort((a, b) => a.category.localeCompare(b.category));
}

/** Rows ranked by `metric`; "N/A" cells are left out. Ties keep file order. */
export function rankPerformers(
  rows: MarketRow[],
  metric: PerformanceColumn,
  options: { limit?: number; order?: RankOrder } = {},
): RankedPerformer[] {
  const limit = Math.max(1, Math.floor(options.limit ?? 10));
  const direction = options.order === 'bottom' ? 1 : -1;
  const valued: Array<{ row: MarketRow; value: number }> = [];
  for (const row of rows) {
    const value = parsePercentage(row[metric]);
    if (value !== null) valued.push({ row, value });
  }
  valued.sort((a, b) => direction * (a.value - b.value));
  return valued.slice(0, limit).map(({ row, value }, index) => ({
    rank: index + 1,
    symbol: row.Symbol,
    name: row.Name,
    category: row.Category,
    value,
  }));
}

const RULE = '='.repeat(60);
const WIDE_RULE = '='.repeat(80);

export function renderCategorySummary(rows: MarketRow[]): string {
  if (rows.length === 0) return 'No data found.';
  const lines = [RULE, 'SUMMARY', RULE, `Total Markets: ${rows.length}`, '', 'Breakdown by Category:'];
  for (const { category, count } of summarizeByCategory(rows)) {
    lines.push(`  ${category.padEnd(20)}: ${String(count).padStart(4)} markets`);
  }
  lines.push(RULE);
  return lines.join('\n');
}

export function renderPerformers(
  rows: MarketRow[],
  metric: PerformanceColumn,
  options: { limit?: number; order?: RankOrder } = {},
): string {
  const limit = Math.max(1, Math.floor(options.limit ?? 10));
  const ranked = rankPerformers(rows, metric, { ...options, limit });
  if (ranked.length === 0) return `No valid data for ${metric}`;
  const title = `${options.order === 'bottom' ? 'BOTTOM' : 'TOP'} ${limit} PERFORMERS - ${metric}`;
  const lines = [
    WIDE_RULE,
    title,
    WIDE_RULE,
    `${'Rank'.padEnd(6)} ${'Symbol'.padEnd(15)} ${'Name'.padEnd(30)} ${metric}`,
    '-'.repeat(80),
  ];
  for (const performer of ranked) {
    const symbol = performer.symbol.slice(0, 14).padEnd(15);
    const name = performer.name.slice(0, 29).padEnd(30);
    const value = `${performer.value.toFixed(2).padStart(8)}%`;
    lines.push(`${String(performer.rank).padEnd(6)} ${symbol} ${name} ${value}`);
  }
  return lines.join('\n');
}

/** Full terminal report: category summary, then top/bottom for each metric. */
export function renderResultsReport(
  rows: MarketRow[],
  metrics: readonly PerformanceColumn[] = ['Perf % 1W', 'Perf % 1M', 'Perf % 1Y'],
  limit = 5,
): string {
  const sections = [renderCategorySummary(rows)];
  if (rows.length > 0) {
    for (const metric of metrics) {
      sections.push(renderPerformers(rows, metric, { limit, order: 'top' }));
      sections.push(renderPerformers(rows, metric, { limit, order: 'bottom' }));
    }
  }
  return sections.join('\n\n');
}
