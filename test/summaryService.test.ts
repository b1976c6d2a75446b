import test from 'node:test';
import assert from 'node:assert/strict';

import { normalizeMarketRow, type MarketRow } from '../server/services/marketRows.js';
import {
  rankPerformers,
  renderCategorySummary,
  renderPerformers,
  renderResultsReport,
  summarizeByCategory,
} from '../server/services/summaryService.js';

function row(category: string, symbol: string, name: string, perf1M: string): MarketRow {
  return normalizeMarketRow({ Category: category, Symbol: symbol, Name: name, 'Perf % 1M': perf1M });
}

const rows: MarketRow[] = [
  row('Forex', 'EURUSD', 'EUR/USD', '1.50%'),
  row('Commodities', 'GOLD', 'Gold', '4.25%'),
  row('Forex', 'GBPUSD', 'GBP/USD', '-0.75%'),
  row('Commodities', 'OIL_CRUDE', 'US Crude Oil', 'N/A'),
  row('Shares', 'AAPL', 'Apple Inc', '-3.10%'),
];

test('summarizeByCategory counts rows per category in name order', () => {
  assert.deepEqual(summarizeByCategory(rows), [
    { category: 'Commodities', count: 2 },
    { category: 'Forex', count: 2 },
    { category: 'Shares', count: 1 },
  ]);
});

test('rankPerformers orders by the metric and skips N/A cells', () => {
  const top = rankPerformers(rows, 'Perf % 1M', { limit: 3 });
  assert.deepEqual(
    top.map((p) => [p.rank, p.symbol, p.value]),
    [
      [1, 'GOLD', 4.25],
      [2, 'EURUSD', 1.5],
      [3, 'GBPUSD', -0.75],
    ],
  );
  const bottom = rankPerformers(rows, 'Perf % 1M', { limit: 10, order: 'bottom' });
  assert.deepEqual(
    bottom.map((p) => p.symbol),
    ['AAPL', 'GBPUSD', 'EURUSD', 'GOLD'],
  );
});

test('renderCategorySummary prints the totals and breakdown', () => {
  const rule = '='.repeat(60);
  assert.equal(
    renderCategorySummary(rows),
    [
      rule,
      'SUMMARY',
      rule,
      'Total Markets: 5',
      '',
      'Breakdown by Category:',
      '  Commodities         :    2 markets',
      '  Forex               :    2 markets',
      '  Shares              :    1 markets',
      rule,
    ].join('\n'),
  );
  assert.equal(renderCategorySummary([]), 'No data found.');
});

test('renderPerformers formats fixed-width lines', () => {
  const lines = renderPerformers(rows, 'Perf % 1M', { limit: 2 }).split('\n');
  assert.equal(lines[1], 'TOP 2 PERFORMERS - Perf % 1M');
  assert.equal(lines[3], 'Rank   Symbol          Name                           Perf % 1M');
  assert.equal(lines[5], '1      GOLD            Gold                               4.25%');
  assert.equal(lines[6], '2      EURUSD          EUR/USD                            1.50%');
  assert.equal(lines.length, 7);
});

test('renderPerformers reports when a metric has no values', () => {
  assert.equal(renderPerformers(rows, 'Perf % 10Y'), 'No valid data for Perf % 10Y');
});

test('renderResultsReport includes top and bottom sections per metric', () => {
  const report = renderResultsReport(rows, ['Perf % 1M'], 2);
  assert.ok(report.includes('TOP 2 PERFORMERS - Perf % 1M'));
  assert.ok(report.includes('BOTTOM 2 PERFORMERS - Perf % 1M'));
  assert.equal(renderResultsReport([]), 'No data found.');
});
