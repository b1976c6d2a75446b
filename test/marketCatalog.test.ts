import test from 'node:test';
import assert from 'node:assert/strict';

import { createCapitalApiClient } from '../server/services/capitalApi.js';
import { CATEGORY_NODE_IDS, MarketCatalog, resolveCategoryNodeId } from '../server/services/marketCatalog.js';
import { UnknownCategoryError } from '../server/lib/errors.js';
import { createSilentLogger } from '../server/logger.js';
import { FakeCapitalApi, createFakeClock, jsonResponse, testAnalyzerConfig } from './helpers/fakeCapitalApi.js';

const logger = createSilentLogger();

function createCatalog(api: FakeCapitalApi, nodeOverrides: Record<string, string> = {}) {
  const clock = createFakeClock(0);
  const client = createCapitalApiClient(testAnalyzerConfig(), {
    logger,
    now: clock.now,
    sleep: clock.sleep,
    fetchImpl: api.fetch,
  });
  return new MarketCatalog({ client, logger, nodeOverrides });
}

function market(epic: string, name?: string) {
  return { epic, instrumentName: name, instrumentType: 'CURRENCIES', marketStatus: 'TRADEABLE' };
}

test('resolveCategoryNodeId is case-insensitive and honours overrides', () => {
  assert.equal(resolveCategoryNodeId('Forex'), CATEGORY_NODE_IDS.forex);
  assert.equal(resolveCategoryNodeId('etf', { etf: 'hierarchy_v1.custom' }), 'hierarchy_v1.custom');
  assert.throws(() => resolveCategoryNodeId('bonds'), UnknownCategoryError);
});

test('fetchCategory maps markets in provider order and respects the limit', async () => {
  const api = new FakeCapitalApi();
  api.on('GET', '/api/v1/marketnavigation/hierarchy_v1.currencies', () =>
    jsonResponse(200, { markets: [market('EURUSD', 'EUR/USD'), market('GBPUSD', 'GBP/USD'), market('USDJPY')] }),
  );
  const catalog = createCatalog(api);

  const instruments = await catalog.fetchCategory('forex', { limit: 2 });

  assert.deepEqual(instruments, [
    { epic: 'EURUSD', name: 'EUR/USD', category: 'forex', currency: null, instrumentType: 'CURRENCIES', marketStatus: 'TRADEABLE' },
    { epic: 'GBPUSD', name: 'GBP/USD', category: 'forex', currency: null, instrumentType: 'CURRENCIES', marketStatus: 'TRADEABLE' },
  ]);
  assert.equal(api.callsTo('GET', /marketnavigation/)[0]?.url.searchParams.get('limit'), '2');
});

test('fetchCategory falls back to the epic when the name is missing', async () => {
  const api = new FakeCapitalApi();
  api.on('GET', '/api/v1/marketnavigation/hierarchy_v1.currencies', () => jsonResponse(200, { markets: [market('USDJPY')] }));
  const [instrument] = await createCatalog(api).fetchCategory('forex');
  assert.equal(instrument?.name, 'USDJPY');
});

test('fetchCategory walks child nodes when a node lists no markets and drops duplicate epics', async () => {
  const api = new FakeCapitalApi();
  api.on('GET', '/api/v1/marketnavigation/hierarchy_v1.commodities', () =>
    jsonResponse(200, { nodes: [{ id: 'metals', name: 'Metals' }, { id: 'energy', name: 'Energy' }], markets: [] }),
  );
  api.on('GET', '/api/v1/marketnavigation/metals', () =>
    jsonResponse(200, { markets: [market('GOLD', 'Gold'), market('SILVER', 'Silver')] }),
  );
  api.on('GET', '/api/v1/marketnavigation/energy', () =>
    jsonResponse(200, { markets: [market('GOLD', 'Gold'), market('OIL_CRUDE', 'US Crude Oil')] }),
  );

  const instruments = await createCatalog(api).fetchCategory('commodities');

  assert.deepEqual(
    instruments.map((i) => i.epic),
    ['GOLD', 'SILVER', 'OIL_CRUDE'],
  );
  assert.equal(api.callsTo('GET', /marketnavigation/)[0]?.url.searchParams.get('limit'), null);
});

test('fetchCategory stops walking once the limit is reached', async () => {
  const api = new FakeCapitalApi();
  api.on('GET', '/api/v1/marketnavigation/hierarchy_v1.commodities', () =>
    jsonResponse(200, { nodes: [{ id: 'metals' }, { id: 'energy' }] }),
  );
  api.on('GET', '/api/v1/marketnavigation/metals', () => jsonResponse(200, { markets: [market('GOLD'), market('SILVER')] }));
  api.on('GET', '/api/v1/marketnavigation/energy', () => jsonResponse(200, { markets: [market('OIL_CRUDE')] }));

  const instruments = await createCatalog(api).fetchCategory('commodities', { limit: 2 });

  assert.deepEqual(
    instruments.map((i) => i.epic),
    ['GOLD', 'SILVER'],
  );
  assert.equal(api.callsTo('GET', '/api/v1/marketnavigation/energy').length, 0);
});

test('fetchCategory rejects unknown categories before any request', async () => {
  const api = new FakeCapitalApi();
  await assert.rejects(createCatalog(api).fetchCategory('bonds'), UnknownCategoryError);
  assert.equal(api.calls.length, 0);
});
