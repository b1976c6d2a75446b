import test from 'node:test';
import assert from 'node:assert/strict';

import {
  CapitalHttpTransport,
  buildCapitalUrl,
  extractErrorCode,
  parseJsonSafe,
  parseRetryAfterMs,
  redactHeaders,
  type FetchLike,
} from '../server/services/capitalHttp.js';
import { FetchError, ProviderRateLimitError } from '../server/lib/errors.js';
import { createSilentLogger } from '../server/logger.js';
import { FakeCapitalApi, jsonResponse } from './helpers/fakeCapitalApi.js';

const BASE_URL = 'https://demo-api-capital.backend-capital.com';

function createTransport(fetchImpl: FetchLike, timeoutMs = 1_000) {
  return new CapitalHttpTransport({
    baseUrl: BASE_URL,
    apiKey: 'test-key',
    timeoutMs,
    logger: createSilentLogger(),
    fetchImpl,
  });
}

test('buildCapitalUrl joins base and path and skips empty params', () => {
  assert.equal(
    buildCapitalUrl(`${BASE_URL}/`, '/api/v1/prices/GOLD', {
      resolution: 'DAY',
      from: '2024-01-01T00:00:00',
      max: 10,
      to: undefined,
      empty: '',
    }),
    `${BASE_URL}/api/v1/prices/GOLD?resolution=DAY&from=2024-01-01T00%3A00%3A00&max=10`,
  );
});

test('redactHeaders masks the API key and session tokens', () => {
  assert.deepEqual(
    redactHeaders({ Accept: 'application/json', 'X-CAP-API-KEY': 'test-key', CST: 'a', 'X-SECURITY-TOKEN': 'b' }),
    { Accept: 'application/json', 'X-CAP-API-KEY': '***', CST: '***', 'X-SECURITY-TOKEN': '***' },
  );
});

test('parseJsonSafe returns null for blank or malformed text', () => {
  assert.equal(parseJsonSafe(''), null);
  assert.equal(parseJsonSafe('{oops'), null);
  assert.deepEqual(parseJsonSafe('{"a":1}'), { a: 1 });
});

test('extractErrorCode reads the provider error code', () => {
  assert.equal(extractErrorCode({ errorCode: 'error.prices.not-found' }), 'error.prices.not-found');
  assert.equal(extractErrorCode({ message: 'nope' }), null);
  assert.equal(extractErrorCode(null), null);
});

test('parseRetryAfterMs handles seconds and HTTP dates', () => {
  assert.equal(parseRetryAfterMs('2'), 2_000);
  assert.equal(parseRetryAfterMs('0.5'), 500);
  assert.equal(parseRetryAfterMs('Wed, 21 Oct 2015 07:28:03 GMT', Date.parse('Wed, 21 Oct 2015 07:28:00 GMT')), 3_000);
  assert.equal(parseRetryAfterMs(null), null);
  assert.equal(parseRetryAfterMs('soon'), null);
});

test('send adds the API key, encodes the body and returns the payload', async () => {
  const api = new FakeCapitalApi({ withSession: false });
  api.on('POST', '/api/v1/echo', (call) => jsonResponse(200, { received: call.body }));
  const response = await createTransport(api.fetch).send({
    method: 'POST',
    path: '/api/v1/echo',
    label: 'Echo',
    body: { hello: 'world' },
  });
  assert.equal(response.status, 200);
  assert.deepEqual(response.payload, { received: { hello: 'world' } });
  const [call] = api.calls;
  assert.equal(call?.headers['x-cap-api-key'], 'test-key');
  assert.equal(call?.headers['content-type'], 'application/json');
  assert.equal(call?.headers.accept, 'application/json');
});

test('send maps 429 to ProviderRateLimitError with the Retry-After hint', async () => {
  const api = new FakeCapitalApi({ withSession: false });
  api.on('GET', '/api/v1/markets/GOLD', () => jsonResponse(429, {}, { 'Retry-After': '3' }));
  await assert.rejects(
    createTransport(api.fetch).send({ method: 'GET', path: '/api/v1/markets/GOLD', label: 'Details' }),
    (err: unknown) => {
      assert.ok(err instanceof ProviderRateLimitError);
      assert.equal(err.retryAfterMs, 3_000);
      return true;
    },
  );
});

test('send treats a too-many-requests error code as a rate limit', async () => {
  const api = new FakeCapitalApi({ withSession: false });
  api.on('GET', '/api/v1/markets/GOLD', () => jsonResponse(400, { errorCode: 'error.too-many.requests' }));
  await assert.rejects(
    createTransport(api.fetch).send({ method: 'GET', path: '/api/v1/markets/GOLD', label: 'Details' }),
    (err: unknown) => {
      assert.ok(err instanceof ProviderRateLimitError);
      assert.equal(err.retryAfterMs, null);
      return true;
    },
  );
});

test('send maps other non-2xx responses to FetchError with status and code', async () => {
  const api = new FakeCapitalApi({ withSession: false });
  api.on('GET', '/api/v1/prices/GOLD', () => jsonResponse(404, { errorCode: 'error.prices.not-found' }));
  await assert.rejects(
    createTransport(api.fetch).send({ method: 'GET', path: '/api/v1/prices/GOLD', label: 'Prices GOLD' }),
    (err: unknown) => {
      assert.ok(err instanceof FetchError);
      assert.equal(err.httpStatus, 404);
      assert.equal(err.errorCode, 'error.prices.not-found');
      assert.equal(err.message, 'Prices GOLD request failed (404): error.prices.not-found');
      return true;
    },
  );
});

test('send wraps network failures in FetchError', async () => {
  const failing: FetchLike = async () => {
    throw new TypeError('fetch failed');
  };
  await assert.rejects(
    createTransport(failing).send({ method: 'GET', path: '/api/v1/ping', label: 'Ping' }),
    (err: unknown) => {
      assert.ok(err instanceof FetchError);
      assert.equal(err.message, 'Ping request failed: fetch failed');
      assert.equal(err.httpStatus, null);
      return true;
    },
  );
});

test('send times out with a FetchError flagged as timeout', async () => {
  const hanging: FetchLike = (_input, init) =>
    new Promise<Response>((_resolve, reject) => {
      init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
  await assert.rejects(
    createTransport(hanging, 10).send({ method: 'GET', path: '/api/v1/ping', label: 'Ping' }),
    (err: unknown) => {
      assert.ok(err instanceof FetchError);
      assert.equal(err.isTimeout, true);
      assert.equal(err.httpStatus, 504);
      return true;
    },
  );
});
