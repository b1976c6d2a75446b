import test from 'node:test';
import assert from 'node:assert/strict';

import { CapitalHttpTransport } from '../server/services/capitalHttp.js';
import { SESSION_VALIDITY_MS, SessionManager } from '../server/services/sessionManager.js';
import { AuthError } from '../server/lib/errors.js';
import { createSilentLogger } from '../server/logger.js';
import { FakeCapitalApi, createFakeClock, jsonResponse } from './helpers/fakeCapitalApi.js';

const logger = createSilentLogger();
const credentials = { apiKey: 'test-key', identifier: 'tester@example.com', password: 'test-secret' };

function createSession(api: FakeCapitalApi, now: () => number) {
  const transport = new CapitalHttpTransport({
    baseUrl: 'https://demo-api-capital.backend-capital.com',
    apiKey: credentials.apiKey,
    timeoutMs: 1_000,
    logger,
    fetchImpl: api.fetch,
  });
  return new SessionManager({ transport, credentials, logger, now });
}

test('authenticate posts credentials and stores the session tokens', async () => {
  const api = new FakeCapitalApi();
  const clock = createFakeClock(1_000);
  const manager = createSession(api, clock.now);

  const session = await manager.authenticate();

  assert.deepEqual(session, { cst: 'cst-1', securityToken: 'xst-1', createdAtMs: 1_000 });
  const [call] = api.callsTo('POST', '/api/v1/session');
  assert.deepEqual(call?.body, { identifier: 'tester@example.com', password: 'test-secret', encryptedPassword: false });
  assert.equal(call?.headers['x-cap-api-key'], 'test-key');
  assert.deepEqual(await manager.authHeaders(), { CST: 'cst-1', 'X-SECURITY-TOKEN': 'xst-1' });
});

test('the session is renewed exactly once after the validity window', async () => {
  const api = new FakeCapitalApi();
  const clock = createFakeClock(0);
  const manager = createSession(api, clock.now);

  await manager.ensureSession();
  assert.equal(manager.authenticationCount, 1);

  clock.nowMs = SESSION_VALIDITY_MS - 1;
  await manager.ensureSession();
  assert.equal(manager.authenticationCount, 1);

  clock.nowMs = SESSION_VALIDITY_MS;
  const renewed = await manager.ensureSession();
  assert.equal(manager.authenticationCount, 2);
  assert.equal(renewed.cst, 'cst-2');

  clock.nowMs = SESSION_VALIDITY_MS + 60_000;
  await manager.ensureSession();
  assert.equal(manager.authenticationCount, 2);
  assert.equal(api.callsTo('POST', '/api/v1/session').length, 2);
});

test('isExpired is true before the first authentication', () => {
  const manager = createSession(new FakeCapitalApi(), () => 0);
  assert.equal(manager.isExpired(), true);
  assert.equal(manager.current, null);
});

test('rejected credentials raise AuthError with the provider status', async () => {
  const api = new FakeCapitalApi();
  api.on('POST', '/api/v1/session', () => jsonResponse(401, { errorCode: 'error.invalid.details' }));
  const manager = createSession(api, () => 0);
  await assert.rejects(manager.authenticate(), (err: unknown) => {
    assert.ok(err instanceof AuthError);
    assert.equal(err.httpStatus, 401);
    assert.match(err.message, /error\.invalid\.details/);
    return true;
  });
  assert.equal(manager.current, null);
});

test('a session response without tokens raises AuthError', async () => {
  const api = new FakeCapitalApi();
  api.on('POST', '/api/v1/session', () => jsonResponse(200, {}));
  const manager = createSession(api, () => 0);
  await assert.rejects(manager.authenticate(), /session tokens missing/);
});

test('ping reports failure without throwing', async () => {
  const api = new FakeCapitalApi();
  const manager = createSession(api, () => 0);
  assert.equal(await manager.ping(), false);

  await manager.authenticate();
  assert.equal(await manager.ping(), true);
  assert.equal(api.callsTo('GET', '/api/v1/ping')[0]?.headers.cst, 'cst-1');

  api.on('GET', '/api/v1/ping', () => jsonResponse(500, { errorCode: 'error.server' }));
  assert.equal(await manager.ping(), false);
});

test('logout closes the session and tolerates provider errors', async () => {
  const api = new FakeCapitalApi();
  api.on('DELETE', '/api/v1/session', () => jsonResponse(500, {}));
  const manager = createSession(api, () => 0);
  await manager.authenticate();
  await manager.logout();
  assert.equal(manager.current, null);
  assert.equal(api.callsTo('DELETE', '/api/v1/session').length, 1);

  await manager.logout();
  assert.equal(api.callsTo('DELETE', '/api/v1/session').length, 1);
});
