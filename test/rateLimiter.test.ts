import test from 'node:test';
import assert from 'node:assert/strict';

import { RateLimiter } from '../server/services/rateLimiter.js';
import { ProviderRateLimitError, RateLimitExceededError } from '../server/lib/errors.js';
import { createSilentLogger } from '../server/logger.js';
import { createFakeClock } from './helpers/fakeCapitalApi.js';

const logger = createSilentLogger();

test('twenty back-to-back calls are paced and trigger exactly one keep-alive', async () => {
  const clock = createFakeClock(1_700_000_000_000);
  let keepAlives = 0;
  const limiter = new RateLimiter({
    logger,
    minIntervalMs: 150,
    keepAliveEvery: 20,
    onKeepAlive: async () => {
      keepAlives += 1;
    },
    now: clock.now,
    sleep: clock.sleep,
  });

  const callStarts: number[] = [];
  for (let i = 0; i < 20; i++) {
    await limiter.schedule(`call ${i}`, async () => {
      callStarts.push(clock.now());
    });
  }

  assert.equal(keepAlives, 1);
  assert.deepEqual(limiter.getStats(), { calls: 20, keepAlives: 1, throttledWaits: 19, rateLimitRetries: 0 });
  assert.equal(clock.sleeps.length, 19);
  for (let i = 1; i < callStarts.length; i++) {
    assert.ok((callStarts[i] ?? 0) - (callStarts[i - 1] ?? 0) >= 150);
  }
});

test('no pacing delay when the previous call started long enough ago', async () => {
  const clock = createFakeClock(0);
  const limiter = new RateLimiter({ logger, minIntervalMs: 150, now: clock.now, sleep: clock.sleep });
  await limiter.schedule('first', async () => 1);
  clock.nowMs += 500;
  await limiter.schedule('second', async () => 2);
  assert.deepEqual(clock.sleeps, []);
});

test('pacing waits only for the remainder of the interval', async () => {
  const clock = createFakeClock(0);
  const limiter = new RateLimiter({ logger, minIntervalMs: 150, now: clock.now, sleep: clock.sleep });
  await limiter.schedule('first', async () => 1);
  clock.nowMs += 100;
  await limiter.schedule('second', async () => 2);
  assert.deepEqual(clock.sleeps, [50]);
});

test('paced session requests share the interval without counting as calls', async () => {
  const clock = createFakeClock(0);
  let keepAlives = 0;
  const limiter = new RateLimiter({
    logger,
    minIntervalMs: 150,
    keepAliveEvery: 2,
    onKeepAlive: async () => {
      keepAlives += 1;
    },
    now: clock.now,
    sleep: clock.sleep,
  });

  assert.equal(await limiter.pace(async () => 'login'), 'login');
  await limiter.schedule('first', async () => 1);
  await limiter.pace(async () => 'ping');
  await limiter.schedule('second', async () => 2);

  assert.deepEqual(clock.sleeps, [150, 150, 150]);
  assert.equal(keepAlives, 1);
  assert.deepEqual(limiter.getStats(), { calls: 2, keepAlives: 1, throttledWaits: 3, rateLimitRetries: 0 });
});

test('a Retry-After hint is honoured once, then the call succeeds', async () => {
  const clock = createFakeClock(0);
  const limiter = new RateLimiter({ logger, now: clock.now, sleep: clock.sleep });
  let attempts = 0;
  const value = await limiter.schedule('prices', async () => {
    attempts += 1;
    if (attempts === 1) throw new ProviderRateLimitError('429', 2_000);
    return 'ok';
  });
  assert.equal(value, 'ok');
  assert.equal(attempts, 2);
  assert.deepEqual(clock.sleeps, [2_000]);
  assert.equal(limiter.getStats().rateLimitRetries, 1);
});

test('a second hinted 429 gives up with RateLimitExceededError', async () => {
  const clock = createFakeClock(0);
  const limiter = new RateLimiter({ logger, now: clock.now, sleep: clock.sleep });
  let attempts = 0;
  await assert.rejects(
    limiter.schedule('prices', async () => {
      attempts += 1;
      throw new ProviderRateLimitError('429', 1_000);
    }),
    (err: unknown) => {
      assert.ok(err instanceof RateLimitExceededError);
      assert.equal(err.attempts, 2);
      return true;
    },
  );
  assert.equal(attempts, 2);
});

test('unhinted 429s back off exponentially until retries run out', async () => {
  const clock = createFakeClock(0);
  const limiter = new RateLimiter({
    logger,
    maxRetries: 3,
    baseBackoffMs: 1_000,
    now: clock.now,
    sleep: clock.sleep,
  });
  let attempts = 0;
  await assert.rejects(
    limiter.schedule('details', async () => {
      attempts += 1;
      throw new ProviderRateLimitError('429');
    }),
    (err: unknown) => {
      assert.ok(err instanceof RateLimitExceededError);
      assert.equal(err.attempts, 4);
      assert.match(err.message, /details still rate-limited after 4 attempt/);
      return true;
    },
  );
  assert.equal(attempts, 4);
  assert.deepEqual(clock.sleeps, [1_000, 2_000, 4_000]);
});

test('getBackoffMs caps at maxBackoffMs', () => {
  const limiter = new RateLimiter({ logger, baseBackoffMs: 1_000, maxBackoffMs: 5_000 });
  assert.equal(limiter.getBackoffMs(1), 1_000);
  assert.equal(limiter.getBackoffMs(3), 4_000);
  assert.equal(limiter.getBackoffMs(4), 5_000);
});

test('non rate-limit errors propagate without retry', async () => {
  const clock = createFakeClock(0);
  const limiter = new RateLimiter({ logger, now: clock.now, sleep: clock.sleep });
  let attempts = 0;
  await assert.rejects(
    limiter.schedule('x', async () => {
      attempts += 1;
      throw new Error('boom');
    }),
    /boom/,
  );
  assert.equal(attempts, 1);
});

test('a failing keep-alive does not fail the call', async () => {
  const clock = createFakeClock(0);
  const limiter = new RateLimiter({
    logger,
    keepAliveEvery: 1,
    onKeepAlive: async () => {
      throw new Error('ping failed');
    },
    now: clock.now,
    sleep: clock.sleep,
  });
  assert.equal(await limiter.schedule('x', async () => 7), 7);
  assert.equal(limiter.getStats().keepAlives, 1);
});
