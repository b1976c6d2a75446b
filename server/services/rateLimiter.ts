/**
 * Fixed-delay request gate for the provider.
 *
 * Every outbound data call goes through `schedule`. The gate enforces a
 * minimum interval between call starts, fires a keep-alive after every
 * `keepAliveEvery` calls, and retries rate-limited calls: once after the
 * provider's Retry-After hint, or with exponential backoff when there is
 * no hint. Session requests (login, ping, logout) go through `pace`: they
 * share the interval but do not count toward the keep-alive cadence.
 */

import type { Logger } from '../logger.js';
import { sleepWithAbort, type SleepFn } from '../lib/abort.js';
import { ProviderRateLimitError, RateLimitExceededError, errorMessage } from '../lib/errors.js';

export interface RateLimiterOptions {
  logger: Logger;
  /** Minimum time between the starts of two consecutive calls. */
  minIntervalMs?: number;
  /** Fire `onKeepAlive` after every Nth call. */
  keepAliveEvery?: number;
  onKeepAlive?: () => Promise<unknown>;
  /** Backoff retries when the provider gives no Retry-After hint. */
  maxRetries?: number;
  baseBackoffMs?: number;
  maxBackoffMs?: number;
  now?: () => number;
  sleep?: SleepFn;
}

export interface RateLimiterStats {
  calls: number;
  keepAlives: number;
  throttledWaits: number;
  rateLimitRetries: number;
}

export const DEFAULT_MIN_INTERVAL_MS = 150;
export const DEFAULT_KEEP_ALIVE_EVERY = 20;

export class RateLimiter {
  private lastCallStartedMs: number | null = null;
  private readonly stats: RateLimiterStats = { calls: 0, keepAlives: 0, throttledWaits: 0, rateLimitRetries: 0 };
  private readonly logger: Logger;
  private readonly minIntervalMs: number;
  private readonly keepAliveEvery: number;
  private readonly onKeepAlive: (() => Promise<unknown>) | null;
  private readonly maxRetries: number;
  private readonly baseBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly now: () => number;
  private readonly sleep: SleepFn;

  constructor(options: RateLimiterOptions) {
    this.logger = options.logger;
    this.minIntervalMs = Math.max(0, options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS);
    this.keepAliveEvery = Math.max(1, Math.floor(options.keepAliveEvery ?? DEFAULT_KEEP_ALIVE_EVERY));
    this.onKeepAlive = options.onKeepAlive ?? null;
    this.maxRetries = Math.max(0, Math.floor(options.maxRetries ?? 3));
    this.baseBackoffMs = Math.max(0, options.baseBackoffMs ?? 1_000);
    this.maxBackoffMs = Math.max(this.baseBackoffMs, options.maxBackoffMs ?? 30_000);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleepWithAbort;
  }

  getStats(): RateLimiterStats {
    return { ...this.stats };
  }

  /** Backoff before retry `attempt` (1-based) when no hint was given. */
  getBackoffMs(attempt: number): number {
    const n = Math.max(1, Math.floor(attempt));
    return Math.min(this.maxBackoffMs, this.baseBackoffMs * 2 ** (n - 1));
  }

  async schedule<T>(label: string, task: () => Promise<T>, signal?: AbortSignal | null): Promise<T> {
    let retries = 0;
    let hintUsed = false;
    while (true) {
      try {
        return await this.runPaced(task, signal);
      } catch (err: unknown) {
        if (!(err instanceof ProviderRateLimitError)) throw err;

        let waitMs: number;
        if (err.retryAfterMs !== null) {
          // A hinted delay buys exactly one retry.
          if (hintUsed) throw new RateLimitExceededError(label, retries + 1, err);
          hintUsed = true;
          waitMs = err.retryAfterMs;
        } else {
          if (retries >= this.maxRetries) throw new RateLimitExceededError(label, retries + 1, err);
          waitMs = this.getBackoffMs(retries + 1);
        }
        retries += 1;
        this.stats.rateLimitRetries += 1;
        this.logger.warn(
          { event: 'rate_limited', label, attempt: retries, waitMs, hinted: err.retryAfterMs !== null },
          `${label} rate-limited, retrying in ${waitMs}ms`,
        );
        await this.sleep(waitMs, signal);
      }
    }
  }

  /** Wait for the next slot, then run `task` without counting it as a call. */
  async pace<T>(task: () => Promise<T>, signal?: AbortSignal | null): Promise<T> {
    await this.waitForSlot(signal);
    return task();
  }

  private async waitForSlot(signal?: AbortSignal | null): Promise<void> {
    if (this.lastCallStartedMs !== null) {
      const waitMs = this.lastCallStartedMs + this.minIntervalMs - this.now();
      if (waitMs > 0) {
        this.stats.throttledWaits += 1;
        await this.sleep(waitMs, signal);
      }
    }
    this.lastCallStartedMs = this.now();
  }

  private async runPaced<T>(task: () => Promise<T>, signal?: AbortSignal | null): Promise<T> {
    await this.waitForSlot(signal);
    this.stats.calls += 1;
    try {
      return await task();
    } finally {
      if (this.stats.calls % this.keepAliveEvery === 0) {
        await this.keepAlive();
      }
    }
  }

  private async keepAlive(): Promise<void> {
    if (!this.onKeepAlive) return;
    this.stats.keepAlives += 1;
    try {
      await this.onKeepAlive();
    } catch (err: unknown) {
      this.logger.warn({ event: 'keep_alive_failed', error: errorMessage(err) }, 'Keep-alive failed');
    }
  }
}
