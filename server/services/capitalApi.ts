/**
 * Capital.com API client: the one place where session, pacing and
 * transport meet. Every data call is: ensure session → rate-limit slot →
 * HTTP → schema validation. Session requests share the limiter's pacing.
 */

import type { z } from 'zod';
import type { Logger } from '../logger.js';
import type { AnalyzerConfig } from '../config.js';
import {
  MarketDetailsResponseSchema,
  MarketNavigationResponseSchema,
  PricesResponseSchema,
  validateApiResponse,
  type MarketDetailsResponse,
  type MarketNavigationResponse,
  type PricesResponse,
} from '../lib/apiSchemas.js';
import type { SleepFn } from '../lib/abort.js';
import { AuthError, FetchError } from '../lib/errors.js';
import { CapitalHttpTransport, type FetchLike, type QueryParams } from './capitalHttp.js';
import { RateLimiter } from './rateLimiter.js';
import { SessionManager } from './sessionManager.js';

/** Explicit context handed to every component instead of module globals. */
export interface ClientContext {
  logger: Logger;
  now?: () => number;
  sleep?: SleepFn;
  fetchImpl?: FetchLike;
}

export interface PriceHistoryQuery {
  resolution?: 'MINUTE' | 'HOUR' | 'DAY' | 'WEEK';
  from: string;
  to: string;
  max?: number;
}

export class CapitalApiClient {
  readonly session: SessionManager;
  readonly limiter: RateLimiter;
  private readonly transport: CapitalHttpTransport;
  private readonly logger: Logger;

  constructor(deps: { transport: CapitalHttpTransport; session: SessionManager; limiter: RateLimiter; logger: Logger }) {
    this.transport = deps.transport;
    this.session = deps.session;
    this.limiter = deps.limiter;
    this.logger = deps.logger;
  }

  async getMarketNavigation(nodeId: string, limit?: number): Promise<MarketNavigationResponse> {
    return this.getJson(
      `/api/v1/marketnavigation/${encodeURIComponent(nodeId)}`,
      `Market navigation ${nodeId}`,
      MarketNavigationResponseSchema,
      { limit },
    );
  }

  async getMarketDetails(epic: string): Promise<MarketDetailsResponse> {
    return this.getJson(`/api/v1/markets/${encodeURIComponent(epic)}`, `Market details ${epic}`, MarketDetailsResponseSchema);
  }

  async getPriceHistory(epic: string, query: PriceHistoryQuery): Promise<PricesResponse> {
    return this.getJson(`/api/v1/prices/${encodeURIComponent(epic)}`, `Prices ${epic}`, PricesResponseSchema, {
      resolution: query.resolution ?? 'DAY',
      from: query.from,
      to: query.to,
      max: query.max,
    });
  }

  /**
   * GET through the rate limiter with session headers. A 401 means the
   * provider dropped our tokens: re-authenticate once and retry, then give
   * up with AuthError.
   */
  private async getJson<S extends z.ZodTypeAny>(
    path: string,
    label: string,
    schema: S,
    query: QueryParams = {},
  ): Promise<z.output<S>> {
    let reauthenticated = false;
    while (true) {
      try {
        // Login happens before the data call takes its slot so both are paced.
        const headers = await this.session.authHeaders();
        const response = await this.limiter.schedule(label, () =>
          this.transport.send({ method: 'GET', path, label, query, headers }),
        );
        const data = validateApiResponse(schema, response.payload, label, (details, message) =>
          this.logger.warn(details, message),
        );
        if (data === null) {
          throw new FetchError(`${label} returned an unexpected payload`, { httpStatus: response.status });
        }
        return data;
      } catch (err: unknown) {
        if (err instanceof FetchError && err.httpStatus === 401) {
          if (reauthenticated) {
            throw new AuthError(`${label} rejected the session after re-authentication`, { httpStatus: 401, cause: err });
          }
          reauthenticated = true;
          this.logger.warn({ event: 'session_rejected', label }, 'Provider rejected session tokens; re-authenticating');
          this.session.invalidate();
          continue;
        }
        throw err;
      }
    }
  }
}

/** Wire transport, session manager and rate limiter from configuration. */
export function createCapitalApiClient(config: AnalyzerConfig, context: ClientContext): CapitalApiClient {
  const transport = new CapitalHttpTransport({
    baseUrl: config.baseUrl,
    apiKey: config.credentials.apiKey,
    timeoutMs: config.requestTimeoutMs,
    logger: context.logger,
    fetchImpl: context.fetchImpl,
  });
  const limiter: RateLimiter = new RateLimiter({
    logger: context.logger,
    minIntervalMs: config.requestDelayMs,
    keepAliveEvery: config.keepAliveEvery,
    onKeepAlive: () => session.ping(),
    maxRetries: config.rateLimitMaxRetries,
    baseBackoffMs: config.rateLimitBaseBackoffMs,
    now: context.now,
    sleep: context.sleep,
  });
  const session = new SessionManager({
    transport,
    pace: (task) => limiter.pace(task),
    credentials: config.credentials,
    logger: context.logger,
    validityMs: config.sessionValidityMs,
    now: context.now,
  });
  return new CapitalApiClient({ transport, session, limiter, logger: context.logger });
}
