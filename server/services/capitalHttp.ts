/**
 * Capital.com HTTP transport: URL construction, JSON fetching with a
 * per-request timeout, and error classification.
 *
 * This module owns every outbound HTTP call. It knows nothing about
 * sessions or pacing: the session manager supplies auth headers and the
 * rate limiter decides when `send` runs.
 */

import type { Logger } from '../logger.js';
import { runWithTimeout } from '../lib/abort.js';
import { ErrorBodySchema } from '../lib/apiSchemas.js';
import { FetchError, ProviderRateLimitError, errorMessage, isAbortError } from '../lib/errors.js';

export type QueryParams = Record<string, string | number | boolean | undefined | null>;

export interface CapitalRequest {
  method: 'GET' | 'POST' | 'DELETE';
  path: string;
  label: string;
  query?: QueryParams;
  headers?: Record<string, string>;
  body?: unknown;
}

export interface CapitalResponse {
  status: number;
  headers: Headers;
  payload: unknown;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface CapitalTransportOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  logger: Logger;
  fetchImpl?: FetchLike;
}

// ---------------------------------------------------------------------------
// URL building
// ---------------------------------------------------------------------------

export function buildCapitalUrl(baseUrl: string, path: string, params: QueryParams = {}): string {
  const normalizedBase = baseUrl.replace(/\/+$/, '');
  const normalizedPath = String(path || '').replace(/^\/+/, '');
  const url = new URL(`${normalizedBase}/${normalizedPath}`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null && value !== '') {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

const SECRET_HEADER_NAMES = new Set(['x-cap-api-key', 'cst', 'x-security-token']);

/** Copy of `headers` safe to log: API key and session tokens are masked. */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    redacted[name] = SECRET_HEADER_NAMES.has(name.toLowerCase()) ? '***' : value;
  }
  return redacted;
}

// ---------------------------------------------------------------------------
// JSON / payload helpers
// ---------------------------------------------------------------------------

export function parseJsonSafe(text: unknown): unknown {
  if (typeof text !== 'string' || !text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function extractErrorCode(payload: unknown): string | null {
  const parsed = ErrorBodySchema.safeParse(payload);
  return parsed.success ? parsed.data.errorCode.trim() || null : null;
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 * Returns null when the header is missing or unparseable.
 */
export function parseRetryAfterMs(value: string | null, nowMs: number = Date.now()): number | null {
  const raw = String(value || '').trim();
  if (!raw) return null;
  if (/^\d+(\.\d+)?$/.test(raw)) {
    return Math.round(Number(raw) * 1000);
  }
  const dateMs = Date.parse(raw);
  if (!Number.isFinite(dateMs)) return null;
  return Math.max(0, dateMs - nowMs);
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export class CapitalHttpTransport {
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;

  constructor(options: CapitalTransportOptions) {
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Send one request. Resolves with the parsed payload on 2xx; throws
   * ProviderRateLimitError on 429 and FetchError on timeout, network
   * failure or any other non-2xx status.
   */
  async send(request: CapitalRequest): Promise<CapitalResponse> {
    const url = buildCapitalUrl(this.baseUrl, request.path, request.query);
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'X-CAP-API-KEY': this.apiKey,
      ...request.headers,
    };
    if (request.body !== undefined) headers['Content-Type'] = 'application/json';
    const startedMs = Date.now();

    let response: Response;
    let text: string;
    try {
      [response, text] = await runWithTimeout(
        async (signal) => {
          const resp = await this.fetchImpl(url, {
            method: request.method,
            headers,
            body: request.body === undefined ? undefined : JSON.stringify(request.body),
            signal,
          });
          return [resp, await resp.text()] as const;
        },
        {
          timeoutMs: this.timeoutMs,
          onTimeout: () =>
            new FetchError(`${request.label} timed out after ${this.timeoutMs}ms`, { httpStatus: 504, isTimeout: true }),
        },
      );
    } catch (err: unknown) {
      if (err instanceof FetchError) throw err;
      const reason = isAbortError(err) ? 'aborted' : errorMessage(err);
      throw new FetchError(`${request.label} request failed: ${reason}`, { cause: err });
    }

    const payload = parseJsonSafe(text);
    this.logger.debug(
      {
        event: 'capital_request',
        method: request.method,
        path: request.path,
        status: response.status,
        latencyMs: Date.now() - startedMs,
        headers: redactHeaders(headers),
      },
      `${request.label} → ${response.status}`,
    );

    if (response.status === 429) {
      const retryAfterMs = parseRetryAfterMs(response.headers.get('retry-after'));
      throw new ProviderRateLimitError(`${request.label} request failed (429): Too Many Requests`, retryAfterMs);
    }
    if (!response.ok) {
      const errorCode = extractErrorCode(payload);
      const details = errorCode || text.trim().slice(0, 180) || `HTTP ${response.status}`;
      if (errorCode && /too-many\.requests|rate.?limit/i.test(errorCode)) {
        throw new ProviderRateLimitError(`${request.label} request failed (${response.status}): ${details}`);
      }
      throw new FetchError(`${request.label} request failed (${response.status}): ${details}`, {
        httpStatus: response.status,
        errorCode,
      });
    }

    return { status: response.status, headers: response.headers, payload };
  }
}
