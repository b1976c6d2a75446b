/**
 * Error taxonomy for the analyzer and error-classification predicates.
 *
 *   AuthError               bad credentials or rejected session: run-fatal
 *   UnknownCategoryError    category has no navigation node: category-fatal
 *   FetchError              network / timeout / non-2xx: logged, run continues
 *   ProviderRateLimitError  a single 429 from the provider (retried by the limiter)
 *   RateLimitExceededError  retries exhausted: handled like FetchError
 *   CatalogUnavailableError every configured category failed: run-fatal
 */

export class AnalyzerError extends Error {
  readonly httpStatus: number | null;

  constructor(message: string, options: { httpStatus?: number | null; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AnalyzerError';
    this.httpStatus = options.httpStatus ?? null;
  }
}

export class AuthError extends AnalyzerError {
  constructor(message: string, options: { httpStatus?: number | null; cause?: unknown } = {}) {
    super(message, options);
    this.name = 'AuthError';
  }
}

export class UnknownCategoryError extends AnalyzerError {
  readonly category: string;

  constructor(category: string) {
    super(`Unknown market category "${category}"`);
    this.name = 'UnknownCategoryError';
    this.category = category;
  }
}

export class FetchError extends AnalyzerError {
  /** Provider error code from the JSON body (e.g. `error.prices.not-found`), when present. */
  readonly errorCode: string | null;
  readonly isTimeout: boolean;

  constructor(
    message: string,
    options: { httpStatus?: number | null; errorCode?: string | null; isTimeout?: boolean; cause?: unknown } = {},
  ) {
    super(message, options);
    this.name = 'FetchError';
    this.errorCode = options.errorCode ?? null;
    this.isTimeout = options.isTimeout ?? false;
  }
}

export class ProviderRateLimitError extends AnalyzerError {
  /** Delay hinted by the provider's Retry-After header, if it sent one. */
  readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null = null) {
    super(message, { httpStatus: 429 });
    this.name = 'ProviderRateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class RateLimitExceededError extends AnalyzerError {
  readonly attempts: number;

  constructor(label: string, attempts: number, cause?: unknown) {
    super(`${label} still rate-limited after ${attempts} attempt(s)`, { httpStatus: 429, cause });
    this.name = 'RateLimitExceededError';
    this.attempts = attempts;
  }
}

export class CatalogUnavailableError extends AnalyzerError {
  readonly failedCategories: string[];

  constructor(failedCategories: string[]) {
    super(`Market catalog unavailable: all ${failedCategories.length} categories failed`);
    this.name = 'CatalogUnavailableError';
    this.failedCategories = failedCategories;
  }
}

export function isAuthError(err: unknown): err is AuthError {
  return err instanceof AuthError;
}

/** Errors that cost one instrument or one window but never the run. */
export function isFetchLikeError(err: unknown): err is FetchError | RateLimitExceededError {
  return err instanceof FetchError || err instanceof RateLimitExceededError;
}

/**
 * Returns true if `err` represents a request-abort signal: an AbortError by
 * name, an HTTP 499 status, or an error message containing "aborted" /
 * "aborterror" (case-insensitive).
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const name = 'name' in err ? String(err.name || '') : '';
  const message = 'message' in err ? String(err.message || '') : '';
  const status = 'httpStatus' in err ? Number(err.httpStatus) : NaN;
  return name === 'AbortError' || status === 499 || /aborted|aborterror/i.test(message);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
