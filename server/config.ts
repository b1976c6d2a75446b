import 'dotenv/config';

// --- Provider endpoints ---
export const CAPITAL_LIVE_BASE_URL = 'https://api-capital.backend-capital.com';
export const CAPITAL_DEMO_BASE_URL = 'https://demo-api-capital.backend-capital.com';

export const DEFAULT_CATEGORIES = ['commodities', 'forex', 'indices', 'shares', 'etf', 'cryptocurrencies'];

/** Per-category instrument caps; `null` lists every market in the category. */
export const DEFAULT_CATEGORY_LIMITS: Readonly<Record<string, number | null>> = {
  forex: 20,
  commodities: null,
  shares: 50,
  indices: 20,
  etf: 20,
  cryptocurrencies: 20,
};

export interface CapitalCredentials {
  apiKey: string;
  identifier: string;
  password: string;
}

export interface AnalyzerConfig {
  credentials: CapitalCredentials;
  useDemo: boolean;
  baseUrl: string;
  categories: string[];
  categoryLimits: Record<string, number | null>;
  categoryNodeOverrides: Record<string, string>;
  outputFilename: string;
  requestDelayMs: number;
  keepAliveEvery: number;
  requestTimeoutMs: number;
  rateLimitMaxRetries: number;
  rateLimitBaseBackoffMs: number;
  sessionValidityMs: number;
  databaseUrl: string;
}

export interface ViewerConfig {
  port: number;
  host: string;
  csvPath: string;
  dashboardPath: string;
  requestLogEnabled: boolean;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback = ''): string {
  return String(env[name] || fallback).trim();
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = readString(env, name).toLowerCase();
  if (!raw) return fallback;
  return raw !== 'false' && raw !== '0' && raw !== 'no';
}

function readNumber(env: Env, name: string, fallback: number, min: number): number {
  const value = Number(env[name]);
  if (env[name] === undefined || env[name] === '' || !Number.isFinite(value)) return fallback;
  return Math.max(min, value);
}

function readList(env: Env, name: string, fallback: string[]): string[] {
  const raw = readString(env, name);
  if (!raw) return [...fallback];
  return raw
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
}

/**
 * Parse `forex:20,commodities:all` into a limits map. Unparseable entries
 * are ignored; `all`, `none` and `0` mean unlimited.
 */
export function parseCategoryLimits(raw: string): Record<string, number | null> {
  const limits: Record<string, number | null> = {};
  for (const entry of raw.split(',')) {
    const [rawName, rawLimit] = entry.split(':').map((part) => part.trim());
    if (!rawName || rawLimit === undefined) continue;
    const name = rawName.toLowerCase();
    if (/^(all|none|0)$/i.test(rawLimit)) {
      limits[name] = null;
      continue;
    }
    const limit = Math.floor(Number(rawLimit));
    if (Number.isFinite(limit) && limit > 0) limits[name] = limit;
  }
  return limits;
}

/** Parse `etf=hierarchy_v1.etfs,forex=hierarchy_v1.majors` node-id overrides. */
export function parseCategoryNodeOverrides(raw: string): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const entry of raw.split(',')) {
    const [rawName, rawNode] = entry.split('=').map((part) => part.trim());
    if (rawName && rawNode) overrides[rawName.toLowerCase()] = rawNode;
  }
  return overrides;
}

export function loadAnalyzerConfig(env: Env = process.env): AnalyzerConfig {
  const useDemo = readBoolean(env, 'CAPITAL_USE_DEMO', true);
  return {
    credentials: {
      apiKey: readString(env, 'CAPITAL_API_KEY'),
      identifier: readString(env, 'CAPITAL_IDENTIFIER'),
      password: String(env.CAPITAL_PASSWORD || ''),
    },
    useDemo,
    baseUrl: readString(env, 'CAPITAL_BASE_URL') || (useDemo ? CAPITAL_DEMO_BASE_URL : CAPITAL_LIVE_BASE_URL),
    categories: readList(env, 'CATEGORIES', DEFAULT_CATEGORIES),
    categoryLimits: { ...DEFAULT_CATEGORY_LIMITS, ...parseCategoryLimits(readString(env, 'CATEGORY_LIMITS')) },
    categoryNodeOverrides: parseCategoryNodeOverrides(readString(env, 'CATEGORY_NODE_IDS')),
    outputFilename: readString(env, 'OUTPUT_FILENAME', 'capital_markets_analysis.csv'),
    requestDelayMs: readNumber(env, 'REQUEST_DELAY_MS', 150, 0),
    keepAliveEvery: Math.floor(readNumber(env, 'KEEP_ALIVE_EVERY', 20, 1)),
    requestTimeoutMs: readNumber(env, 'REQUEST_TIMEOUT_MS', 30_000, 1_000),
    rateLimitMaxRetries: Math.floor(readNumber(env, 'RATE_LIMIT_MAX_RETRIES', 3, 0)),
    rateLimitBaseBackoffMs: readNumber(env, 'RATE_LIMIT_BASE_BACKOFF_MS', 1_000, 0),
    sessionValidityMs: readNumber(env, 'SESSION_VALIDITY_MS', 10 * 60 * 1000, 1_000),
    databaseUrl: readString(env, 'DATABASE_URL'),
  };
}

export function loadViewerConfig(env: Env = process.env): ViewerConfig {
  return {
    port: Math.floor(readNumber(env, 'PORT', 5000, 1)),
    host: readString(env, 'HOST', '0.0.0.0'),
    csvPath: readString(env, 'OUTPUT_FILENAME', 'capital_markets_analysis.csv'),
    dashboardPath: readString(env, 'DASHBOARD_HTML', 'public/index.html'),
    requestLogEnabled: readBoolean(env, 'REQUEST_LOG_ENABLED', false),
  };
}

// --- Startup validation ---
export function validateAnalyzerConfig(config: AnalyzerConfig): { errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.credentials.apiKey) errors.push('CAPITAL_API_KEY is required');
  if (!config.credentials.identifier) errors.push('CAPITAL_IDENTIFIER is required');
  if (!config.credentials.password) errors.push('CAPITAL_PASSWORD is required');
  if (config.categories.length === 0) errors.push('CATEGORIES must name at least one category');
  if (!config.outputFilename) errors.push('OUTPUT_FILENAME must not be empty');

  if (!config.useDemo) {
    warnings.push('CAPITAL_USE_DEMO is false; requests go to the live environment');
  }
  if (config.requestDelayMs < 100) {
    warnings.push(`REQUEST_DELAY_MS=${config.requestDelayMs} is below 100ms; the provider allows 10 requests/second`);
  }
  if (!config.databaseUrl) {
    warnings.push('DATABASE_URL is not set; results are written to CSV only');
  }
  return { errors, warnings };
}
