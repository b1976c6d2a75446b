import { promises as fs } from 'fs';
import * as path from 'path';
import Fastify, { type FastifyInstance } from 'fastify';
import type { Logger } from './logger.js';
import { errorMessage } from './lib/errors.js';
import { createRequestId, registerRequestLogging } from './middleware.js';
import { getCsvFileStats, readMarketRowsCsv } from './data/csvStore.js';
import { registerHealthRoutes } from './routes/healthRoutes.js';
import { registerMarketRoutes } from './routes/marketRoutes.js';

export interface ViewerAppOptions {
  csvPath: string;
  dashboardPath: string;
  logger: Logger;
  requestLogEnabled?: boolean;
  now?: () => number;
}

const DASHBOARD_MISSING_HTML = '<!doctype html><title>Market Analyzer</title><p>Dashboard page not found.</p>';

/** Fastify app for the viewer; routes read the CSV on every request. */
export function buildViewerApp(options: ViewerAppOptions): FastifyInstance {
  const { logger } = options;
  const now = options.now ?? Date.now;
  const csvPath = path.resolve(options.csvPath);
  const dashboardPath = path.resolve(options.dashboardPath);
  const app = Fastify({ logger: false, genReqId: () => createRequestId() });

  if (options.requestLogEnabled) {
    registerRequestLogging(app, logger);
  }

  app.setErrorHandler((err, req, reply) => {
    logger.error({ event: 'http_error', path: req.url, error: errorMessage(err) }, 'Request failed');
    reply.code(500).send({ error: 'Internal server error' });
  });

  registerHealthRoutes({ app, startedAtMs: now(), now });
  registerMarketRoutes({
    app,
    loadRows: () => readMarketRowsCsv(csvPath),
    loadStats: () => getCsvFileStats(csvPath),
    loadDashboardHtml: async () => {
      try {
        return await fs.readFile(dashboardPath, 'utf-8');
      } catch (err: unknown) {
        logger.warn({ event: 'dashboard_missing', file: dashboardPath, error: errorMessage(err) }, 'Dashboard page unavailable');
        return DASHBOARD_MISSING_HTML;
      }
    },
  });

  return app;
}
