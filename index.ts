import type { FastifyInstance } from 'fastify';
import logger, { routeConsoleToLogger } from './server/logger.js';
import { loadViewerConfig } from './server/config.js';
import { buildViewerApp } from './server/app.js';
import { errorMessage } from './server/lib/errors.js';

routeConsoleToLogger(logger);

const config = loadViewerConfig();
const app: FastifyInstance = buildViewerApp({
  csvPath: config.csvPath,
  dashboardPath: config.dashboardPath,
  logger,
  requestLogEnabled: config.requestLogEnabled,
});

let isShuttingDown = false;

async function shutdownServer(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info(`Received ${signal}; shutting down gracefully...`);

  const forceExitTimer = setTimeout(() => {
    logger.error('Graceful shutdown timed out; forcing exit');
    process.exit(1);
  }, 15000);
  forceExitTimer.unref();

  try {
    await app.close();
    logger.info('Shutdown complete');
    clearTimeout(forceExitTimer);
    process.exit(0);
  } catch (err: unknown) {
    logger.error(`Graceful shutdown failed: ${errorMessage(err)}`);
    clearTimeout(forceExitTimer);
    process.exit(1);
  }
}

async function start(): Promise<void> {
  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err: unknown) {
    logger.error({ event: 'listen_failed', error: errorMessage(err) }, 'Fatal: viewer failed to start, exiting.');
    process.exit(1);
  }
  logger.info(`Market dashboard running on http://localhost:${config.port}`);
  logger.info(`Serving results from ${config.csvPath}`);
}

process.on('unhandledRejection', (reason) => {
  logger.error({ error: errorMessage(reason) }, 'Unhandled promise rejection');
});
process.on('uncaughtException', (err) => {
  logger.error({ error: errorMessage(err) }, 'Uncaught exception');
  void shutdownServer('uncaughtException');
});
process.on('SIGINT', () => {
  void shutdownServer('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdownServer('SIGTERM');
});

void start();
