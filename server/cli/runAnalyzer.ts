#!/usr/bin/env node
import logger from '../logger.js';
import { loadAnalyzerConfig, validateAnalyzerConfig } from '../config.js';
import { runAnalyzerJob } from '../analyzerJob.js';
import { errorMessage } from '../lib/errors.js';

async function main(): Promise<number> {
  const config = loadAnalyzerConfig();
  const { errors, warnings } = validateAnalyzerConfig(config);
  for (const warning of warnings) logger.warn(`[config] ${warning}`);
  if (errors.length > 0) {
    for (const error of errors) logger.error(`[config] ${error}`);
    logger.error('Fatal: invalid configuration. See .env.example for the required variables.');
    return 1;
  }

  logger.info(
    { event: 'analyzer_starting', environment: config.useDemo ? 'demo' : 'live', categories: config.categories },
    'Starting Capital.com market analysis',
  );
  const { exitCode, result } = await runAnalyzerJob(config, { logger });
  if (result) {
    logger.info(
      { event: 'analyzer_done', runId: result.runId, markets: result.rows.length, failures: result.failures.length },
      `Analysis complete. Run "npm run view" to see the summary or "npm start" for the dashboard.`,
    );
  }
  return exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error({ event: 'analyzer_crashed', error: errorMessage(err) }, 'Analyzer failed unexpectedly');
    process.exitCode = 1;
  });
