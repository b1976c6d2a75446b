#!/usr/bin/env node
import * as path from 'path';
import logger from '../logger.js';
import { loadViewerConfig } from '../config.js';
import { getCsvFileStats, readMarketRowsCsv } from '../data/csvStore.js';
import { errorMessage } from '../lib/errors.js';
import { renderResultsReport } from '../services/summaryService.js';

async function main(): Promise<number> {
  const csvPath = path.resolve(process.argv[2] || loadViewerConfig().csvPath);
  const stats = await getCsvFileStats(csvPath);
  if (!stats) {
    process.stdout.write(`No results found at ${csvPath}.\nRun "npm run analyze" first to collect market data.\n`);
    return 1;
  }
  const rows = await readMarketRowsCsv(csvPath);
  process.stdout.write(`Results from ${csvPath} (updated ${stats.modifiedTime})\n\n`);
  process.stdout.write(`${renderResultsReport(rows)}\n`);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error({ event: 'view_failed', error: errorMessage(err) }, 'Could not read results');
    process.exitCode = 1;
  });
