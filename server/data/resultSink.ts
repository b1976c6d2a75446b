import type { Logger } from '../logger.js';
import { errorMessage } from '../lib/errors.js';
import type { MarketAnalysis, MarketRow } from '../services/marketRows.js';

export interface RunMeta {
  runId: string;
  startedAt: string;
  finishedAt: string;
  failureCount: number;
}

/** Destination for one run's results (CSV file, database table, ...). */
export interface ResultSink {
  readonly name: string;
  write(rows: MarketRow[], analyses: MarketAnalysis[], meta: RunMeta): Promise<void>;
}

export interface SinkOutcome {
  sink: string;
  ok: boolean;
  error?: string;
}

/** Write to every sink in turn; one sink failing never stops the others. */
export async function writeToSinks(
  sinks: ResultSink[],
  rows: MarketRow[],
  analyses: MarketAnalysis[],
  meta: RunMeta,
  logger: Logger,
): Promise<SinkOutcome[]> {
  const outcomes: SinkOutcome[] = [];
  for (const sink of sinks) {
    try {
      await sink.write(rows, analyses, meta);
      outcomes.push({ sink: sink.name, ok: true });
    } catch (err: unknown) {
      logger.error({ event: 'sink_failed', sink: sink.name, error: errorMessage(err) }, `Writing to ${sink.name} failed`);
      outcomes.push({ sink: sink.name, ok: false, error: errorMessage(err) });
    }
  }
  return outcomes;
}
