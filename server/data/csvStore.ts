import { promises as fs } from 'fs';
import * as path from 'path';
import Papa from 'papaparse';
import type { Logger } from '../logger.js';
import { MARKET_ROW_COLUMNS, normalizeMarketRow, type MarketRow } from '../services/marketRows.js';
import type { ResultSink } from './resultSink.js';

export interface CsvFileStats {
  fileSize: number;
  modifiedTime: string;
  exists: true;
}

export function serializeMarketRowsCsv(rows: MarketRow[]): string {
  return Papa.unparse(rows, { columns: [...MARKET_ROW_COLUMNS], header: true, newline: '\n' });
}

export function parseMarketRowsCsv(content: string): MarketRow[] {
  const result = Papa.parse<Record<string, string | undefined>>(content, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });
  return result.data.map((record) => normalizeMarketRow(record));
}

export async function writeMarketRowsCsv(filePath: string, rows: MarketRow[]): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(filePath, serializeMarketRowsCsv(rows), 'utf-8');
}

/** Rows of the CSV at `filePath`, or [] when the file does not exist yet. */
export async function readMarketRowsCsv(filePath: string): Promise<MarketRow[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err: unknown) {
    if (isMissingFileError(err)) return [];
    throw err;
  }
  return parseMarketRowsCsv(content);
}

export async function getCsvFileStats(filePath: string): Promise<CsvFileStats | null> {
  try {
    const stat = await fs.stat(filePath);
    return {
      fileSize: stat.size,
      modifiedTime: stat.mtime.toISOString().slice(0, 19).replace('T', ' '),
      exists: true,
    };
  } catch (err: unknown) {
    if (isMissingFileError(err)) return null;
    throw err;
  }
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class CsvResultSink implements ResultSink {
  readonly name = 'csv';
  private readonly filePath: string;
  private readonly logger: Logger;

  constructor(options: { filePath: string; logger: Logger }) {
    this.filePath = options.filePath;
    this.logger = options.logger;
  }

  async write(rows: MarketRow[]): Promise<void> {
    if (rows.length === 0) {
      this.logger.warn({ event: 'csv_skipped', file: this.filePath }, 'No data to export');
      return;
    }
    await writeMarketRowsCsv(this.filePath, rows);
    this.logger.info({ event: 'csv_written', file: this.filePath, rows: rows.length }, `Data exported to ${this.filePath}`);
  }
}
