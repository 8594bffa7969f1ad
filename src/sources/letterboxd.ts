import fs from 'node:fs';
import path from 'node:path';
import type { Config } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';
import type { Row } from '../sink/sink.js';
import { singlePage } from '../sync/fetcher.js';
import type { SyncPlan } from '../sync/orchestrator.js';
import { readCsvFile, type CsvRecord } from './csv.js';

export const LETTERBOXD_SOURCE_TAG = 'letterboxd';

export interface LetterboxdExport {
  /** File stem in the export zip: watched.csv → "watched". */
  stem: string;
  columns: readonly string[];
  key: readonly string[];
}

const FILM_COLUMNS = ['date', 'name', 'year', 'letterboxd_uri'] as const;

export const LETTERBOXD_EXPORTS: readonly LetterboxdExport[] = [
  { stem: 'watched', columns: FILM_COLUMNS, key: ['name', 'year'] },
  { stem: 'watchlist', columns: FILM_COLUMNS, key: ['name', 'year'] },
  { stem: 'ratings', columns: [...FILM_COLUMNS, 'rating'], key: ['name', 'year'] },
  {
    stem: 'diary',
    columns: [...FILM_COLUMNS, 'rating', 'rewatch', 'tags', 'watched_date'],
    key: ['name', 'year', 'watched_date'],
  },
];

export function tableFor(stem: string): string {
  return `letterboxd_${stem}`;
}

/**
 * Keep the known columns of an export line; blank cells become null.
 */
export function recordToRow(record: CsvRecord, columns: readonly string[]): Row {
  const row: Row = {};
  for (const column of columns) {
    const value = record[column];
    row[column] = value ? value : null;
  }
  row['_source'] = LETTERBOXD_SOURCE_TAG;
  return row;
}

export function readLetterboxdExport(filePath: string, exportDef: LetterboxdExport): Row[] {
  return readCsvFile(filePath)
    .filter((record) => Boolean(record['name']))
    .map((record) => recordToRow(record, exportDef.columns));
}

/**
 * First-level CSV files in the export that no table takes (profile.csv,
 * comments.csv and the like), sorted.
 */
export function unsyncedExportFiles(exportDir: string): string[] {
  const known = new Set(LETTERBOXD_EXPORTS.map((e) => `${e.stem}.csv`));
  return fs
    .readdirSync(exportDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.csv') && !known.has(entry.name))
    .map((entry) => entry.name)
    .sort();
}

/**
 * One plan per export file present in `dir` (defaults to the configured export dir).
 */
export function createLetterboxdPlans(config: Config, dir?: string): SyncPlan[] {
  const exportDir = resolvePath(dir ?? config.letterboxd.export_dir);
  if (!fs.existsSync(exportDir) || !fs.statSync(exportDir).isDirectory()) {
    throw new ConfigError(`Letterboxd export dir not found: ${exportDir}`, { dir: exportDir });
  }

  const plans: SyncPlan[] = [];
  for (const exportDef of LETTERBOXD_EXPORTS) {
    const file = path.join(exportDir, `${exportDef.stem}.csv`);
    if (!fs.existsSync(file)) {
      logger.debug({ file }, 'Letterboxd export file absent, skipping');
      continue;
    }
    plans.push({
      source: `letterboxd:${exportDef.stem}`,
      table: tableFor(exportDef.stem),
      boundary: { kind: 'natural-key', fields: exportDef.key },
      batchSize: config.letterboxd.batch_size,
      fetchPage: singlePage(async () => readLetterboxdExport(file, exportDef)),
    });
  }

  for (const name of unsyncedExportFiles(exportDir)) {
    logger.info({ file: path.join(exportDir, name) }, 'Letterboxd export file not synced');
  }

  if (plans.length === 0) {
    const expected = LETTERBOXD_EXPORTS.map((e) => `${e.stem}.csv`).join(', ');
    throw new ConfigError(`No Letterboxd exports in ${exportDir} (expected any of ${expected})`, { dir: exportDir });
  }
  return plans;
}
