import fs from 'node:fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { SourceError, errorMessage } from '../shared/errors.js';

export type CsvRecord = Record<string, string>;

const RecordsSchema = z.array(z.record(z.string()));

/**
 * "Letterboxd URI" → "letterboxd_uri", "Number of Pages" → "number_of_pages".
 */
export function toSnakeCase(header: string): string {
  const s = header
    .trim()
    .replace(/[\s-]+/g, '_')
    .replace(/[^a-zA-Z0-9_]/g, '');
  return s ? s.toLowerCase() : header.toLowerCase().replace(/ /g, '_');
}

/**
 * Parse an export with a header line. Keys are snake_cased headers, values trimmed.
 */
export function parseCsv(content: string): CsvRecord[] {
  let records: unknown;
  try {
    records = parse(content, {
      columns: (header: string[]) => header.map(toSnakeCase),
      bom: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (err) {
    throw new SourceError(`Invalid CSV: ${errorMessage(err)}`);
  }

  const parsed = RecordsSchema.safeParse(records);
  if (!parsed.success) {
    throw new SourceError('CSV rows are not flat records');
  }
  return parsed.data;
}

export function readCsvFile(filePath: string): CsvRecord[] {
  if (!fs.existsSync(filePath)) {
    throw new SourceError(`CSV file not found: ${filePath}`, { path: filePath });
  }
  return parseCsv(fs.readFileSync(filePath, 'utf-8'));
}
