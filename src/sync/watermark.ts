import type { Row, Sink } from '../sink/sink.js';
import { errorMessage } from '../shared/errors.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';

/** Cursor value returned when the sink holds nothing usable. */
export const MIN_WATERMARK = 0;

/**
 * Read a row's ordering cursor. Integers and numeric strings count;
 * anything else (a track still playing has no timestamp) is null.
 */
export function cursorOf(row: Row, column: string): number | null {
  const value = row[column];
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/**
 * Highest cursor already persisted in `table`. An empty or unreadable table
 * yields MIN_WATERMARK, which makes the next fetch take everything.
 */
export async function getWatermark(
  sink: Sink,
  table: string,
  column: string,
  log: Logger = rootLogger,
): Promise<number> {
  try {
    const rows = await sink.select(table, [column], {
      orderBy: { column, descending: true },
      limit: 1,
    });
    const first = rows[0];
    if (!first) return MIN_WATERMARK;
    return cursorOf(first, column) ?? MIN_WATERMARK;
  } catch (err) {
    log.warn({ table, column, error: errorMessage(err) }, 'Could not read watermark, fetching everything');
    return MIN_WATERMARK;
  }
}

export function isNew(row: Row, column: string, watermark: number): boolean {
  const cursor = cursorOf(row, column);
  return cursor !== null && cursor > watermark;
}

export interface NewerSlice {
  fresh: Row[];
  /** True once a row at or behind the watermark was seen. */
  reachedBoundary: boolean;
}

/**
 * Newest-first page → the rows strictly newer than the watermark. Scanning
 * stops at the first row at or behind it; everything after is older.
 */
export function takeNewer(page: readonly Row[], column: string, watermark: number): NewerSlice {
  const fresh: Row[] = [];
  for (const row of page) {
    const cursor = cursorOf(row, column);
    if (cursor === null) continue;
    if (cursor <= watermark) {
      return { fresh, reachedBoundary: true };
    }
    fresh.push(row);
  }
  return { fresh, reachedBoundary: false };
}
