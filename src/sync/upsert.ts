import type { Row, Sink } from '../sink/sink.js';
import { errorMessage } from '../shared/errors.js';
import { attempt } from '../shared/result.js';
import { chunk } from '../shared/utils.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';
import { naturalKey } from './dedup.js';

export type UpsertAction = 'insert' | 'update';

export interface PlannedWrite {
  key: string;
  row: Row;
  action: UpsertAction;
}

export interface UpsertPlan {
  writes: PlannedWrite[];
  /** Rows identical to what the sink already stores. */
  unchanged: number;
  /** Earlier payloads for an id that appeared again later in the same run. */
  superseded: number;
}

export interface UpsertOutcome {
  inserted: number;
  updated: number;
  failed: number;
  errors: string[];
}

function canonical(value: unknown): unknown {
  if (value === undefined || value === null) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (Array.isArray(value)) return value.map(canonical);
  if (typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, canonical(v)]),
    );
  }
  return value;
}

const TIMESTAMP = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;

/** `...Z` and `...+00:00` name the same instant; hosted TIMESTAMPTZ columns return the latter. */
function sameInstant(a: string, b: string): boolean {
  if (!TIMESTAMP.test(a) || !TIMESTAMP.test(b)) return false;
  const at = Date.parse(a);
  return Number.isFinite(at) && at === Date.parse(b);
}

function decimalPlaces(text: string): number {
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

/**
 * A fixed-precision column hands back the payload rounded to its scale,
 * so 2.83456 is stored as 2.8346. A whole stored number carries no scale
 * and must match exactly.
 */
function sameNumber(next: number, stored: number | string): boolean {
  const text = String(stored);
  const value = Number(text);
  if (text.trim() === '' || !Number.isFinite(value)) return false;
  if (next === value) return true;
  const places = decimalPlaces(text);
  return places > 0 && places < decimalPlaces(String(next)) && Number(next.toFixed(places)) === value;
}

/**
 * Compare a payload value with what a sink returned for it. Sinks store
 * booleans as 0/1 and nested objects as JSON text, SQLite column affinity
 * may turn numbers into strings or back, and the hosted backend normalizes
 * timestamps and rounds numerics.
 */
export function valuesEqual(next: unknown, stored: unknown): boolean {
  let storedValue = stored;
  if (next !== null && typeof next === 'object' && typeof stored === 'string') {
    try {
      storedValue = JSON.parse(stored);
    } catch {
      return false;
    }
  }
  const a = canonical(next);
  const b = canonical(storedValue);
  if (typeof a === 'number' && (typeof b === 'number' || typeof b === 'string')) return sameNumber(a, b);
  if (typeof a === 'string' && typeof b === 'number') return a === String(b);
  if (typeof a === 'string' && typeof b === 'string') return a === b || sameInstant(a, b);
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * True when every field of the payload already holds the same value in the stored row.
 */
export function sameContent(payload: Row, stored: Row): boolean {
  return Object.keys(payload).every((k) => valuesEqual(payload[k], stored[k]));
}

/**
 * Insert-or-replace keyed by a stable external id. A repeated id is an
 * update of the same entity, so its latest payload replaces the stored row.
 */
export class UpsertReconciler {
  private readonly existing: Map<string, Row>;

  constructor(
    private readonly sink: Sink,
    readonly table: string,
    readonly conflictKey: readonly string[],
    existing: Iterable<Row> = [],
    private readonly log: Logger = rootLogger,
  ) {
    this.existing = new Map();
    for (const row of existing) {
      this.existing.set(naturalKey(row, conflictKey), row);
    }
  }

  /**
   * Read the stored rows so each payload can be classified. On a failed read
   * every payload is planned as an insert; the upsert itself still replaces.
   */
  static async bootstrap(
    sink: Sink,
    table: string,
    conflictKey: readonly string[],
    log: Logger = rootLogger,
  ): Promise<{ reconciler: UpsertReconciler; degraded: boolean }> {
    try {
      const rows = await sink.select(table, '*');
      return { reconciler: new UpsertReconciler(sink, table, conflictKey, rows, log), degraded: false };
    } catch (err) {
      log.warn({ table, error: errorMessage(err) }, 'Could not load existing ids, treating all records as new');
      return { reconciler: new UpsertReconciler(sink, table, conflictKey, [], log), degraded: true };
    }
  }

  get knownIds(): number {
    return this.existing.size;
  }

  has(row: Row): boolean {
    return this.existing.has(naturalKey(row, this.conflictKey));
  }

  plan(rows: readonly Row[]): UpsertPlan {
    const latest = new Map<string, Row>();
    let superseded = 0;
    for (const row of rows) {
      const key = naturalKey(row, this.conflictKey);
      if (latest.has(key)) {
        superseded++;
        latest.delete(key);
      }
      latest.set(key, row);
    }

    const writes: PlannedWrite[] = [];
    let unchanged = 0;
    for (const [key, row] of latest) {
      const stored = this.existing.get(key);
      if (!stored) {
        writes.push({ key, row, action: 'insert' });
      } else if (sameContent(row, stored)) {
        unchanged++;
      } else {
        writes.push({ key, row, action: 'update' });
      }
    }
    return { writes, unchanged, superseded };
  }

  /**
   * Write planned rows in batches. A rejected batch is retried one record at
   * a time, so a single bad record is logged and skipped on its own.
   */
  async apply(writes: readonly PlannedWrite[], batchSize: number): Promise<UpsertOutcome> {
    const outcome: UpsertOutcome = { inserted: 0, updated: 0, failed: 0, errors: [] };

    const record = (write: PlannedWrite): void => {
      if (write.action === 'insert') outcome.inserted++;
      else outcome.updated++;
      const stored = this.existing.get(write.key);
      this.existing.set(write.key, { ...stored, ...write.row });
    };

    for (const batch of chunk(writes, batchSize)) {
      const result = await attempt(() =>
        this.sink.upsert(this.table, batch.map((w) => w.row), this.conflictKey),
      );
      if (result.ok) {
        batch.forEach(record);
        continue;
      }

      if (batch.length > 1) {
        this.log.warn(
          { table: this.table, size: batch.length, error: result.reason },
          'Upsert batch failed, retrying record by record',
        );
      }

      for (const write of batch) {
        const single = batch.length > 1
          ? await attempt(() => this.sink.upsert(this.table, [write.row], this.conflictKey))
          : result;
        if (single.ok) {
          record(write);
        } else {
          outcome.failed++;
          outcome.errors.push(`${write.key}: ${single.reason}`);
          this.log.error({ table: this.table, key: write.key, error: single.reason }, 'Upsert failed, skipping record');
        }
      }
    }

    return outcome;
  }
}
