import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { SinkError } from '../../shared/errors.js';
import { SqliteSink } from '../../sink/sqliteSink.js';
import type { Row, SelectOptions, Sink } from '../../sink/sink.js';

/** In-memory SQLite sink with the synced tables created. */
export function memorySink(): { db: Database.Database; sink: SqliteSink } {
  const db = new Database(':memory:');
  runMigrations(db);
  return { db, sink: new SqliteSink(db) };
}

/**
 * Wraps a sink and fails selected calls, recording every write attempt.
 */
export class FaultySink implements Sink {
  readonly kind = 'faulty';
  failSelect = false;
  rejectWrite: (rows: readonly Row[]) => boolean = () => false;
  readonly writes: Array<{ table: string; rows: Row[] }> = [];

  constructor(private readonly inner: Sink) {}

  async select(table: string, columns: readonly string[] | '*', options?: SelectOptions): Promise<Row[]> {
    if (this.failSelect) throw new SinkError('select unavailable');
    return this.inner.select(table, columns, options);
  }

  async insert(table: string, rows: readonly Row[]): Promise<void> {
    this.writes.push({ table, rows: [...rows] });
    if (this.rejectWrite(rows)) throw new SinkError('write rejected');
    await this.inner.insert(table, rows);
  }

  async upsert(table: string, rows: readonly Row[], conflictKey: readonly string[]): Promise<void> {
    this.writes.push({ table, rows: [...rows] });
    if (this.rejectWrite(rows)) throw new SinkError('write rejected');
    await this.inner.upsert(table, rows, conflictKey);
  }

  close(): void {
    this.inner.close();
  }
}

/** Page fetcher serving fixed pages, then empty pages. */
export function pagesOf<R>(pages: R[][]): (page: number) => Promise<R[]> {
  return async (page) => pages[page - 1] ?? [];
}
