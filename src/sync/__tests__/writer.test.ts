import { describe, it, expect, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { writeInBatches } from '../writer.js';
import { FaultySink, memorySink } from './fakes.js';

const TABLE = 'lastfm_listened_table';

let db: Database.Database | null = null;

afterEach(() => {
  db?.close();
  db = null;
});

describe('writeInBatches', () => {
  it('writes every batch', async () => {
    const mem = memorySink();
    db = mem.db;
    const rows = [1, 2, 3, 4, 5].map((n) => ({ date_uts: n }));

    const outcome = await writeInBatches(mem.sink, TABLE, rows, 2);

    expect(outcome).toEqual({ written: 5, failed: 0, failedBatches: [], errors: [] });
    expect(await mem.sink.select(TABLE, ['date_uts'])).toHaveLength(5);
  });

  it('skips a failed batch and continues with the rest', async () => {
    const mem = memorySink();
    db = mem.db;
    const sink = new FaultySink(mem.sink);
    sink.rejectWrite = (rows) => rows.some((r) => r['date_uts'] === 3);
    const rows = [1, 2, 3, 4, 5].map((n) => ({ date_uts: n }));

    const outcome = await writeInBatches(sink, TABLE, rows, 2);

    expect(outcome).toEqual({
      written: 3,
      failed: 2,
      failedBatches: [1],
      errors: ['batch 1: write rejected'],
    });
    expect(await mem.sink.select(TABLE, ['date_uts'], { orderBy: { column: 'date_uts' } })).toEqual([
      { date_uts: 1 },
      { date_uts: 2 },
      { date_uts: 5 },
    ]);
  });
});
