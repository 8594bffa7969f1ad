import { describe, it, expect, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { cursorOf, getWatermark, isNew, MIN_WATERMARK, takeNewer } from '../watermark.js';
import { FaultySink, memorySink } from './fakes.js';

const TABLE = 'lastfm_listened_table';

let db: Database.Database | null = null;

afterEach(() => {
  db?.close();
  db = null;
});

describe('cursorOf', () => {
  it('reads numbers and numeric strings', () => {
    expect(cursorOf({ date_uts: 1700000000 }, 'date_uts')).toBe(1700000000);
    expect(cursorOf({ date_uts: '1700000000' }, 'date_uts')).toBe(1700000000);
  });

  it('returns null for missing or non-numeric cursors', () => {
    expect(cursorOf({}, 'date_uts')).toBeNull();
    expect(cursorOf({ date_uts: '' }, 'date_uts')).toBeNull();
    expect(cursorOf({ date_uts: 'soon' }, 'date_uts')).toBeNull();
    expect(cursorOf({ date_uts: Number.NaN }, 'date_uts')).toBeNull();
  });
});

describe('isNew', () => {
  it('is strictly greater than the watermark', () => {
    expect(isNew({ t: 1001 }, 't', 1000)).toBe(true);
    expect(isNew({ t: 1000 }, 't', 1000)).toBe(false);
    expect(isNew({}, 't', 1000)).toBe(false);
  });
});

describe('takeNewer', () => {
  it('keeps the prefix newer than the watermark and stops at the boundary', () => {
    const page = [{ t: 1050 }, { t: 1020 }, { t: 1000 }, { t: 990 }];
    expect(takeNewer(page, 't', 1000)).toEqual({
      fresh: [{ t: 1050 }, { t: 1020 }],
      reachedBoundary: true,
    });
  });

  it('takes the whole page when nothing reaches the watermark', () => {
    expect(takeNewer([{ t: 5 }, { t: 4 }], 't', MIN_WATERMARK)).toEqual({
      fresh: [{ t: 5 }, { t: 4 }],
      reachedBoundary: false,
    });
  });

  it('skips rows without a cursor instead of stopping', () => {
    const page = [{ name: 'now playing' }, { t: 1100 }, { t: 900 }];
    expect(takeNewer(page, 't', 1000)).toEqual({ fresh: [{ t: 1100 }], reachedBoundary: true });
  });
});

describe('getWatermark', () => {
  it('is MIN_WATERMARK for an empty table', async () => {
    const mem = memorySink();
    db = mem.db;
    expect(await getWatermark(mem.sink, TABLE, 'date_uts')).toBe(MIN_WATERMARK);
  });

  it('is the highest stored cursor', async () => {
    const mem = memorySink();
    db = mem.db;
    await mem.sink.insert(TABLE, [{ date_uts: 1000 }, { date_uts: 1050 }, { date_uts: 1020 }]);
    expect(await getWatermark(mem.sink, TABLE, 'date_uts')).toBe(1050);
  });

  it('falls back to MIN_WATERMARK when the sink cannot be read', async () => {
    const mem = memorySink();
    db = mem.db;
    await mem.sink.insert(TABLE, [{ date_uts: 1050 }]);
    const sink = new FaultySink(mem.sink);
    sink.failSelect = true;
    expect(await getWatermark(sink, TABLE, 'date_uts')).toBe(MIN_WATERMARK);
  });
});
