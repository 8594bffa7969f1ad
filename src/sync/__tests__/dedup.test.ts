import { describe, it, expect, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { NaturalKeyDeduplicator, naturalKey, normalizeKeyPart } from '../dedup.js';
import { FaultySink, memorySink } from './fakes.js';

const BOOK_KEY = ['title', 'author'];

let db: Database.Database | null = null;

afterEach(() => {
  db?.close();
  db = null;
});

describe('naturalKey', () => {
  it('trims parts and maps null to an empty string', () => {
    expect(normalizeKeyPart('  Dune ')).toBe('Dune');
    expect(normalizeKeyPart(null)).toBe('');
    expect(normalizeKeyPart(1965)).toBe('1965');
    expect(naturalKey({ title: ' Dune', author: null }, BOOK_KEY)).toBe('["Dune",""]');
  });

  it('keeps separator characters from merging fields', () => {
    const a = naturalKey({ title: 'a|b', author: 'c' }, BOOK_KEY);
    const b = naturalKey({ title: 'a', author: 'b|c' }, BOOK_KEY);
    expect(a).not.toBe(b);
  });
});

describe('NaturalKeyDeduplicator', () => {
  it('drops known keys and repeats within the run', () => {
    const dedup = new NaturalKeyDeduplicator(BOOK_KEY, [{ title: 'Dune', author: 'Frank Herbert' }]);

    const admitted = [
      { title: 'Dune', author: 'Frank Herbert' },
      { title: ' Dune ', author: 'Frank Herbert ' },
      { title: 'Emma', author: 'Jane Austen', rating: 4 },
      { title: 'Emma', author: 'Jane Austen', rating: 5 },
    ].filter((row) => dedup.admit(row));

    expect(admitted).toEqual([{ title: 'Emma', author: 'Jane Austen', rating: 4 }]);
    expect(dedup.size).toBe(2);
  });

  it('matches case-sensitively and counts case variants', () => {
    const dedup = new NaturalKeyDeduplicator(BOOK_KEY, [{ title: 'Dune', author: 'Frank Herbert' }]);

    expect(dedup.admit({ title: 'DUNE', author: 'Frank Herbert' })).toBe(true);
    expect(dedup.caseVariants).toBe(1);
    expect(dedup.contains({ title: 'DUNE', author: 'Frank Herbert' })).toBe(true);
  });

  it('loads existing keys from the sink', async () => {
    const mem = memorySink();
    db = mem.db;
    await mem.sink.insert('worldly_good_reads_books', [{ title: 'Dune', author: 'Frank Herbert' }]);

    const { dedup, degraded } = await NaturalKeyDeduplicator.fromSink(mem.sink, 'worldly_good_reads_books', BOOK_KEY);

    expect(degraded).toBe(false);
    expect(dedup.contains({ title: 'Dune', author: 'Frank Herbert' })).toBe(true);
  });

  it('starts empty and reports degraded when the sink cannot be read', async () => {
    const mem = memorySink();
    db = mem.db;
    const sink = new FaultySink(mem.sink);
    sink.failSelect = true;

    const { dedup, degraded } = await NaturalKeyDeduplicator.fromSink(sink, 'worldly_good_reads_books', BOOK_KEY);

    expect(degraded).toBe(true);
    expect(dedup.size).toBe(0);
  });
});
