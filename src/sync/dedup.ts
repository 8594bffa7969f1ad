import type { Row, Sink } from '../sink/sink.js';
import { errorMessage } from '../shared/errors.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';

/**
 * Trimmed string form of one key field. Matching is case-sensitive.
 */
export function normalizeKeyPart(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

/**
 * Encode a composite key. JSON keeps ("a|b", "c") and ("a", "b|c") apart.
 */
export function naturalKey(row: Row, fields: readonly string[]): string {
  return JSON.stringify(fields.map((f) => normalizeKeyPart(row[f])));
}

/**
 * In-memory set of natural keys for one sync run: seeded from the sink,
 * then grown with every row admitted during the run, so the first
 * occurrence of a key wins and later ones are dropped.
 */
export class NaturalKeyDeduplicator {
  private readonly keys = new Set<string>();
  private readonly folded = new Set<string>();
  private _caseVariants = 0;

  constructor(
    readonly fields: readonly string[],
    existing: Iterable<Row> = [],
  ) {
    for (const row of existing) this.markSeen(row);
  }

  /**
   * Load every existing key tuple from `table`. A failed read leaves the set
   * empty (everything counts as new) and reports `degraded`.
   */
  static async fromSink(
    sink: Sink,
    table: string,
    fields: readonly string[],
    log: Logger = rootLogger,
  ): Promise<{ dedup: NaturalKeyDeduplicator; degraded: boolean }> {
    try {
      const rows = await sink.select(table, fields);
      return { dedup: new NaturalKeyDeduplicator(fields, rows), degraded: false };
    } catch (err) {
      log.warn({ table, error: errorMessage(err) }, 'Could not load existing keys, treating all records as new');
      return { dedup: new NaturalKeyDeduplicator(fields), degraded: true };
    }
  }

  get size(): number {
    return this.keys.size;
  }

  /** Admitted rows whose key matched a known key in every way but letter case. */
  get caseVariants(): number {
    return this._caseVariants;
  }

  contains(row: Row): boolean {
    return this.keys.has(naturalKey(row, this.fields));
  }

  markSeen(row: Row): void {
    const key = naturalKey(row, this.fields);
    this.keys.add(key);
    this.folded.add(key.toLowerCase());
  }

  /**
   * True when the row's key is new; the key is then remembered for the rest of the run.
   */
  admit(row: Row): boolean {
    const key = naturalKey(row, this.fields);
    if (this.keys.has(key)) return false;
    if (this.folded.has(key.toLowerCase())) this._caseVariants++;
    this.keys.add(key);
    this.folded.add(key.toLowerCase());
    return true;
  }
}
