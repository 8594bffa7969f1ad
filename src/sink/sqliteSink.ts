import type Database from 'better-sqlite3';
import type { Filter, Row, SelectOptions, Sink } from './sink.js';
import { SinkError, errorMessage } from '../shared/errors.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const OPERATORS: Record<Filter['op'], string> = {
  eq: '=',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
};

type SqlValue = string | number | bigint | Buffer | null;

function ident(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new SinkError(`Invalid identifier: ${name}`, { identifier: name });
  }
  return `"${name}"`;
}

/**
 * Map a row value onto what SQLite can bind: booleans become 0/1 and
 * objects/arrays are stored as JSON text.
 */
export function toSqlValue(value: unknown): SqlValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') return value;
  if (Buffer.isBuffer(value)) return value;
  return JSON.stringify(value);
}

function columnsOf(rows: readonly Row[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return [...seen];
}

export class SqliteSink implements Sink {
  readonly kind = 'sqlite';

  constructor(private readonly db: Database.Database) {}

  async select(table: string, columns: readonly string[] | '*', options: SelectOptions = {}): Promise<Row[]> {
    const cols = columns === '*' ? '*' : columns.map(ident).join(', ');
    const where: string[] = [];
    const params: SqlValue[] = [];

    for (const filter of options.filters ?? []) {
      where.push(`${ident(filter.column)} ${OPERATORS[filter.op]} ?`);
      params.push(toSqlValue(filter.value));
    }

    let sql = `SELECT ${cols} FROM ${ident(table)}`;
    if (where.length > 0) sql += ` WHERE ${where.join(' AND ')}`;
    if (options.orderBy) {
      sql += ` ORDER BY ${ident(options.orderBy.column)} ${options.orderBy.descending ? 'DESC' : 'ASC'}`;
    }
    if (options.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(options.limit);
    }

    try {
      return this.db.prepare(sql).all(...params) as Row[];
    } catch (err) {
      throw new SinkError(`Select from ${table} failed: ${errorMessage(err)}`, { table });
    }
  }

  async insert(table: string, rows: readonly Row[]): Promise<void> {
    if (rows.length === 0) return;
    const columns = columnsOf(rows);
    const sql = `INSERT INTO ${ident(table)} (${columns.map(ident).join(', ')})
      VALUES (${columns.map(() => '?').join(', ')})`;
    this.writeAll(table, sql, columns, rows);
  }

  async upsert(table: string, rows: readonly Row[], conflictKey: readonly string[]): Promise<void> {
    if (rows.length === 0) return;
    if (conflictKey.length === 0) {
      throw new SinkError('Upsert requires a conflict key', { table });
    }
    const columns = columnsOf(rows);
    const keySet = new Set(conflictKey);
    const updates = columns.filter((c) => !keySet.has(c)).map((c) => `${ident(c)} = excluded.${ident(c)}`);
    const action = updates.length > 0 ? `DO UPDATE SET ${updates.join(', ')}` : 'DO NOTHING';
    const sql = `INSERT INTO ${ident(table)} (${columns.map(ident).join(', ')})
      VALUES (${columns.map(() => '?').join(', ')})
      ON CONFLICT (${conflictKey.map(ident).join(', ')}) ${action}`;
    this.writeAll(table, sql, columns, rows);
  }

  close(): void {
    this.db.close();
  }

  private writeAll(table: string, sql: string, columns: string[], rows: readonly Row[]): void {
    try {
      const stmt = this.db.prepare(sql);
      const runAll = this.db.transaction((batch: readonly Row[]) => {
        for (const row of batch) {
          stmt.run(...columns.map((c) => toSqlValue(row[c])));
        }
      });
      runAll(rows);
    } catch (err) {
      throw new SinkError(`Write to ${table} failed: ${errorMessage(err)}`, { table, rows: rows.length });
    }
  }
}
