/**
 * A row as written to or read from a sink table. Values are JSON-compatible.
 */
export type Row = Record<string, unknown>;

export type FilterOp = 'eq' | 'gt' | 'gte' | 'lt' | 'lte';

export interface Filter {
  column: string;
  op: FilterOp;
  value: string | number | boolean;
}

export interface SelectOptions {
  filters?: readonly Filter[];
  orderBy?: { column: string; descending?: boolean };
  limit?: number;
}

/**
 * The persistent store receiving synced records. Sync components depend on
 * these three operations only; implementations throw SinkError on failure.
 */
export interface Sink {
  readonly kind: string;
  select(table: string, columns: readonly string[] | '*', options?: SelectOptions): Promise<Row[]>;
  insert(table: string, rows: readonly Row[]): Promise<void>;
  upsert(table: string, rows: readonly Row[], conflictKey: readonly string[]): Promise<void>;
  close(): void;
}
