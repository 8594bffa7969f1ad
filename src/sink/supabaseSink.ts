import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import WebSocket from 'ws';
import type { Row, SelectOptions, Sink } from './sink.js';
import { SinkError } from '../shared/errors.js';

/**
 * PostgREST caps each response at this many rows by default.
 */
export const SUPABASE_PAGE_ROWS = 1000;

/**
 * supabase-js opens its realtime client on construction, and Node 20 has no
 * global WebSocket, so the transport is passed in from `ws`.
 */
export function createSupabaseClient(url: string, key: string, fetchImpl?: typeof fetch): SupabaseClient {
  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
    realtime: { transport: WebSocket },
    ...(fetchImpl ? { global: { fetch: fetchImpl } } : {}),
  });
}

function isRow(value: unknown): value is Row {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class SupabaseSink implements Sink {
  readonly kind = 'supabase';

  constructor(private readonly client: SupabaseClient) {}

  async select(table: string, columns: readonly string[] | '*', options: SelectOptions = {}): Promise<Row[]> {
    if (options.limit !== undefined) {
      if (options.limit <= 0) return [];
      return this.selectRange(table, columns, options, 0, options.limit - 1);
    }

    // No limit: page through the whole table so key sets are complete.
    const rows: Row[] = [];
    for (let from = 0; ; from += SUPABASE_PAGE_ROWS) {
      const page = await this.selectRange(table, columns, options, from, from + SUPABASE_PAGE_ROWS - 1);
      rows.push(...page);
      if (page.length < SUPABASE_PAGE_ROWS) break;
    }
    return rows;
  }

  async insert(table: string, rows: readonly Row[]): Promise<void> {
    if (rows.length === 0) return;
    const { error } = await this.client.from(table).insert([...rows]);
    if (error) {
      throw new SinkError(`Insert into ${table} failed: ${error.message}`, {
        table,
        rows: rows.length,
        code: error.code,
      });
    }
  }

  async upsert(table: string, rows: readonly Row[], conflictKey: readonly string[]): Promise<void> {
    if (rows.length === 0) return;
    const { error } = await this.client
      .from(table)
      .upsert([...rows], { onConflict: conflictKey.join(','), ignoreDuplicates: false });
    if (error) {
      throw new SinkError(`Upsert into ${table} failed: ${error.message}`, {
        table,
        rows: rows.length,
        code: error.code,
      });
    }
  }

  close(): void {
    // HTTP client, nothing to release
  }

  private async selectRange(
    table: string,
    columns: readonly string[] | '*',
    options: SelectOptions,
    from: number,
    to: number,
  ): Promise<Row[]> {
    let query = this.client.from(table).select(columns === '*' ? '*' : columns.join(','));
    for (const filter of options.filters ?? []) {
      switch (filter.op) {
        case 'eq':
          query = query.eq(filter.column, filter.value);
          break;
        case 'gt':
          query = query.gt(filter.column, filter.value);
          break;
        case 'gte':
          query = query.gte(filter.column, filter.value);
          break;
        case 'lt':
          query = query.lt(filter.column, filter.value);
          break;
        case 'lte':
          query = query.lte(filter.column, filter.value);
          break;
      }
    }
    if (options.orderBy) {
      query = query.order(options.orderBy.column, { ascending: !options.orderBy.descending });
    }

    const { data, error } = await query.range(from, to);
    if (error) {
      throw new SinkError(`Select from ${table} failed: ${error.message}`, { table, code: error.code });
    }
    const rows: unknown[] = data ?? [];
    return rows.filter(isRow);
  }
}
