import type { Config } from '../shared/config.js';
import { requireCredentials } from '../shared/config.js';
import { openDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { logger } from '../shared/logger.js';
import type { Sink } from './sink.js';
import { SqliteSink } from './sqliteSink.js';
import { SupabaseSink, createSupabaseClient } from './supabaseSink.js';

export type { Sink, Row, Filter, FilterOp, SelectOptions } from './sink.js';
export { SqliteSink } from './sqliteSink.js';
export { SupabaseSink, createSupabaseClient } from './supabaseSink.js';

/**
 * Build the sink named by config. Constructed once per process and passed
 * to every sync explicitly.
 */
export function createSink(config: Config['sink']): Sink {
  if (config.kind === 'sqlite') {
    const db = openDb(config.sqlite_path);
    runMigrations(db);
    logger.debug({ path: config.sqlite_path }, 'Using local SQLite sink');
    return new SqliteSink(db);
  }

  requireCredentials('sink', config, {
    supabase_url: 'SUPABASE_URL',
    supabase_key: 'SUPABASE_ANON_KEY',
  });
  return new SupabaseSink(createSupabaseClient(config.supabase_url, config.supabase_key));
}
