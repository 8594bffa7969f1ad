import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

const LEDGER = '_migrations';

export interface AppliedMigration {
  name: string;
  /** Tables the file created, sorted. */
  tables: string[];
}

export interface MigrationReport {
  applied: AppliedMigration[];
  skipped: string[];
}

function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function tableNames(db: Database.Database): Set<string> {
  const rows = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'")
    .all() as Array<{ name: string }>;
  return new Set(rows.map((r) => r.name));
}

function schemaFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`, { dir });
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

/**
 * Bring the local sink's schema up to date. Each `*.sql` file in `dir` runs
 * once, in name order, inside its own transaction; `_migrations` records it.
 */
export function runMigrations(db: Database.Database, dir: string = defaultMigrationsDir()): MigrationReport {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${LEDGER} (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const recorded = db.prepare(`SELECT name FROM ${LEDGER}`).all() as Array<{ name: string }>;
  const done = new Set(recorded.map((r) => r.name));
  const files = schemaFiles(dir);
  const report: MigrationReport = { applied: [], skipped: files.filter((f) => done.has(f)) };
  const record = db.prepare(`INSERT INTO ${LEDGER} (name) VALUES (?)`);

  for (const name of files.filter((f) => !done.has(f))) {
    const sql = fs.readFileSync(path.join(dir, name), 'utf-8');
    const before = tableNames(db);
    const apply = db.transaction(() => {
      db.exec(sql);
      record.run(name);
    });

    try {
      apply();
    } catch (err) {
      throw new DbError(`Migration failed: ${name}`, {
        migration: name,
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    const tables = [...tableNames(db)].filter((t) => !before.has(t)).sort();
    report.applied.push({ name, tables });
    logger.info({ migration: name, tables }, 'Local sink schema migrated');
  }

  if (report.applied.length === 0) {
    logger.debug({ skipped: report.skipped.length }, 'Local sink schema up to date');
  }
  return report;
}
