#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { ConfigError, errorMessage, isFatalSyncError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getWorldlyDir } from '../shared/utils.js';
import { createSink, type Sink } from '../sink/index.js';
import { runSync, runSyncs, type SyncPlan, type SyncRunResult } from '../sync/orchestrator.js';
import { createLastfmPlan } from '../sources/lastfm.js';
import { createStravaPlan } from '../sources/strava.js';
import { createGoodreadsCsvPlan, createGoodreadsScrapePlan } from '../sources/goodreads.js';
import { createLetterboxdPlans } from '../sources/letterboxd.js';
import { createTmdbPlan } from '../sources/tmdb.js';
import { createTraktPlan } from '../sources/trakt.js';
import { formatReport, formatRunResult, reportErrors } from './report.js';

const program = new Command();

program
  .name('worldly-sync')
  .description('Incremental sync of personal activity data into the dashboard store')
  .version('0.1.0');

interface DryRunOpts {
  dryRun: boolean;
}

function positiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

function logError(msg: string): void {
  // eslint-disable-next-line no-console
  console.error(msg);
}

/**
 * Load config, open the sink once, build plans against it and run them in
 * sequence. Config and credential errors end the command with exit code 1.
 */
async function syncCommand(
  buildPlans: (config: Config, sink: Sink) => SyncPlan[],
  opts: Partial<DryRunOpts> = {},
): Promise<void> {
  let sink: Sink | null = null;
  try {
    const config = await loadConfig();
    sink = createSink(config.sink);
    const plans = buildPlans(config, sink);
    const dryRun = opts.dryRun ?? false;

    if (plans.length === 0) {
      log('Nothing to sync.');
      return;
    }
    if (plans.length === 1 && plans[0]) {
      const report = await runSync(plans[0], { sink }, { dryRun });
      log(formatReport(report));
      reportErrors(report).forEach(log);
      return;
    }

    const results = await runSyncs(plans, { sink }, { dryRun });
    printResults(results);
    if (results.some((r) => !r.result.ok)) process.exitCode = 1;
  } catch (err) {
    if (isFatalSyncError(err)) {
      logError(`✗ ${err.message}`);
    } else {
      logError(`✗ ${errorMessage(err)}`);
      logger.error({ err }, 'Command failed');
    }
    process.exitCode = 1;
  } finally {
    sink?.close();
  }
}

function printResults(results: readonly SyncRunResult[]): void {
  for (const run of results) {
    log(formatRunResult(run));
    if (run.result.ok) reportErrors(run.result.data).forEach(log);
  }
}

// === init ===
program
  .command('init')
  .description('Create ~/.worldly/config.yaml and, for the sqlite sink, the local database')
  .action(async () => {
    const configPath = path.join(getWorldlyDir(), 'config.yaml');
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    try {
      const config = await loadConfig(true);
      if (config.sink.kind === 'sqlite') {
        createSink(config.sink).close();
        log(`✓ ${config.sink.sqlite_path} ready`);
      } else {
        log('✓ Sink: supabase (tables are managed in the hosted project)');
      }
    } catch (err) {
      logError(`✗ ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  });

// === lastfm ===
program
  .command('lastfm')
  .description('Pull new Last.fm scrobbles (stops at the newest stored one)')
  .option('--dry-run', 'Fetch and filter only, write nothing', false)
  .action(async (opts: DryRunOpts) => {
    await syncCommand((config) => [createLastfmPlan(config)], opts);
  });

// === strava ===
program
  .command('strava')
  .description('Pull Strava activities and upsert them by activity id')
  .option('--dry-run', 'Fetch and filter only, write nothing', false)
  .action(async (opts: DryRunOpts) => {
    await syncCommand((config) => [createStravaPlan(config)], opts);
  });

// === goodreads ===
program
  .command('goodreads')
  .description('Load new books from a Goodreads library export CSV')
  .argument('[csvPath]', 'Export file (default: newest goodreads_library_*.csv in the data dir)')
  .option('--dry-run', 'Parse and filter only, write nothing', false)
  .action(async (csvPath: string | undefined, opts: DryRunOpts) => {
    await syncCommand((config) => [createGoodreadsCsvPlan(config, csvPath)], opts);
  });

// === goodreads-scrape ===
program
  .command('goodreads-scrape')
  .description('Scrape the Goodreads "read" shelf with your session cookie')
  .option('--max-pages <n>', 'Max shelf pages to fetch', positiveInt)
  .option('--dry-run', 'Scrape and filter only, write nothing', false)
  .action(async (opts: DryRunOpts & { maxPages?: number }) => {
    await syncCommand((config) => [createGoodreadsScrapePlan(config, { maxPages: opts.maxPages })], opts);
  });

// === letterboxd ===
program
  .command('letterboxd')
  .description('Load Letterboxd export CSVs (watched, watchlist, ratings, diary)')
  .argument('[dir]', 'Export directory (default: letterboxd.export_dir)')
  .option('--dry-run', 'Parse and filter only, write nothing', false)
  .action(async (dir: string | undefined, opts: DryRunOpts) => {
    await syncCommand((config) => createLetterboxdPlans(config, dir), opts);
  });

// === tmdb ===
program
  .command('tmdb')
  .description('Enrich Letterboxd films with TMDB details (resumes where it stopped)')
  .option('--dry-run', 'Look films up on TMDB but write nothing', false)
  .action(async (opts: DryRunOpts) => {
    await syncCommand((config, sink) => [createTmdbPlan(config, { sink })], opts);
  });

// === trakt ===
program
  .command('trakt')
  .description('Pull Trakt watch history and upsert it by history id')
  .option('--dry-run', 'Fetch and filter only, write nothing', false)
  .action(async (opts: DryRunOpts) => {
    await syncCommand((config) => [createTraktPlan(config)], opts);
  });

// === all ===
program
  .command('all')
  .description('Run every configured source in sequence')
  .option('--dry-run', 'Fetch and filter only, write nothing', false)
  .action(async (opts: DryRunOpts) => {
    await syncCommand((config, sink) => {
      const factories: Array<[string, () => SyncPlan[]]> = [
        ['lastfm', () => [createLastfmPlan(config)]],
        ['strava', () => [createStravaPlan(config)]],
        [
          'goodreads',
          () =>
            config.goodreads.session || config.goodreads.list_url
              ? [createGoodreadsScrapePlan(config)]
              : [createGoodreadsCsvPlan(config)],
        ],
        ['letterboxd', () => createLetterboxdPlans(config)],
        ['tmdb', () => [createTmdbPlan(config, { sink })]],
        ['trakt', () => [createTraktPlan(config)]],
      ];

      const plans: SyncPlan[] = [];
      for (const [name, build] of factories) {
        try {
          plans.push(...build());
        } catch (err) {
          if (!(err instanceof ConfigError)) throw err;
          logger.warn({ source: name, reason: err.message }, 'Source not configured, skipping');
          log(`- ${name}: skipped (${err.message})`);
        }
      }
      return plans;
    }, opts);
  });

program.parseAsync().catch((err: unknown) => {
  logError(`✗ ${errorMessage(err)}`);
  process.exitCode = 1;
});
