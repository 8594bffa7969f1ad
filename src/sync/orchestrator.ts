import type { Row, Sink } from '../sink/sink.js';
import { errorMessage } from '../shared/errors.js';
import { generateId } from '../shared/utils.js';
import { failure, success, type Result } from '../shared/result.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';
import { PaginatedFetcher, type FetchOutcome, type PageFetcher } from './fetcher.js';
import { MIN_WATERMARK, cursorOf, getWatermark, takeNewer, type NewerSlice } from './watermark.js';
import { NaturalKeyDeduplicator, naturalKey } from './dedup.js';
import { UpsertReconciler, type PlannedWrite } from './upsert.js';
import { writeInBatches } from './writer.js';

/**
 * How a source tells new records from ones the sink already holds.
 *  - watermark: newest-first listing with a monotonic cursor column
 *  - natural-key: no stable id; composite of human-readable fields, first insert wins
 *  - external-id: id maintained by the source; the latest payload replaces the row
 */
export type Boundary =
  | { kind: 'watermark'; column: string }
  | { kind: 'natural-key'; fields: readonly string[] }
  | { kind: 'external-id'; key: readonly string[] };

export interface SyncPlan {
  source: string;
  table: string;
  boundary: Boundary;
  fetchPage: PageFetcher<Row>;
  batchSize: number;
  pageSize?: number;
  pageDelayMs?: number;
  maxPages?: number;
  /** Write new natural-key rows with an upsert on these columns instead of a plain insert. */
  upsertOn?: readonly string[];
  /** Per-record enrichment between FILTER and WRITE; a failure skips the record. */
  transform?: (row: Row) => Promise<Result<Row>>;
  /** Credential exchange and other fail-fast setup. */
  init?: () => Promise<void>;
}

export interface SyncDeps {
  sink: Sink;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface SyncOptions {
  dryRun?: boolean;
}

export type SyncStatus = 'ok' | 'partial' | 'unavailable' | 'dry-run';

export interface SyncReport {
  source: string;
  table: string;
  runId: string;
  status: SyncStatus;
  fetchOutcome: FetchOutcome;
  pages: number;
  fetched: number;
  /** Records that passed FILTER: new, or changed for external-id sources. */
  fresh: number;
  inserted: number;
  updated: number;
  unchanged: number;
  duplicates: number;
  transformFailed: number;
  writeFailed: number;
  skipped: number;
  caseVariants: number;
  bootstrapDegraded: boolean;
  watermarkBefore?: number;
  watermarkAfter?: number;
  errors: string[];
  durationMs: number;
}

type BoundaryState =
  | { kind: 'watermark'; column: string; watermark: number }
  | { kind: 'natural-key'; dedup: NaturalKeyDeduplicator }
  | { kind: 'external-id'; reconciler: UpsertReconciler };

async function bootstrap(plan: SyncPlan, sink: Sink, log: Logger): Promise<{ state: BoundaryState; degraded: boolean }> {
  const { boundary } = plan;
  switch (boundary.kind) {
    case 'watermark': {
      const watermark = await getWatermark(sink, plan.table, boundary.column, log);
      return { state: { kind: 'watermark', column: boundary.column, watermark }, degraded: false };
    }
    case 'natural-key': {
      const { dedup, degraded } = await NaturalKeyDeduplicator.fromSink(sink, plan.table, boundary.fields, log);
      return { state: { kind: 'natural-key', dedup }, degraded };
    }
    case 'external-id': {
      const { reconciler, degraded } = await UpsertReconciler.bootstrap(sink, plan.table, boundary.key, log);
      return { state: { kind: 'external-id', reconciler }, degraded };
    }
  }
}

function statusOf(report: SyncReport, dryRun: boolean): SyncStatus {
  if (report.fetchOutcome === 'failed' && report.fetched === 0) return 'unavailable';
  if (report.fetchOutcome === 'failed' || report.writeFailed > 0) return 'partial';
  return dryRun ? 'dry-run' : 'ok';
}

/**
 * One incremental sync run: INIT → BOOTSTRAP → FETCH → FILTER → WRITE → REPORT.
 * Only INIT may throw (missing or rejected credentials). Every later failure
 * shrinks the result and is recorded in the report, so a re-run picks up
 * from whatever the sink holds.
 */
export async function runSync(plan: SyncPlan, deps: SyncDeps, options: SyncOptions = {}): Promise<SyncReport> {
  const dryRun = options.dryRun ?? false;
  const runId = generateId(10);
  const log = (deps.logger ?? rootLogger).child({ source: plan.source, runId });
  const started = Date.now();

  // INIT
  if (plan.init) await plan.init();
  log.info({ table: plan.table, boundary: plan.boundary.kind, dryRun }, 'Sync started');

  const report: SyncReport = {
    source: plan.source,
    table: plan.table,
    runId,
    status: 'ok',
    fetchOutcome: 'exhausted',
    pages: 0,
    fetched: 0,
    fresh: 0,
    inserted: 0,
    updated: 0,
    unchanged: 0,
    duplicates: 0,
    transformFailed: 0,
    writeFailed: 0,
    skipped: 0,
    caseVariants: 0,
    bootstrapDegraded: false,
    errors: [],
    durationMs: 0,
  };

  // BOOTSTRAP
  const { state, degraded } = await bootstrap(plan, deps.sink, log);
  report.bootstrapDegraded = degraded;
  if (state.kind === 'watermark') {
    report.watermarkBefore = state.watermark;
    log.info({ watermark: state.watermark }, 'Current watermark');
  }

  // FETCH + FILTER
  let lastSlice: NewerSlice = { fresh: [], reachedBoundary: false };
  const fetcher = new PaginatedFetcher<Row>(plan.fetchPage, {
    delayMs: plan.pageDelayMs,
    pageSize: plan.pageSize,
    maxPages: plan.maxPages,
    sleep: deps.sleep,
    logger: log,
    shouldContinue:
      state.kind === 'watermark'
        ? () => lastSlice.fresh.length > 0 && !lastSlice.reachedBoundary
        : undefined,
  });

  const candidates: Row[] = [];
  for await (const page of fetcher) {
    report.fetched += page.length;
    switch (state.kind) {
      case 'watermark':
        lastSlice = takeNewer(page, state.column, state.watermark);
        candidates.push(...lastSlice.fresh);
        report.duplicates += page.length - lastSlice.fresh.length;
        break;
      case 'natural-key':
        for (const row of page) {
          if (state.dedup.admit(row)) candidates.push(row);
          else report.duplicates++;
        }
        break;
      case 'external-id':
        candidates.push(...page);
        break;
    }
  }
  report.pages = fetcher.pagesFetched;
  report.fetchOutcome = fetcher.outcome ?? 'exhausted';
  if (fetcher.error) report.errors.push(`fetch: ${fetcher.error}`);

  let pending: PlannedWrite[];
  if (state.kind === 'external-id') {
    const upsertPlan = state.reconciler.plan(candidates);
    report.unchanged = upsertPlan.unchanged;
    report.duplicates += upsertPlan.superseded;
    pending = upsertPlan.writes;
  } else {
    const keyFields = plan.upsertOn ?? [];
    pending = candidates.map((row) => ({ key: naturalKey(row, keyFields), row, action: 'insert' as const }));
  }
  if (state.kind === 'natural-key') {
    report.caseVariants = state.dedup.caseVariants;
    if (report.caseVariants > 0) {
      log.warn({ count: report.caseVariants }, 'New records differ from existing keys only by letter case');
    }
  }
  if (state.kind === 'watermark') {
    // Oldest first: rows persisted before an interruption must all sit below
    // the cursors still missing.
    const { column } = state;
    const at = (write: PlannedWrite): number => cursorOf(write.row, column) ?? MIN_WATERMARK;
    pending.sort((a, b) => at(a) - at(b));
  }
  report.fresh = pending.length;

  // TRANSFORM
  if (plan.transform) {
    const transform = plan.transform;
    const transformed: PlannedWrite[] = [];
    for (const write of pending) {
      const result = await transform(write.row).catch((err: unknown) => failure(errorMessage(err)));
      if (result.ok) {
        transformed.push({ ...write, row: result.data });
      } else {
        report.transformFailed++;
        log.info({ key: write.key, reason: result.reason }, 'Record skipped');
      }
    }
    pending = transformed;
  }

  // WRITE
  if (dryRun) {
    log.info({ pending: pending.length }, 'Dry run, nothing written');
  } else if (pending.length > 0) {
    if (state.kind === 'external-id' || plan.upsertOn) {
      const reconciler =
        state.kind === 'external-id'
          ? state.reconciler
          : new UpsertReconciler(deps.sink, plan.table, plan.upsertOn ?? [], [], log);
      const outcome = await reconciler.apply(pending, plan.batchSize);
      report.inserted = outcome.inserted;
      report.updated = outcome.updated;
      report.writeFailed = outcome.failed;
      report.errors.push(...outcome.errors.map((e) => `write: ${e}`));
    } else {
      const outcome = await writeInBatches(
        deps.sink,
        plan.table,
        pending.map((w) => w.row),
        plan.batchSize,
        log,
      );
      report.inserted = outcome.written;
      report.writeFailed = outcome.failed;
      report.errors.push(...outcome.errors.map((e) => `write: ${e}`));
    }
  }

  // REPORT
  if (state.kind === 'watermark') {
    const after = dryRun ? state.watermark : await getWatermark(deps.sink, plan.table, state.column, log);
    report.watermarkAfter = Math.max(state.watermark, after);
  }
  report.skipped = report.duplicates + report.unchanged + report.transformFailed;
  report.status = statusOf(report, dryRun);
  report.durationMs = Date.now() - started;

  log.info(
    {
      status: report.status,
      fetched: report.fetched,
      inserted: report.inserted,
      updated: report.updated,
      skipped: report.skipped,
      failed: report.writeFailed,
      durationMs: report.durationMs,
    },
    'Sync complete',
  );

  return report;
}

export interface SyncRunResult {
  source: string;
  result: Result<SyncReport>;
}

/**
 * Run several syncs one after another. A source that fails to start is
 * recorded and the next one still runs.
 */
export async function runSyncs(
  plans: readonly SyncPlan[],
  deps: SyncDeps,
  options: SyncOptions = {},
): Promise<SyncRunResult[]> {
  const results: SyncRunResult[] = [];
  for (const plan of plans) {
    try {
      results.push({ source: plan.source, result: success(await runSync(plan, deps, options)) });
    } catch (err) {
      const reason = errorMessage(err);
      (deps.logger ?? rootLogger).error({ source: plan.source, error: reason }, 'Sync aborted');
      results.push({ source: plan.source, result: failure(reason) });
    }
  }
  return results;
}
