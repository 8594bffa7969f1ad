import type { SyncReport, SyncRunResult } from '../sync/orchestrator.js';

const STATUS_MARK: Record<SyncReport['status'], string> = {
  ok: '✓',
  'dry-run': '○',
  partial: '!',
  unavailable: '✗',
};

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * One summary line per sync, e.g.
 * `✓ lastfm: ok | fetched 120, inserted 20, updated 0, skipped 100, failed 0 (1.2s)`
 */
export function formatReport(report: SyncReport): string {
  const counts = [
    `fetched ${report.fetched}`,
    `inserted ${report.inserted}`,
    `updated ${report.updated}`,
    `skipped ${report.skipped}`,
    `failed ${report.writeFailed}`,
  ];
  if (report.status === 'dry-run') counts.push(`would write ${report.fresh - report.transformFailed}`);
  if (report.caseVariants > 0) counts.push(`case variants ${report.caseVariants}`);

  let line = `${STATUS_MARK[report.status]} ${report.source}: ${report.status} | ${counts.join(', ')} (${seconds(report.durationMs)})`;
  if (report.watermarkAfter !== undefined && report.watermarkAfter !== report.watermarkBefore) {
    line += ` watermark ${report.watermarkBefore ?? 0} → ${report.watermarkAfter}`;
  }
  return line;
}

export function formatRunResult(run: SyncRunResult): string {
  return run.result.ok ? formatReport(run.result.data) : `✗ ${run.source}: aborted | ${run.result.reason}`;
}

/** Up to `limit` errors of a report, indented to sit under its summary line. */
export function reportErrors(report: SyncReport, limit = 3): string[] {
  return report.errors.slice(0, limit).map((e) => `    ${e}`);
}
