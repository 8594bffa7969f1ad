import type { Row, Sink } from '../sink/sink.js';
import { attempt } from '../shared/result.js';
import { chunk } from '../shared/utils.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';

export interface BatchWriteOutcome {
  written: number;
  failed: number;
  failedBatches: number[];
  errors: string[];
}

/**
 * Insert rows in fixed-size batches, each committed on its own. A failed
 * batch is logged and the remaining batches still run.
 */
export async function writeInBatches(
  sink: Sink,
  table: string,
  rows: readonly Row[],
  batchSize: number,
  log: Logger = rootLogger,
): Promise<BatchWriteOutcome> {
  const outcome: BatchWriteOutcome = { written: 0, failed: 0, failedBatches: [], errors: [] };

  const batches = chunk(rows, batchSize);
  for (const [index, batch] of batches.entries()) {
    const result = await attempt(() => sink.insert(table, batch));
    if (result.ok) {
      outcome.written += batch.length;
      log.debug({ table, batch: index, size: batch.length }, 'Batch inserted');
    } else {
      outcome.failed += batch.length;
      outcome.failedBatches.push(index);
      outcome.errors.push(`batch ${index}: ${result.reason}`);
      log.error({ table, batch: index, size: batch.length, error: result.reason }, 'Batch insert failed');
    }
  }

  return outcome;
}
