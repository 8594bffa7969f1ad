import { sleep as defaultSleep } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';

/**
 * Fetch one page (1-based). Throwing marks the page as failed.
 */
export type PageFetcher<R> = (page: number) => Promise<R[]>;

export type FetchOutcome = 'exhausted' | 'stopped' | 'page-limit' | 'failed';

export interface PaginatedFetcherOptions<R> {
  /** Pause before every page after the first. */
  delayMs?: number;
  /** A page with fewer items than this is the last one. */
  pageSize?: number;
  maxPages?: number;
  /** Called after a page is yielded; returning false ends the sequence. */
  shouldContinue?: (page: R[]) => boolean;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Lazy page sequence over a remote listing. Every `for await` starts again at
 * page 1. A failed page ends the sequence early instead of throwing; the
 * caller reads `outcome` and `error` once iteration finishes.
 */
export class PaginatedFetcher<R> implements AsyncIterable<R[]> {
  private _outcome: FetchOutcome | null = null;
  private _error: string | null = null;
  private _pagesFetched = 0;

  constructor(
    private readonly fetchPage: PageFetcher<R>,
    private readonly options: PaginatedFetcherOptions<R> = {},
  ) {}

  get outcome(): FetchOutcome | null {
    return this._outcome;
  }

  get error(): string | null {
    return this._error;
  }

  get pagesFetched(): number {
    return this._pagesFetched;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<R[]> {
    const { delayMs = 0, pageSize, maxPages, shouldContinue } = this.options;
    const sleep = this.options.sleep ?? defaultSleep;
    const log = this.options.logger ?? rootLogger;

    this._outcome = null;
    this._error = null;
    this._pagesFetched = 0;

    for (let page = 1; ; page++) {
      if (maxPages !== undefined && page > maxPages) {
        this._outcome = 'page-limit';
        return;
      }
      if (page > 1 && delayMs > 0) {
        await sleep(delayMs);
      }

      let items: R[];
      try {
        items = await this.fetchPage(page);
      } catch (err) {
        this._error = errorMessage(err);
        this._outcome = 'failed';
        log.error({ page, error: this._error }, 'Page fetch failed, ending fetch early');
        return;
      }

      this._pagesFetched++;
      if (items.length === 0) {
        this._outcome = 'exhausted';
        return;
      }

      log.debug({ page, count: items.length }, 'Page fetched');
      yield items;

      if (shouldContinue && !shouldContinue(items)) {
        this._outcome = 'stopped';
        return;
      }
      if (pageSize !== undefined && items.length < pageSize) {
        this._outcome = 'exhausted';
        return;
      }
    }
  }
}

/**
 * Serve an in-memory list (a CSV export, rows read from the sink) as a
 * single page, so it runs through the same pipeline as remote listings.
 */
export function singlePage<R>(load: () => Promise<R[]>): PageFetcher<R> {
  return async (page) => (page === 1 ? load() : []);
}
