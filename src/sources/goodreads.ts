import fs from 'node:fs';
import path from 'node:path';
import { JSDOM } from 'jsdom';
import type { Config } from '../shared/config.js';
import { requireCredentials } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import { buildUrl, getText } from '../shared/http.js';
import { logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';
import type { Row } from '../sink/sink.js';
import { singlePage } from '../sync/fetcher.js';
import type { SyncPlan } from '../sync/orchestrator.js';
import { readCsvFile, type CsvRecord } from './csv.js';

export const BOOK_KEY = ['title', 'author'] as const;

const EXPORT_PATTERN = /^goodreads_library_.*\.csv$/;

// Shelf pages are served only to browser-like clients.
const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/** Export headers (snake_cased) that map onto a differently named column. */
const CSV_ALIASES: Record<string, string> = {
  my_rating: 'rating',
  number_of_pages: 'pages',
  binding: 'format',
};

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

function isoDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

function monthOf(name: string): number | undefined {
  return MONTHS[name.slice(0, 3).toLowerCase()];
}

/**
 * Goodreads dates come as "2023/11/18" (CSV), "Dec 09, 2025" or
 * "18 Nov, 2023" (shelf pages). Anything else, "not set" included, is null.
 */
export function parseBookDate(raw: string | null | undefined): string | null {
  const value = (raw ?? '').trim();
  if (!value) return null;

  let m = /^(\d{4})[/-](\d{1,2})[/-](\d{1,2})$/.exec(value);
  if (m) return isoDate(Number(m[1]), Number(m[2]), Number(m[3]));

  m = /^([A-Za-z]{3,9})\.? (\d{1,2}),? (\d{4})$/.exec(value);
  if (m) {
    const month = monthOf(m[1] ?? '');
    return month ? isoDate(Number(m[3]), month, Number(m[2])) : null;
  }

  m = /^(\d{1,2}) ([A-Za-z]{3,9})\.?,? (\d{4})$/.exec(value);
  if (m) {
    const month = monthOf(m[2] ?? '');
    return month ? isoDate(Number(m[3]), month, Number(m[1])) : null;
  }
  return null;
}

export function parseRating(raw: string | null | undefined): number | null {
  const value = (raw ?? '').trim();
  if (!value) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/** Digits only; "unknown", "—" and 0 are null. */
export function parsePages(raw: string | null | undefined): number | null {
  const digits = (raw ?? '').replace(/\D/g, '');
  const n = digits ? Number.parseInt(digits, 10) : 0;
  return n > 0 ? n : null;
}

/** Exports wrap ISBNs as ="0345391802" to keep spreadsheet apps from eating leading zeros. */
export function cleanIsbn(raw: string | null | undefined): string | null {
  const value = (raw ?? '')
    .trim()
    .replace(/^="?/, '')
    .replace(/"$/, '')
    .trim();
  return value || null;
}

function textOrNull(raw: string | undefined): string | null {
  const value = (raw ?? '').trim();
  return value || null;
}

/**
 * One export line → worldly_good_reads_books row, or null without a title.
 */
export function csvRecordToBook(record: CsvRecord): Row | null {
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    const column = CSV_ALIASES[key] ?? key;
    if (!(column in fields) || !fields[column]) fields[column] = value;
  }

  const title = textOrNull(fields['title']);
  if (!title) return null;
  return {
    title,
    author: textOrNull(fields['author']),
    rating: parseRating(fields['rating']),
    date_read: parseBookDate(fields['date_read']),
    date_added: parseBookDate(fields['date_added']),
    isbn: cleanIsbn(fields['isbn']),
    pages: parsePages(fields['pages']),
    format: textOrNull(fields['format']),
  };
}

export function readGoodreadsExport(filePath: string): Row[] {
  const books: Row[] = [];
  for (const record of readCsvFile(filePath)) {
    const book = csvRecordToBook(record);
    if (book) books.push(book);
  }
  return books;
}

/**
 * Most recently modified goodreads_library_*.csv in `dataDir`.
 */
export function findLatestExport(dataDir: string): string | null {
  if (!fs.existsSync(dataDir)) return null;
  let latest: { file: string; mtime: number } | null = null;
  for (const name of fs.readdirSync(dataDir)) {
    if (!EXPORT_PATTERN.test(name)) continue;
    const file = path.join(dataDir, name);
    const mtime = fs.statSync(file).mtimeMs;
    if (!latest || mtime > latest.mtime) latest = { file, mtime };
  }
  return latest?.file ?? null;
}

export function resolveExportPath(config: Config, csvPath?: string): string {
  if (csvPath) {
    const file = resolvePath(csvPath);
    if (!fs.existsSync(file)) {
      throw new ConfigError(`Goodreads export not found: ${file}`, { path: file });
    }
    return file;
  }

  const dataDir = resolvePath(config.goodreads.data_dir);
  const latest = findLatestExport(dataDir);
  if (!latest) {
    throw new ConfigError(
      `No goodreads_library_*.csv in ${dataDir}. Export your library from Goodreads and save it there, or pass the file path.`,
      { dataDir },
    );
  }
  return latest;
}

export function createGoodreadsCsvPlan(config: Config, csvPath?: string): SyncPlan {
  const goodreads = config.goodreads;
  const file = resolveExportPath(config, csvPath);
  logger.info({ file }, 'Using Goodreads export');

  return {
    source: 'goodreads',
    table: goodreads.table,
    boundary: { kind: 'natural-key', fields: BOOK_KEY },
    batchSize: goodreads.batch_size,
    fetchPage: singlePage(async () => readGoodreadsExport(file)),
  };
}

// --- Shelf scrape ---

function textOf(root: Element, selector: string): string {
  const found = root.querySelector(selector);
  return (found?.textContent ?? '').split(/\s+/).filter(Boolean).join(' ');
}

/** Goodreads keeps one date per re-read; the latest one wins. */
function latestReadDate(row: Element): string | null {
  const container = row.querySelector('.date_read');
  if (!container) return null;
  let latest: string | null = null;
  for (const span of Array.from(container.querySelectorAll('span'))) {
    const date = parseBookDate(span.textContent);
    if (date && (!latest || date > latest)) latest = date;
  }
  return latest;
}

/**
 * Books on one "review/list" shelf page.
 */
export function parseShelfPage(html: string): Row[] {
  const doc = new JSDOM(html).window.document;
  const books: Row[] = [];
  for (const tr of Array.from(doc.querySelectorAll('tr.bookalike'))) {
    const title = textOf(tr, '.title .value');
    if (!title) continue;

    const stars = tr.querySelector('.rating .stars')?.getAttribute('data-rating');
    books.push({
      title,
      author: textOf(tr, '.author .value').replace(/[ *]+$/, ''),
      rating: parseRating(stars),
      date_read: latestReadDate(tr),
      pages: parsePages(textOf(tr, '.num_pages')),
    });
  }
  return books;
}

/** "a=1; b=2" with stray whitespace and empty parts removed. */
export function normalizeCookie(session: string): string {
  return session
    .split(';')
    .map((part) => part.trim())
    .filter((part) => part.includes('='))
    .join('; ');
}

export class GoodreadsShelfClient {
  constructor(
    private readonly listUrl: string,
    private readonly session: string,
    private readonly timeoutMs: number = 15000,
  ) {}

  pageUrl(page: number, perPage: number): string {
    return buildUrl(this.listUrl, { page, per_page: perPage });
  }

  async getShelfPage(page: number, perPage: number): Promise<Row[]> {
    logger.debug({ page }, 'Fetching Goodreads shelf page');
    const html = await getText(this.pageUrl(page, perPage), {
      headers: {
        'User-Agent': BROWSER_USER_AGENT,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
        Cookie: normalizeCookie(this.session),
      },
      timeoutMs: this.timeoutMs,
    });
    return parseShelfPage(html);
  }
}

export interface GoodreadsScrapeOptions {
  maxPages?: number;
  client?: GoodreadsShelfClient;
}

export function createGoodreadsScrapePlan(config: Config, options: GoodreadsScrapeOptions = {}): SyncPlan {
  const goodreads = config.goodreads;
  requireCredentials('goodreads', goodreads, { session: 'GOODREADS_SESSION', list_url: 'GOODREADS_LIST_URL' });

  const client =
    options.client ?? new GoodreadsShelfClient(goodreads.list_url, goodreads.session, config.http.timeout_ms);

  return {
    source: 'goodreads-scrape',
    table: goodreads.table,
    boundary: { kind: 'natural-key', fields: BOOK_KEY },
    pageSize: goodreads.page_size,
    pageDelayMs: goodreads.page_delay_ms,
    maxPages: options.maxPages ?? goodreads.max_pages,
    batchSize: goodreads.batch_size,
    fetchPage: (page) => client.getShelfPage(page, goodreads.page_size),
  };
}
