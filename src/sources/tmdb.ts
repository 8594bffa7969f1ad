import { z } from 'zod';
import type { Config } from '../shared/config.js';
import { requireCredentials } from '../shared/config.js';
import { SourceError } from '../shared/errors.js';
import { getJson } from '../shared/http.js';
import { logger } from '../shared/logger.js';
import { failure, success, type Result } from '../shared/result.js';
import { sleep as defaultSleep } from '../shared/utils.js';
import type { Row, Sink } from '../sink/sink.js';
import { normalizeKeyPart } from '../sync/dedup.js';
import { singlePage } from '../sync/fetcher.js';
import type { SyncPlan } from '../sync/orchestrator.js';

export const TMDB_API_BASE = 'https://api.themoviedb.org/3';
export const TMDB_IMAGE_BASE = 'https://image.tmdb.org/t/p';

/** Letterboxd tables whose films get enriched. */
export const FILM_TABLES = ['letterboxd_watched', 'letterboxd_watchlist'] as const;

const SearchResponseSchema = z.object({
  results: z.array(z.object({ id: z.number() }).passthrough()).default([]),
});

const NamedSchema = z.object({ name: z.string().nullish() });

const MovieDetailsSchema = z.object({
  id: z.number(),
  runtime: z.number().nullish(),
  genres: z.array(NamedSchema).default([]),
  credits: z
    .object({
      crew: z.array(z.object({ job: z.string().nullish(), name: z.string().nullish() })).default([]),
    })
    .default({}),
  overview: z.string().nullish(),
  poster_path: z.string().nullish(),
  backdrop_path: z.string().nullish(),
  release_date: z.string().nullish(),
  tagline: z.string().nullish(),
  vote_average: z.number().nullish(),
  vote_count: z.number().nullish(),
  production_countries: z.array(NamedSchema).default([]),
  spoken_languages: z
    .array(z.object({ english_name: z.string().nullish(), name: z.string().nullish() }))
    .default([]),
});

export type MovieDetails = z.infer<typeof MovieDetailsSchema>;

function trimmed(value: string | null | undefined): string | null {
  const s = (value ?? '').trim();
  return s || null;
}

function names(items: ReadonlyArray<{ name?: string | null }>): string[] | null {
  const out = items.map((i) => trimmed(i.name)).filter((n): n is string => n !== null);
  return out.length > 0 ? out : null;
}

function imageUrl(size: string, filePath: string | null | undefined): string | null {
  const p = trimmed(filePath);
  return p ? `${TMDB_IMAGE_BASE}/${size}${p}` : null;
}

/**
 * Enrichment columns for one film (everything except its name/year key).
 */
export function detailsToEnrichment(details: MovieDetails): Row {
  const director = details.credits.crew.find((p) => (p.job ?? '').trim().toLowerCase() === 'director');
  const languages = details.spoken_languages.slice(0, 3);
  return {
    tmdb_id: details.id,
    runtime_minutes: details.runtime || null,
    genres: names(details.genres),
    director: trimmed(director?.name),
    overview: trimmed(details.overview),
    poster_path: imageUrl('w500', details.poster_path),
    backdrop_path: imageUrl('w780', details.backdrop_path),
    release_date: trimmed(details.release_date),
    tagline: trimmed(details.tagline),
    vote_average: details.vote_average ?? null,
    vote_count: details.vote_count ?? null,
    production_countries: names(details.production_countries),
    spoken_languages: languages.length > 0 ? languages.map((l) => l.english_name || l.name || '').join(', ') : null,
  };
}

export class TmdbClient {
  constructor(
    private readonly apiKey: string,
    private readonly timeoutMs: number = 15000,
    private readonly baseUrl: string = TMDB_API_BASE,
  ) {}

  /** TMDB id of the first search hit, or null. */
  async searchMovie(name: string, year: string): Promise<number | null> {
    const body = await getJson(`${this.baseUrl}/search/movie`, {
      params: { api_key: this.apiKey, query: name, language: 'en-US', year: year || undefined },
      timeoutMs: this.timeoutMs,
    });
    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceError('Unexpected TMDB search response shape');
    }
    return parsed.data.results[0]?.id ?? null;
  }

  async movieDetails(tmdbId: number): Promise<MovieDetails> {
    const body = await getJson(`${this.baseUrl}/movie/${tmdbId}`, {
      params: { api_key: this.apiKey, language: 'en-US', append_to_response: 'credits' },
      timeoutMs: this.timeoutMs,
    });
    const parsed = MovieDetailsSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceError(`Unexpected TMDB details response for ${tmdbId}`);
    }
    return parsed.data;
  }
}

/**
 * Distinct (name, year) pairs across the Letterboxd film tables; rows
 * without a name are dropped.
 */
export async function loadFilmCandidates(sink: Sink): Promise<Row[]> {
  const seen = new Set<string>();
  const films: Row[] = [];
  for (const table of FILM_TABLES) {
    const rows = await sink.select(table, ['name', 'year']);
    for (const row of rows) {
      const name = normalizeKeyPart(row['name']);
      const year = normalizeKeyPart(row['year']);
      if (!name) continue;
      const key = JSON.stringify([name, year]);
      if (seen.has(key)) continue;
      seen.add(key);
      films.push({ name, year });
    }
  }
  return films;
}

export interface TmdbPlanDeps {
  sink: Sink;
  client?: TmdbClient;
  sleep?: (ms: number) => Promise<void>;
}

export function createTmdbPlan(config: Config, deps: TmdbPlanDeps): SyncPlan {
  const tmdb = config.tmdb;
  requireCredentials('tmdb', tmdb, { api_key: 'TMDB_API_KEY' });

  const client = deps.client ?? new TmdbClient(tmdb.api_key, config.http.timeout_ms);
  const sleep = deps.sleep ?? defaultSleep;
  const pause = (): Promise<void> => sleep(tmdb.request_delay_ms);

  const enrich = async (film: Row): Promise<Result<Row>> => {
    const name = normalizeKeyPart(film['name']);
    const year = normalizeKeyPart(film['year']);

    let tmdbId: number | null;
    try {
      tmdbId = await client.searchMovie(name, year);
    } finally {
      await pause();
    }
    if (tmdbId === null) {
      return failure(`No TMDB match for ${name} (${year || 'no year'})`);
    }

    let details: MovieDetails;
    try {
      details = await client.movieDetails(tmdbId);
    } finally {
      await pause();
    }
    const row: Row = { name, year, ...detailsToEnrichment(details) };
    logger.debug({ name, year, tmdbId, director: row.director }, 'Film enriched');
    return success(row);
  };

  return {
    source: 'tmdb',
    table: tmdb.table,
    boundary: { kind: 'natural-key', fields: ['name', 'year'] },
    upsertOn: ['name', 'year'],
    batchSize: tmdb.batch_size,
    fetchPage: singlePage(() => loadFilmCandidates(deps.sink)),
    transform: enrich,
  };
}
