import { z } from 'zod';
import type { Config } from '../shared/config.js';
import { requireCredentials } from '../shared/config.js';
import { SourceError } from '../shared/errors.js';
import { getJson } from '../shared/http.js';
import { logger } from '../shared/logger.js';
import type { Row } from '../sink/sink.js';
import type { SyncPlan } from '../sync/orchestrator.js';

export const LASTFM_API_URL = 'https://ws.audioscrobbler.com/2.0/';

const ImageSchema = z.object({
  size: z.string().default(''),
  '#text': z.string().default(''),
});

const TrackSchema = z.object({
  name: z.string().default(''),
  url: z.string().default(''),
  mbid: z.string().default(''),
  loved: z.unknown().optional(),
  streamable: z.unknown().optional(),
  image: z.array(ImageSchema).default([]),
  artist: z
    .object({
      name: z.string().optional(),
      '#text': z.string().optional(),
      url: z.string().default(''),
      mbid: z.string().default(''),
      image: z.array(ImageSchema).default([]),
    })
    .default({}),
  album: z
    .object({
      '#text': z.string().default(''),
      mbid: z.string().default(''),
    })
    .default({}),
  date: z
    .object({
      uts: z.string().optional(),
      '#text': z.string().default(''),
    })
    .optional(),
});

export type LastfmTrack = z.infer<typeof TrackSchema>;

const RecentTracksResponseSchema = z.object({
  recenttracks: z.object({
    track: z.union([z.array(z.unknown()), z.record(z.unknown())]).default([]),
  }),
});

const ApiErrorSchema = z.object({ error: z.number(), message: z.string().default('') });

function imagesBySize(images: LastfmTrack['image']): Record<string, string> {
  return Object.fromEntries(images.map((img) => [img.size, img['#text']]));
}

function asText(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'object') return '';
  return String(value);
}

/**
 * Flatten a scrobble into a lastfm_listened_table row. Tracks still playing
 * carry no timestamp and map to null.
 */
export function trackToRow(track: LastfmTrack): Row | null {
  const uts = Number.parseInt(track.date?.uts ?? '', 10);
  if (!Number.isFinite(uts)) return null;

  const artistImages = imagesBySize(track.artist.image);
  const trackImages = imagesBySize(track.image);
  return {
    artist_name: track.artist.name || track.artist['#text'] || '',
    artist_url: track.artist.url,
    artist_mbid: track.artist.mbid,
    artist_image_small: artistImages['small'] ?? '',
    artist_image_medium: artistImages['medium'] ?? '',
    artist_image_large: artistImages['large'] ?? '',
    artist_image_extralarge: artistImages['extralarge'] ?? '',
    track_name: track.name,
    track_url: track.url,
    track_mbid: track.mbid,
    track_loved: asText(track.loved),
    track_streamable: asText(track.streamable),
    track_image_small: trackImages['small'] ?? '',
    track_image_medium: trackImages['medium'] ?? '',
    track_image_large: trackImages['large'] ?? '',
    track_image_extralarge: trackImages['extralarge'] ?? '',
    album_name: track.album['#text'],
    album_mbid: track.album.mbid,
    date_uts: uts,
    date_text: track.date?.['#text'] ?? '',
  };
}

/**
 * Parse one `user.getrecenttracks` response. Entries that do not look like
 * tracks are dropped; a response that is not a track listing at all throws.
 */
export function parseRecentTracks(body: unknown): LastfmTrack[] {
  const apiError = ApiErrorSchema.safeParse(body);
  if (apiError.success) {
    throw new SourceError(`Last.fm error ${apiError.data.error}: ${apiError.data.message}`, {
      code: apiError.data.error,
    });
  }

  const parsed = RecentTracksResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new SourceError('Unexpected Last.fm response shape', {
      issues: parsed.error.issues.slice(0, 3).map((i) => i.message),
    });
  }

  const raw = parsed.data.recenttracks.track;
  const entries = Array.isArray(raw) ? raw : [raw];
  const tracks: LastfmTrack[] = [];
  for (const entry of entries) {
    const track = TrackSchema.safeParse(entry);
    if (track.success) tracks.push(track.data);
  }
  return tracks;
}

export class LastfmClient {
  constructor(
    private readonly apiKey: string,
    private readonly username: string,
    private readonly timeoutMs: number = 15000,
    private readonly baseUrl: string = LASTFM_API_URL,
  ) {}

  /**
   * One page of recent scrobbles, newest first.
   */
  async getRecentTracksPage(page: number, limit: number): Promise<LastfmTrack[]> {
    logger.debug({ page, limit }, 'Requesting Last.fm recent tracks');
    const body = await getJson(this.baseUrl, {
      params: {
        method: 'user.getrecenttracks',
        user: this.username,
        api_key: this.apiKey,
        format: 'json',
        limit,
        page,
        extended: 1,
      },
      timeoutMs: this.timeoutMs,
    });
    return parseRecentTracks(body);
  }
}

export function createLastfmPlan(config: Config, client?: LastfmClient): SyncPlan {
  const lastfm = config.lastfm;
  requireCredentials('lastfm', lastfm, { api_key: 'LASTFM_API_KEY', username: 'LASTFM_USERNAME' });

  const api = client ?? new LastfmClient(lastfm.api_key, lastfm.username, config.http.timeout_ms);

  return {
    source: 'lastfm',
    table: lastfm.table,
    boundary: { kind: 'watermark', column: 'date_uts' },
    pageDelayMs: lastfm.page_delay_ms,
    batchSize: lastfm.batch_size,
    fetchPage: async (page) => {
      const tracks = await api.getRecentTracksPage(page, lastfm.page_size);
      const rows: Row[] = [];
      for (const track of tracks) {
        const row = trackToRow(track);
        if (row) rows.push(row);
      }
      return rows;
    },
  };
}
