import { z } from 'zod';
import type { Config } from '../shared/config.js';
import { requireCredentials } from '../shared/config.js';
import { SourceError } from '../shared/errors.js';
import { getJson } from '../shared/http.js';
import { logger } from '../shared/logger.js';
import type { Row } from '../sink/sink.js';
import type { SyncPlan } from '../sync/orchestrator.js';

export const TRAKT_API_URL = 'https://api.trakt.tv';

const IdsSchema = z
  .object({
    trakt: z.number().nullish(),
    tmdb: z.number().nullish(),
    imdb: z.string().nullish(),
  })
  .passthrough()
  .default({});

const MediaSchema = z
  .object({
    title: z.string().nullish(),
    year: z.number().nullish(),
    ids: IdsSchema,
  })
  .passthrough();

const EpisodeSchema = z
  .object({
    season: z.number().nullish(),
    number: z.number().nullish(),
    title: z.string().nullish(),
    ids: IdsSchema,
  })
  .passthrough();

const HistoryItemSchema = z
  .object({
    id: z.number(),
    watched_at: z.string().nullish(),
    action: z.string().nullish(),
    type: z.string().nullish(),
    movie: MediaSchema.optional(),
    show: MediaSchema.optional(),
    episode: EpisodeSchema.optional(),
  })
  .passthrough();

export type TraktHistoryItem = z.infer<typeof HistoryItemSchema>;
type TraktIds = z.infer<typeof IdsSchema>;

/**
 * Movies carry their own title/ids; episodes take the show's title and year
 * and their own ids.
 */
export function historyToRow(item: TraktHistoryItem): Row {
  const isEpisode = item.type === 'episode';
  const ids: TraktIds = (isEpisode ? item.episode?.ids : item.movie?.ids) ?? {};

  return {
    history_id: item.id,
    watched_at: item.watched_at ?? null,
    action: item.action ?? null,
    type: item.type ?? null,
    title: isEpisode ? (item.show?.title ?? null) : (item.movie?.title ?? null),
    year: isEpisode ? (item.show?.year ?? null) : (item.movie?.year ?? null),
    show_title: item.show?.title ?? null,
    season: item.episode?.season ?? null,
    episode_number: item.episode?.number ?? null,
    episode_title: item.episode?.title ?? null,
    trakt_id: ids.trakt ?? null,
    tmdb_id: ids.tmdb ?? null,
    imdb_id: ids.imdb ?? null,
    raw_json: { ...item },
  };
}

export class TraktClient {
  constructor(
    private readonly clientId: string,
    private readonly accessToken: string,
    private readonly timeoutMs: number = 15000,
    private readonly baseUrl: string = TRAKT_API_URL,
  ) {}

  async getHistoryPage(username: string, page: number, limit: number): Promise<TraktHistoryItem[]> {
    logger.debug({ page, limit }, 'Requesting Trakt history');
    const body = await getJson(`${this.baseUrl}/users/${encodeURIComponent(username)}/history`, {
      params: { page, limit },
      headers: {
        'Content-Type': 'application/json',
        'trakt-api-version': '2',
        'trakt-api-key': this.clientId,
        Authorization: `Bearer ${this.accessToken}`,
      },
      timeoutMs: this.timeoutMs,
    });

    const list = z.array(z.unknown()).safeParse(body);
    if (!list.success) {
      throw new SourceError('Unexpected Trakt history response shape');
    }
    const items: TraktHistoryItem[] = [];
    for (const entry of list.data) {
      const item = HistoryItemSchema.safeParse(entry);
      if (item.success) items.push(item.data);
    }
    return items;
  }
}

export function createTraktPlan(config: Config, client?: TraktClient): SyncPlan {
  const trakt = config.trakt;
  requireCredentials('trakt', trakt, { client_id: 'TRAKT_CLIENT_ID', access_token: 'TRAKT_ACCESS_TOKEN' });

  const api = client ?? new TraktClient(trakt.client_id, trakt.access_token, config.http.timeout_ms);

  return {
    source: 'trakt',
    table: trakt.table,
    boundary: { kind: 'external-id', key: ['history_id'] },
    pageSize: trakt.page_size,
    pageDelayMs: trakt.page_delay_ms,
    batchSize: trakt.batch_size,
    fetchPage: async (page) => {
      const items = await api.getHistoryPage(trakt.username, page, trakt.page_size);
      return items.map(historyToRow);
    },
  };
}
