import { z } from 'zod';
import type { Config } from '../shared/config.js';
import { requireCredentials } from '../shared/config.js';
import { AuthError, SourceError } from '../shared/errors.js';
import { getJson, postForm } from '../shared/http.js';
import { logger } from '../shared/logger.js';
import type { Row } from '../sink/sink.js';
import type { SyncPlan } from '../sync/orchestrator.js';

export const STRAVA_TOKEN_URL = 'https://www.strava.com/oauth/token';
export const STRAVA_API_BASE = 'https://www.strava.com/api/v3';

const ActivitySchema = z.object({ id: z.number() }).passthrough();

export type StravaActivity = z.infer<typeof ActivitySchema>;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  expires_at: z.number().optional(),
});

/** Activity summary fields copied as-is into worldly_strava. */
const SUMMARY_FIELDS = [
  'name',
  'type',
  'sport_type',
  'start_date',
  'start_date_local',
  'timezone',
  'utc_offset',
  'distance',
  'moving_time',
  'elapsed_time',
  'total_elevation_gain',
  'elev_high',
  'elev_low',
  'average_speed',
  'max_speed',
  'average_cadence',
  'average_watts',
  'weighted_average_watts',
  'average_temp',
  'kudos_count',
  'comment_count',
  'achievement_count',
  'pr_count',
  'athlete_count',
  'photo_count',
  'total_photo_count',
  'trainer',
  'commute',
  'manual',
  'private',
  'flagged',
  'gear_id',
  'workout_type',
  'external_id',
  'upload_id',
  'from_accepted_tag',
  'has_heartrate',
  'max_heartrate',
  'has_kudoed',
  'suffer_score',
  'calories',
  'description',
  'device_name',
] as const;

export function latlngToString(value: unknown): string | null {
  if (!Array.isArray(value) || value.length < 2) return null;
  return `${String(value[0])},${String(value[1])}`;
}

export function activityToRow(activity: StravaActivity): Row {
  const row: Row = { strava_id: activity.id };
  for (const field of SUMMARY_FIELDS) {
    row[field] = activity[field] ?? null;
  }
  row['start_latlng'] = latlngToString(activity['start_latlng']);
  row['end_latlng'] = latlngToString(activity['end_latlng']);

  const athlete = z.object({ id: z.number() }).safeParse(activity['athlete']);
  row['athlete_id'] = athlete.success ? athlete.data.id : null;
  row['raw_json'] = { ...activity };
  return row;
}

export interface StravaCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

function statusOf(err: unknown): number | undefined {
  if (!(err instanceof SourceError)) return undefined;
  const status = err.details?.['status'];
  return typeof status === 'number' ? status : undefined;
}

export class StravaClient {
  private accessToken: string | null = null;
  private _rotatedRefreshToken: string | null = null;

  constructor(
    private readonly credentials: StravaCredentials,
    private readonly timeoutMs: number = 15000,
    private readonly apiBase: string = STRAVA_API_BASE,
    private readonly tokenUrl: string = STRAVA_TOKEN_URL,
  ) {}

  /** Set when Strava answered the refresh with a different refresh token. */
  get rotatedRefreshToken(): string | null {
    return this._rotatedRefreshToken;
  }

  /**
   * Exchange the refresh token for an access token and check it against
   * `/athlete`. Any rejection is an AuthError: the run cannot proceed.
   */
  async authorize(): Promise<void> {
    let body: unknown;
    try {
      body = await postForm(
        this.tokenUrl,
        {
          client_id: this.credentials.clientId,
          client_secret: this.credentials.clientSecret,
          refresh_token: this.credentials.refreshToken,
          grant_type: 'refresh_token',
        },
        { timeoutMs: this.timeoutMs },
      );
    } catch (err) {
      const length = this.credentials.refreshToken.length;
      const hint =
        length < 60
          ? ` STRAVA_REFRESH_TOKEN is ${length} characters; refresh tokens are usually 80+, so this may be an access token.`
          : ' Re-run the OAuth flow to get a new refresh token.';
      throw new AuthError(`Strava token refresh failed: ${err instanceof Error ? err.message : String(err)}.${hint}`, {
        status: statusOf(err),
      });
    }

    const token = TokenResponseSchema.safeParse(body);
    if (!token.success) {
      throw new AuthError('Strava token response missing access_token');
    }

    try {
      await getJson(`${this.apiBase}/athlete`, {
        headers: { Authorization: `Bearer ${token.data.access_token}` },
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      if (statusOf(err) === 401) {
        throw new AuthError(
          'Strava rejected the access token; the refresh token may have expired or been revoked. Re-authorize with scope activity:read_all.',
        );
      }
      throw new AuthError(`Unexpected response from Strava: ${err instanceof Error ? err.message : String(err)}`, {
        status: statusOf(err),
      });
    }

    this.accessToken = token.data.access_token;
    const refreshed = token.data.refresh_token;
    if (refreshed && refreshed !== this.credentials.refreshToken) {
      this._rotatedRefreshToken = refreshed;
      logger.warn('Strava issued a new refresh token. Update STRAVA_REFRESH_TOKEN before the next run.');
    }
  }

  async getActivitiesPage(page: number, perPage: number): Promise<StravaActivity[]> {
    if (!this.accessToken) {
      throw new SourceError('Strava client used before authorize()');
    }

    let body: unknown;
    try {
      body = await getJson(`${this.apiBase}/athlete/activities`, {
        params: { page, per_page: perPage },
        headers: { Authorization: `Bearer ${this.accessToken}` },
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      if (statusOf(err) === 401) {
        throw new SourceError('Unauthorized on activities; the token may lack the activity:read_all scope', {
          status: 401,
        });
      }
      throw err;
    }

    const list = z.array(z.unknown()).safeParse(body);
    if (!list.success) {
      throw new SourceError('Unexpected Strava activities response shape');
    }
    const activities: StravaActivity[] = [];
    for (const entry of list.data) {
      const activity = ActivitySchema.safeParse(entry);
      if (activity.success) activities.push(activity.data);
    }
    return activities;
  }
}

export function createStravaPlan(config: Config, client?: StravaClient): SyncPlan {
  const strava = config.strava;
  requireCredentials('strava', strava, {
    client_id: 'STRAVA_CLIENT_ID',
    client_secret: 'STRAVA_CLIENT_SECRET',
    refresh_token: 'STRAVA_REFRESH_TOKEN',
  });

  const api =
    client ??
    new StravaClient(
      {
        clientId: strava.client_id,
        clientSecret: strava.client_secret,
        refreshToken: strava.refresh_token,
      },
      config.http.timeout_ms,
    );

  return {
    source: 'strava',
    table: strava.table,
    boundary: { kind: 'external-id', key: ['strava_id'] },
    pageSize: strava.page_size,
    pageDelayMs: strava.page_delay_ms,
    batchSize: strava.batch_size,
    init: () => api.authorize(),
    fetchPage: async (page) => {
      const activities = await api.getActivitiesPage(page, strava.page_size);
      return activities.map(activityToRow);
    },
  };
}
