import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConfigSchema } from '../../shared/config.js';
import { AuthError, SourceError } from '../../shared/errors.js';
import { runSync } from '../../sync/orchestrator.js';
import { memorySink } from '../../sync/__tests__/fakes.js';
import { StravaClient, activityToRow, createStravaPlan, latlngToString, type StravaActivity } from '../strava.js';

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
  vi.restoreAllMocks();
});

const REFRESH_TOKEN = 'r'.repeat(80);

const credentials = { clientId: '1234', clientSecret: 'test-secret', refreshToken: REFRESH_TOKEN };

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function activity(id: number, overrides: Record<string, unknown> = {}): StravaActivity {
  return {
    id,
    name: `Run ${id}`,
    type: 'Run',
    distance: 5000.5,
    trainer: false,
    start_latlng: [51.5, -0.12],
    end_latlng: [],
    athlete: { id: 7, resource_state: 1 },
    kudos_count: 2,
    ...overrides,
  };
}

/** Routes Strava endpoints to canned responses. */
function stravaApi(pages: unknown[][], token: Record<string, unknown> = {}) {
  return vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const url = new URL(String(input));
    if (url.pathname === '/oauth/token') {
      return json({ access_token: 'test-access', refresh_token: REFRESH_TOKEN, expires_at: 1, ...token });
    }
    if (url.pathname === '/api/v3/athlete') return json({ id: 7 });
    if (url.pathname === '/api/v3/athlete/activities') {
      const page = Number(url.searchParams.get('page'));
      return json(pages[page - 1] ?? []);
    }
    return json({ message: 'Not Found' }, 404);
  });
}

describe('activityToRow', () => {
  it('copies summary fields and flattens coordinates and athlete', () => {
    const row = activityToRow(activity(99));

    expect(row['strava_id']).toBe(99);
    expect(row['name']).toBe('Run 99');
    expect(row['distance']).toBe(5000.5);
    expect(row['trainer']).toBe(false);
    expect(row['calories']).toBeNull();
    expect(row['start_latlng']).toBe('51.5,-0.12');
    expect(row['end_latlng']).toBeNull();
    expect(row['athlete_id']).toBe(7);
    expect(row['raw_json']).toEqual(activity(99));
  });

  it('latlngToString rejects anything but a pair', () => {
    expect(latlngToString([1, 2])).toBe('1,2');
    expect(latlngToString([1])).toBeNull();
    expect(latlngToString('1,2')).toBeNull();
  });
});

describe('StravaClient', () => {
  it('posts the refresh grant and verifies the token', async () => {
    const fetchMock = stravaApi([]);
    globalThis.fetch = fetchMock;

    const client = new StravaClient(credentials);
    await client.authorize();

    const [tokenUrl, tokenInit] = fetchMock.mock.calls[0] ?? [];
    expect(String(tokenUrl)).toBe('https://www.strava.com/oauth/token');
    expect(tokenInit?.method).toBe('POST');
    expect(tokenInit?.body).toBe(
      `client_id=1234&client_secret=test-secret&refresh_token=${REFRESH_TOKEN}&grant_type=refresh_token`,
    );
    const [athleteUrl, athleteInit] = fetchMock.mock.calls[1] ?? [];
    expect(String(athleteUrl)).toBe('https://www.strava.com/api/v3/athlete');
    expect(athleteInit?.headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-access' });
    expect(client.rotatedRefreshToken).toBeNull();
  });

  it('exposes a rotated refresh token', async () => {
    globalThis.fetch = stravaApi([], { refresh_token: 'n'.repeat(80) });
    const client = new StravaClient(credentials);
    await client.authorize();
    expect(client.rotatedRefreshToken).toBe('n'.repeat(80));
  });

  it('hints at a pasted access token when the refresh is rejected', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(json({ message: 'Bad Request' }, 400));
    const client = new StravaClient({ ...credentials, refreshToken: 'short-token' });

    const call = client.authorize();
    await expect(call).rejects.toBeInstanceOf(AuthError);
    await expect(call).rejects.toThrow(
      'Strava token refresh failed: HTTP 400 from www.strava.com. STRAVA_REFRESH_TOKEN is 11 characters; refresh tokens are usually 80+, so this may be an access token.',
    );
  });

  it('fails authorization when /athlete answers 401', async () => {
    globalThis.fetch = vi.fn(async (input: string | URL | Request) =>
      String(input).endsWith('/oauth/token') ? json({ access_token: 'test-access' }) : json({}, 401),
    );

    await expect(new StravaClient(credentials).authorize()).rejects.toThrow(
      'Strava rejected the access token; the refresh token may have expired or been revoked. Re-authorize with scope activity:read_all.',
    );
  });

  it('refuses to list activities before authorize', async () => {
    await expect(new StravaClient(credentials).getActivitiesPage(1, 10)).rejects.toThrow(
      new SourceError('Strava client used before authorize()'),
    );
  });

  it('sends the bearer token and drops entries without an id', async () => {
    const fetchMock = stravaApi([[activity(1), { name: 'no id' }]]);
    globalThis.fetch = fetchMock;
    const client = new StravaClient(credentials);
    await client.authorize();

    const activities = await client.getActivitiesPage(1, 30);

    expect(activities.map((a) => a.id)).toEqual([1]);
    const [url, init] = fetchMock.mock.calls[2] ?? [];
    expect(String(url)).toBe('https://www.strava.com/api/v3/athlete/activities?page=1&per_page=30');
    expect(init?.headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-access' });
  });
});

describe('createStravaPlan', () => {
  const config = ConfigSchema.parse({
    strava: { client_id: '1234', client_secret: 'test-secret', refresh_token: REFRESH_TOKEN, page_size: 2, page_delay_ms: 0 },
  });

  it('inserts new activities, then updates only changed ones', async () => {
    const { db, sink } = memorySink();

    globalThis.fetch = stravaApi([[activity(1), activity(2)], [activity(3)]]);
    const first = await runSync(createStravaPlan(config), { sink });
    expect(first.inserted).toBe(3);
    expect(first.pages).toBe(2);

    globalThis.fetch = stravaApi([[activity(1), activity(2, { kudos_count: 9 })], [activity(3)]]);
    const second = await runSync(createStravaPlan(config), { sink });
    expect(second.inserted).toBe(0);
    expect(second.updated).toBe(1);
    expect(second.unchanged).toBe(2);

    const stored = await sink.select('worldly_strava', ['strava_id', 'kudos_count'], { orderBy: { column: 'strava_id' } });
    expect(stored).toEqual([
      { strava_id: 1, kudos_count: 2 },
      { strava_id: 2, kudos_count: 9 },
      { strava_id: 3, kudos_count: 2 },
    ]);
    db.close();
  });

  it('aborts before fetching when authorization fails', async () => {
    const { db, sink } = memorySink();
    const fetchMock = vi.fn().mockResolvedValue(json({ message: 'Authorization Error' }, 401));
    globalThis.fetch = fetchMock;

    await expect(runSync(createStravaPlan(config), { sink })).rejects.toBeInstanceOf(AuthError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    db.close();
  });
});
