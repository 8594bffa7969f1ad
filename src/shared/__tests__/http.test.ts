import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildUrl, getJson, getText, postForm, redactUrl } from '../http.js';
import { SourceError } from '../errors.js';

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
  vi.restoreAllMocks();
});

describe('buildUrl', () => {
  it('appends params and skips undefined ones', () => {
    expect(buildUrl('https://api.example.com/v1/items', { page: 2, q: 'a b', year: undefined })).toBe(
      'https://api.example.com/v1/items?page=2&q=a+b',
    );
  });

  it('replaces a param already in the base URL', () => {
    expect(buildUrl('https://example.com/list?shelf=read&page=9', { page: 1 })).toBe(
      'https://example.com/list?shelf=read&page=1',
    );
  });
});

describe('redactUrl', () => {
  it('masks credential query params', () => {
    expect(redactUrl('https://example.com/x?api_key=test-secret&page=1')).toBe(
      'https://example.com/x?api_key=***&page=1',
    );
  });

  it('returns unparseable input unchanged', () => {
    expect(redactUrl('not a url')).toBe('not a url');
  });
});

describe('getJson', () => {
  it('returns the parsed body and sends params', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
    globalThis.fetch = fetchMock;

    const body = await getJson('https://api.example.com/data', { params: { page: 1 } });

    expect(body).toEqual({ ok: true });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.example.com/data?page=1');
  });

  it('throws SourceError with status for non-2xx responses', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('rate limited', { status: 429 }));

    const err = await getJson('https://api.example.com/data').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceError);
    if (err instanceof SourceError) {
      expect(err.message).toBe('HTTP 429 from api.example.com');
      expect(err.details?.['status']).toBe(429);
      expect(err.details?.['body']).toBe('rate limited');
    }
  });

  it('throws SourceError for a body that is not JSON', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('<html>', { status: 200 }));
    await expect(getJson('https://api.example.com/data')).rejects.toThrow(
      'Response is not valid JSON: https://api.example.com/data',
    );
  });

  it('wraps network failures', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
    await expect(getJson('https://api.example.com/data')).rejects.toThrow('Request failed: fetch failed');
  });

  it('reports timeouts', async () => {
    globalThis.fetch = vi.fn().mockImplementation(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => {
            const abort = new Error('aborted');
            abort.name = 'AbortError';
            reject(abort);
          });
        }),
    );
    await expect(getJson('https://api.example.com/slow', { timeoutMs: 5 })).rejects.toThrow(
      'Request timed out after 5ms: https://api.example.com/slow',
    );
  });
});

describe('getText', () => {
  it('returns the raw body with the given headers', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('<table></table>', { status: 200 }));
    globalThis.fetch = fetchMock;

    const html = await getText('https://example.com/page', { headers: { Cookie: 'a=1' } });

    expect(html).toBe('<table></table>');
    const init: RequestInit | undefined = fetchMock.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({ Cookie: 'a=1' });
  });
});

describe('postForm', () => {
  it('posts a form-encoded body', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('{"access_token":"t"}', { status: 200 }));
    globalThis.fetch = fetchMock;

    const body = await postForm('https://auth.example.com/token', { grant_type: 'refresh_token', refresh_token: 'r' });

    expect(body).toEqual({ access_token: 't' });
    const init: RequestInit | undefined = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('grant_type=refresh_token&refresh_token=r');
  });
});
