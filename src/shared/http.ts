import { SourceError } from './errors.js';

export interface HttpOptions {
  headers?: Record<string, string>;
  params?: Record<string, string | number | undefined>;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 15000;

export function buildUrl(base: string, params?: HttpOptions['params']): string {
  if (!params) return base;
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * Single HTTP call with a fixed timeout and no retry. Non-2xx responses,
 * network failures and timeouts all surface as SourceError.
 */
export async function request(
  url: string,
  init: RequestInit & { timeoutMs?: number } = {},
): Promise<Response> {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, ...rest } = init;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  let response: Response;
  try {
    response = await fetch(url, { ...rest, signal: controller.signal });
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') {
      throw new SourceError(`Request timed out after ${timeoutMs}ms: ${redactUrl(url)}`, {
        url: redactUrl(url),
        timeout: timeoutMs,
      });
    }
    throw new SourceError(`Request failed: ${err instanceof Error ? err.message : String(err)}`, {
      url: redactUrl(url),
    });
  } finally {
    clearTimeout(timer);
  }

  if (!response.ok) {
    const body = await response.text().catch(() => '');
    throw new SourceError(`HTTP ${response.status} from ${new URL(url).hostname}`, {
      url: redactUrl(url),
      status: response.status,
      body: body.slice(0, 500),
    });
  }

  return response;
}

export async function getJson(url: string, opts: HttpOptions = {}): Promise<unknown> {
  const response = await request(buildUrl(url, opts.params), {
    headers: { Accept: 'application/json', ...opts.headers },
    timeoutMs: opts.timeoutMs,
  });
  try {
    return await response.json();
  } catch {
    throw new SourceError(`Response is not valid JSON: ${redactUrl(url)}`, { url: redactUrl(url) });
  }
}

export async function getText(url: string, opts: HttpOptions = {}): Promise<string> {
  const response = await request(buildUrl(url, opts.params), {
    headers: opts.headers,
    timeoutMs: opts.timeoutMs,
  });
  return response.text();
}

export async function postForm(
  url: string,
  form: Record<string, string>,
  opts: Omit<HttpOptions, 'params'> = {},
): Promise<unknown> {
  const response = await request(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
      ...opts.headers,
    },
    body: new URLSearchParams(form).toString(),
    timeoutMs: opts.timeoutMs,
  });
  try {
    return await response.json();
  } catch {
    throw new SourceError(`Response is not valid JSON: ${url}`, { url });
  }
}

/**
 * Drop credential-bearing query params before a URL reaches a log line.
 */
export function redactUrl(raw: string): string {
  try {
    const url = new URL(raw);
    for (const key of ['api_key', 'access_token', 'client_secret', 'refresh_token']) {
      if (url.searchParams.has(key)) url.searchParams.set(key, '***');
    }
    return url.toString();
  } catch {
    return raw;
  }
}
