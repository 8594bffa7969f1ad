import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ConfigSchema,
  applyEnvOverrides,
  generateDefaultConfig,
  generateDefaultConfigYaml,
  loadConfig,
  requireCredentials,
  resetConfigCache,
} from '../config.js';
import { ConfigError } from '../errors.js';

describe('ConfigSchema', () => {
  it('produces valid defaults from empty object', () => {
    const result = ConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.sink.kind).toBe('supabase');
      expect(result.data.http.timeout_ms).toBe(15000);
      expect(result.data.lastfm.page_size).toBe(200);
      expect(result.data.lastfm.table).toBe('lastfm_listened_table');
      expect(result.data.goodreads.max_pages).toBe(50);
      expect(result.data.trakt.username).toBe('me');
    }
  });

  it('accepts valid overrides and keeps other defaults', () => {
    const result = ConfigSchema.safeParse({
      sink: { kind: 'sqlite' },
      strava: { page_size: 50 },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.sink.kind).toBe('sqlite');
      expect(result.data.sink.sqlite_path).toBe('~/.worldly/worldly.db');
      expect(result.data.strava.page_size).toBe(50);
      expect(result.data.strava.batch_size).toBe(50);
    }
  });

  it('rejects invalid types', () => {
    expect(ConfigSchema.safeParse({ lastfm: { page_size: 'lots' } }).success).toBe(false);
    expect(ConfigSchema.safeParse({ sink: { kind: 'postgres' } }).success).toBe(false);
  });
});

describe('generateDefaultConfig', () => {
  it('returns a full Config object', () => {
    const config = generateDefaultConfig();
    expect(config.tmdb.request_delay_ms).toBe(300);
    expect(config.letterboxd.batch_size).toBe(200);
  });

  it('serializes to YAML', () => {
    const yaml = generateDefaultConfigYaml();
    expect(yaml).toContain('lastfm:');
    expect(yaml).toContain('table: lastfm_listened_table');
  });
});

describe('applyEnvOverrides', () => {
  it('maps credential env vars onto their sections', () => {
    const out = applyEnvOverrides(
      { lastfm: { page_size: 100 } },
      { LASTFM_API_KEY: 'test-key', LASTFM_USERNAME: 'listener', SUPABASE_URL: 'http://localhost:54321' },
    );
    expect(out).toEqual({
      lastfm: { page_size: 100, api_key: 'test-key', username: 'listener' },
      sink: { supabase_url: 'http://localhost:54321' },
    });
  });

  it('strips quotes and ignores empty values', () => {
    const out = applyEnvOverrides({}, { TMDB_API_KEY: ' "test-tmdb" ', TRAKT_CLIENT_ID: '   ' });
    expect(out).toEqual({ tmdb: { api_key: 'test-tmdb' } });
  });

  it('prefers the service role key over the anon key', () => {
    const out = applyEnvOverrides({}, { SUPABASE_ANON_KEY: 'anon', SUPABASE_SERVICE_ROLE_KEY: 'service' });
    expect(out).toEqual({ sink: { supabase_key: 'service' } });
  });

  it('does not mutate its input', () => {
    const raw = { strava: { table: 'custom' } };
    applyEnvOverrides(raw, { STRAVA_CLIENT_ID: '123' });
    expect(raw).toEqual({ strava: { table: 'custom' } });
  });
});

describe('requireCredentials', () => {
  it('passes when every field is set', () => {
    expect(() =>
      requireCredentials('lastfm', { api_key: 'k', username: 'u' }, { api_key: 'LASTFM_API_KEY', username: 'LASTFM_USERNAME' }),
    ).not.toThrow();
  });

  it('names every missing env var', () => {
    const call = (): void =>
      requireCredentials(
        'strava',
        { client_id: '', client_secret: ' ', refresh_token: 'r' },
        { client_id: 'STRAVA_CLIENT_ID', client_secret: 'STRAVA_CLIENT_SECRET', refresh_token: 'STRAVA_REFRESH_TOKEN' },
      );
    expect(call).toThrow(ConfigError);
    expect(call).toThrow('strava: missing STRAVA_CLIENT_ID, STRAVA_CLIENT_SECRET (set them in .env or the config file)');
  });
});

describe('loadConfig', () => {
  const savedConfigPath = process.env['WORLDLY_CONFIG'];
  let tmpDir: string | null = null;

  afterEach(() => {
    if (savedConfigPath === undefined) delete process.env['WORLDLY_CONFIG'];
    else process.env['WORLDLY_CONFIG'] = savedConfigPath;
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = null;
    resetConfigCache();
  });

  it('reads the file named by WORLDLY_CONFIG', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'worldly-config-'));
    const file = path.join(tmpDir, 'config.yaml');
    fs.writeFileSync(file, 'sink:\n  kind: sqlite\n  sqlite_path: /tmp/test.db\nlastfm:\n  page_delay_ms: 0\n');
    process.env['WORLDLY_CONFIG'] = file;

    const config = await loadConfig(true);
    expect(config.sink.sqlite_path).toBe('/tmp/test.db');
    expect(config.lastfm.page_delay_ms).toBe(0);
    expect(config.lastfm.page_size).toBe(200);
  });

  it('throws ConfigError for a named file that does not exist', async () => {
    process.env['WORLDLY_CONFIG'] = '/nonexistent/worldly/config.yaml';
    await expect(loadConfig(true)).rejects.toBeInstanceOf(ConfigError);
  });

  it('throws ConfigError for an invalid file', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'worldly-config-'));
    const file = path.join(tmpDir, 'config.yaml');
    fs.writeFileSync(file, 'trakt:\n  page_size: -5\n');
    process.env['WORLDLY_CONFIG'] = file;

    await expect(loadConfig(true)).rejects.toThrow('Invalid configuration');
  });
});
