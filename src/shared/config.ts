import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import dotenv from 'dotenv';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getWorldlyDir, getPackageRoot, cleanEnvValue } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  sink: z
    .object({
      kind: z.enum(['supabase', 'sqlite']).default('supabase'),
      supabase_url: z.string().default(''),
      supabase_key: z.string().default(''),
      sqlite_path: z.string().default('~/.worldly/worldly.db'),
    })
    .default({}),

  http: z
    .object({
      timeout_ms: z.number().int().positive().default(15000),
      user_agent: z.string().default('worldly-sync/0.1'),
    })
    .default({}),

  lastfm: z
    .object({
      api_key: z.string().default(''),
      username: z.string().default(''),
      table: z.string().default('lastfm_listened_table'),
      page_size: z.number().int().positive().default(200),
      page_delay_ms: z.number().int().nonnegative().default(250),
      batch_size: z.number().int().positive().default(500),
    })
    .default({}),

  strava: z
    .object({
      client_id: z.string().default(''),
      client_secret: z.string().default(''),
      refresh_token: z.string().default(''),
      table: z.string().default('worldly_strava'),
      page_size: z.number().int().positive().default(200),
      page_delay_ms: z.number().int().nonnegative().default(500),
      batch_size: z.number().int().positive().default(50),
    })
    .default({}),

  goodreads: z
    .object({
      session: z.string().default(''),
      list_url: z.string().default(''),
      table: z.string().default('worldly_good_reads_books'),
      data_dir: z.string().default('./data'),
      page_size: z.number().int().positive().default(100),
      page_delay_ms: z.number().int().nonnegative().default(1000),
      max_pages: z.number().int().positive().default(50),
      batch_size: z.number().int().positive().default(100),
    })
    .default({}),

  letterboxd: z
    .object({
      export_dir: z.string().default('./data/letterboxd'),
      batch_size: z.number().int().positive().default(200),
    })
    .default({}),

  tmdb: z
    .object({
      api_key: z.string().default(''),
      table: z.string().default('letterboxd_tmdb_enrichment'),
      request_delay_ms: z.number().int().nonnegative().default(300),
      batch_size: z.number().int().positive().default(50),
    })
    .default({}),

  trakt: z
    .object({
      client_id: z.string().default(''),
      access_token: z.string().default(''),
      username: z.string().default('me'),
      table: z.string().default('trakt_history'),
      page_size: z.number().int().positive().default(100),
      page_delay_ms: z.number().int().nonnegative().default(250),
      batch_size: z.number().int().positive().default(100),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Environment variable → [config section, field].
 */
const ENV_OVERRIDES: Record<string, [string, string]> = {
  SUPABASE_URL: ['sink', 'supabase_url'],
  SUPABASE_ANON_KEY: ['sink', 'supabase_key'],
  WORLDLY_SINK: ['sink', 'kind'],
  WORLDLY_DB_PATH: ['sink', 'sqlite_path'],
  LASTFM_API_KEY: ['lastfm', 'api_key'],
  LASTFM_USERNAME: ['lastfm', 'username'],
  STRAVA_CLIENT_ID: ['strava', 'client_id'],
  STRAVA_CLIENT_SECRET: ['strava', 'client_secret'],
  STRAVA_REFRESH_TOKEN: ['strava', 'refresh_token'],
  GOODREADS_SESSION: ['goodreads', 'session'],
  GOODREADS_LIST_URL: ['goodreads', 'list_url'],
  TMDB_API_KEY: ['tmdb', 'api_key'],
  TRAKT_CLIENT_ID: ['trakt', 'client_id'],
  TRAKT_ACCESS_TOKEN: ['trakt', 'access_token'],
};

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  const defaults = generateDefaultConfig();
  return yamlStringify(defaults);
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Layer credential env vars over a raw (pre-validation) config object.
 * The service role key wins over the anon key when both are set.
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: Env,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...raw };

  const set = (section: string, field: string, value: string): void => {
    const current = out[section];
    const next: Record<string, unknown> = isRecord(current) ? { ...current } : {};
    next[field] = value;
    out[section] = next;
  };

  for (const [name, [section, field]] of Object.entries(ENV_OVERRIDES)) {
    const value = cleanEnvValue(env[name]);
    if (value !== undefined) set(section, field, value);
  }

  const serviceKey = cleanEnvValue(env['SUPABASE_SERVICE_ROLE_KEY']);
  if (serviceKey !== undefined) set('sink', 'supabase_key', serviceKey);

  return out;
}

function configOf(result: { config: unknown } | null): Record<string, unknown> {
  const config = result?.config;
  return isRecord(config) ? config : {};
}

function loadDotenv(): void {
  const candidates = [path.join(getPackageRoot(), '.env'), path.resolve('.env')];
  for (const file of new Set(candidates)) {
    if (fs.existsSync(file)) {
      dotenv.config({ path: file });
    }
  }
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  loadDotenv();

  const explorer = cosmiconfig('worldly', {
    searchPlaces: ['worldly.config.yaml', 'worldly.config.yml', '.worldlyrc.yaml', '.worldlyrc.yml'],
  });

  const envConfigPath = process.env['WORLDLY_CONFIG'];
  const defaultConfigPath = path.join(getWorldlyDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    rawConfig = configOf(await explorer.load(resolved));
  } else if (fs.existsSync(defaultConfigPath)) {
    rawConfig = configOf(await explorer.load(defaultConfigPath));
  } else {
    rawConfig = configOf(await explorer.search());
    if (Object.keys(rawConfig).length === 0) {
      logger.debug('No config file found, using defaults');
    }
  }

  const parsed = ConfigSchema.safeParse(applyEnvOverrides(rawConfig, process.env));
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

/**
 * Throw a ConfigError naming every required credential that is empty.
 * `fields` maps a config field to the env var a user would set for it.
 */
export function requireCredentials<S extends Record<string, unknown>>(
  sourceName: string,
  section: S,
  fields: Partial<Record<keyof S & string, string>>,
): void {
  const missing: string[] = [];
  for (const [field, envName] of Object.entries(fields)) {
    const value = section[field];
    if (typeof value !== 'string' || value.trim() === '') {
      missing.push(envName ?? field);
    }
  }
  if (missing.length > 0) {
    throw new ConfigError(`${sourceName}: missing ${missing.join(', ')} (set them in .env or the config file)`, {
      source: sourceName,
      missing,
    });
  }
}
