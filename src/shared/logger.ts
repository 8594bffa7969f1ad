import pino from 'pino';

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    process.env['NODE_ENV'] !== 'production'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: [
      'api_key',
      'access_token',
      'refresh_token',
      'client_secret',
      'session',
      'supabase_key',
      '*.api_key',
      '*.access_token',
      '*.refresh_token',
      '*.client_secret',
      '*.session',
      '*.supabase_key',
    ],
    censor: '***REDACTED***',
  },
});

export type Logger = pino.Logger;
