export class WorldlyError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'WorldlyError';
  }
}

export class ConfigError extends WorldlyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class AuthError extends WorldlyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTH_ERROR', details);
    this.name = 'AuthError';
  }
}

export class SourceError extends WorldlyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export class SinkError extends WorldlyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SINK_ERROR', details);
    this.name = 'SinkError';
  }
}

export class DbError extends WorldlyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

/**
 * Errors that abort a sync before any record is fetched.
 */
export function isFatalSyncError(err: unknown): err is ConfigError | AuthError {
  return err instanceof ConfigError || err instanceof AuthError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
