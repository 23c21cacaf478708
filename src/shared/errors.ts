export class BlogwatchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'BlogwatchError';
  }
}

export class ConfigError extends BlogwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends BlogwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class SourceError extends BlogwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export class HistoryError extends BlogwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'HISTORY_ERROR', details);
    this.name = 'HistoryError';
  }
}

export class LlmError extends BlogwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_ERROR', details);
    this.name = 'LlmError';
  }
}

export class PreferencesError extends BlogwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PREFERENCES_ERROR', details);
    this.name = 'PreferencesError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
