export class FeedloomError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'FeedloomError';
  }
}

export class ConfigError extends FeedloomError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends FeedloomError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class SourceError extends FeedloomError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export class IngestError extends FeedloomError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INGEST_ERROR', details);
    this.name = 'IngestError';
  }
}

export class LlmError extends FeedloomError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_ERROR', details);
    this.name = 'LlmError';
  }
}

export class StageError extends FeedloomError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STAGE_ERROR', details);
    this.name = 'StageError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
