import type { IngestionReport } from '../ingestion/pipeline.js';

export class ReasonerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ReasonerError';
  }
}

export class ConfigError extends ReasonerError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

/**
 * A malformed ingestion record or question. Recovered locally by the
 * ingestion pipeline; surfaced to the caller by the orchestrator.
 */
export class ValidationError extends ReasonerError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class StorageError extends ReasonerError {
  constructor(message: string, code: string, public readonly operation?: string, cause?: Error) {
    super(message, code, cause);
    this.name = 'StorageError';
  }
}

/** Network or timeout failure. Counts toward the breaker threshold. */
export class TransientStorageError extends StorageError {
  constructor(message: string, operation?: string, cause?: Error) {
    super(message, 'STORAGE_TRANSIENT', operation, cause);
    this.name = 'TransientStorageError';
  }
}

/** Schema violation or similar. Never retried and never trips the breaker. */
export class PermanentStorageError extends StorageError {
  constructor(message: string, operation?: string, cause?: Error) {
    super(message, 'STORAGE_PERMANENT', operation, cause);
    this.name = 'PermanentStorageError';
  }
}

export class BreakerOpenError extends ReasonerError {
  constructor(
    public readonly breakerName: string,
    public readonly remainingMs: number,
  ) {
    super(
      remainingMs > 0
        ? `Circuit breaker "${breakerName}" is OPEN. Retry in ${Math.ceil(remainingMs / 1000)}s.`
        : `Circuit breaker "${breakerName}" is probing recovery; call rejected.`,
      'BREAKER_OPEN',
    );
    this.name = 'BreakerOpenError';
  }
}

export class QueryCancelledError extends ReasonerError {
  constructor(message = 'Query cancelled by caller') {
    super(message, 'QUERY_CANCELLED');
    this.name = 'QueryCancelledError';
  }
}

/** A batch-level failure the ingestion caller chose to abort on. */
export class IngestionError extends ReasonerError {
  constructor(message: string, public readonly report: IngestionReport, cause?: Error) {
    super(message, 'INGESTION_ERROR', cause);
    this.name = 'IngestionError';
  }
}

export class ChannelClosedError extends ReasonerError {
  constructor() {
    super('Channel is closed', 'CHANNEL_CLOSED');
    this.name = 'ChannelClosedError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
