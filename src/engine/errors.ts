export type ErrorKind =
  | 'ConnectionError'
  | 'ExtractionError'
  | 'RateLimitExceeded'
  | 'SerializationError'
  | 'StorageError'
  | 'ConfigError';

/**
 * Base class for every failure the sync pipeline knows how to classify.
 * The orchestrator turns these into SyncResult errors via `kind`.
 */
export abstract class SyncError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Cannot establish a source connection. Fatal for that source only. */
export class ConnectionError extends SyncError {
  readonly kind = 'ConnectionError';

  constructor(
    readonly sourceName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${sourceName}] ${message}`, options);
  }
}

/** Mid-stream read failure. Batches yielded before it stay valid. */
export class ExtractionError extends SyncError {
  readonly kind = 'ExtractionError';

  constructor(
    readonly sourceName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${sourceName}] ${message}`, options);
  }
}

export class RateLimitExceeded extends SyncError {
  readonly kind = 'RateLimitExceeded';

  constructor(
    readonly sourceName: string,
    readonly attempts: number,
    url: string
  ) {
    super(`[${sourceName}] rate limited ${attempts} times in a row on ${url}`);
  }
}

export class SerializationError extends SyncError {
  readonly kind = 'SerializationError';

  constructor(
    readonly field: string,
    message: string
  ) {
    super(message);
  }
}

export class StorageError extends SyncError {
  readonly kind = 'StorageError';

  constructor(
    readonly key: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to write ${key}: ${message}`, options);
  }
}

export class ConfigError extends SyncError {
  readonly kind = 'ConfigError';
}

export const isSyncError = (err: unknown): err is SyncError => err instanceof SyncError;

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));
