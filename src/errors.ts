export type ZoneSyncErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'INVALID_RECORD'
  | 'FETCH_ERROR'
  | 'RATE_LIMITED'
  | 'APPLY_ERROR';

/** Base class for every error raised by the reconciliation engine */
export class ZoneSyncError extends Error {
  readonly code: ZoneSyncErrorCode;

  constructor(
    code: ZoneSyncErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Bad credentials, an unsupported record type for the provider, or an
 * invalid descriptor/config. Raised before any network call.
 */
export class ConfigurationError extends ZoneSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION_ERROR', message, options);
  }
}

/** A record whose label, target or TTL cannot be represented for its type */
export class InvalidRecordError extends ConfigurationError {
  override readonly code = 'INVALID_RECORD' as const;
}

/** Reading actual state from a backend failed */
export class FetchError extends ZoneSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FETCH_ERROR', message, options);
  }
}

/** Thrown by adapters when the backend rejects a call for rate limiting */
export class RateLimitError extends ZoneSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RATE_LIMITED', message, options);
  }
}

/** Executing a correction's action failed */
export class ApplyError extends ZoneSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('APPLY_ERROR', message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
