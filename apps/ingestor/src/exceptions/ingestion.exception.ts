/**
 * Failure taxonomy for the ingestion layer. Callers branch on `kind`,
 * never on message text.
 */
export type IngestionErrorKind =
  | 'retryable'
  | 'fatal'
  | 'persistence'
  | 'user_input'
  | 'conflict';

/** Why a retryable failure happened, kept separate for observability */
export type RetryableCategory = 'transport' | 'server' | 'rate_limit';

/**
 * Base exception for ingestion errors
 */
export abstract class IngestionException extends Error {
  abstract readonly kind: IngestionErrorKind;

  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'IngestionException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Transient upstream failure: timeout, connection error, HTTP 5xx or 429
 */
export class RetryableFetchException extends IngestionException {
  readonly kind = 'retryable' as const;

  constructor(
    message: string,
    public readonly source: string,
    public readonly category: RetryableCategory,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = 'RetryableFetchException';
  }
}

/**
 * Failure that retrying cannot fix: HTTP 4xx (other than 429), a response
 * without the required field, or a retryable failure that ran out of attempts
 */
export class FatalFetchException extends IngestionException {
  readonly kind = 'fatal' as const;

  constructor(
    message: string,
    public readonly source: string,
    public readonly statusCode?: number,
    cause?: unknown,
    /** True when this wraps the last error of an exhausted retry policy */
    public readonly exhausted = false,
  ) {
    super(message, cause);
    this.name = 'FatalFetchException';
  }

  static fromExhausted(
    last: RetryableFetchException,
    attempts: number,
  ): FatalFetchException {
    return new FatalFetchException(
      `${last.source}: gave up after ${attempts} attempt(s): ${last.message}`,
      last.source,
      last.statusCode,
      last,
      true,
    );
  }
}

/**
 * The store rejected a write or a commit
 */
export class PersistenceException extends IngestionException {
  readonly kind = 'persistence' as const;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'PersistenceException';
  }
}

/**
 * The requested batch file does not exist
 */
export class BatchSourceNotFoundException extends IngestionException {
  readonly kind = 'user_input' as const;

  constructor(public readonly location: string) {
    super(`Batch source not found: ${location}`);
    this.name = 'BatchSourceNotFoundException';
  }
}

/**
 * A requested batch path resolves outside the batch directory
 */
export class BatchSourceRejectedException extends IngestionException {
  readonly kind = 'user_input' as const;

  constructor(
    public readonly requested: string,
    public readonly root: string,
  ) {
    super(`Batch path "${requested}" is outside ${root}`);
    this.name = 'BatchSourceRejectedException';
  }
}

/**
 * A batch payload could not be turned into price rows
 */
export class BatchFormatException extends IngestionException {
  readonly kind = 'user_input' as const;

  constructor(
    message: string,
    public readonly line?: number,
  ) {
    super(message);
    this.name = 'BatchFormatException';
  }
}

/**
 * Another ingestion run holds the run guard
 */
export class RunInProgressException extends IngestionException {
  readonly kind = 'conflict' as const;

  constructor(public readonly activeRun: string) {
    super(`Ingestion run already in progress (${activeRun})`);
    this.name = 'RunInProgressException';
  }
}

/**
 * A job run was finalized twice, or its row was no longer running
 */
export class LedgerStateException extends Error {
  constructor(
    message: string,
    public readonly runId: number,
  ) {
    super(message);
    this.name = 'LedgerStateException';
    Error.captureStackTrace(this, this.constructor);
  }
}

export type FetchError = RetryableFetchException | FatalFetchException;

export function isIngestionException(error: unknown): error is IngestionException {
  return error instanceof IngestionException;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
