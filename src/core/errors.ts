/**
 * Error types for the engine and its adapters.
 *
 * AdapterError is internal: the router retries or falls back on it and
 * only the aggregate outcome (an EngineError) ever reaches a caller.
 */

export type AdapterErrorKind = 'NotFound' | 'Unavailable' | 'RateLimited' | 'Malformed';

export class AdapterError extends Error {
  constructor(
    public readonly kind: AdapterErrorKind,
    message: string,
    public readonly adapterId: string,
    public readonly retryAfterMs: number | null = null
  ) {
    super(message);
    this.name = 'AdapterError';
  }

  get retryable(): boolean {
    return this.kind === 'Unavailable' || this.kind === 'RateLimited';
  }
}

export type EngineErrorKind =
  | 'NotFound'
  | 'AmbiguousPeriod'
  | 'ValidationFailed'
  | 'InsufficientHistory'
  | 'Undefined'
  | 'SourceUnavailable'
  | 'DeadlineExceeded'
  | 'InvalidRequest';

/** One line of per-adapter diagnostics attached to aggregate failures */
export interface SourceAttempt {
  source: string;
  outcome: AdapterErrorKind | 'Rejected' | 'Ambiguous' | 'Accepted' | 'Aborted';
  message: string;
  attempts: number;
}

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;
  abstract readonly status: number;
  abstract readonly title: string;

  constructor(message: string, public readonly diagnostics: SourceAttempt[] = []) {
    super(message);
  }
}

export class NotFoundError extends EngineError {
  readonly kind = 'NotFound';
  readonly status = 404;
  readonly title = 'No data found';

  constructor(message: string, diagnostics: SourceAttempt[] = []) {
    super(message, diagnostics);
    this.name = 'NotFoundError';
  }
}

export class AmbiguousPeriodError extends EngineError {
  readonly kind = 'AmbiguousPeriod';
  readonly status = 409;
  readonly title = 'Ambiguous reporting period';

  constructor(message: string, diagnostics: SourceAttempt[] = []) {
    super(message, diagnostics);
    this.name = 'AmbiguousPeriodError';
  }
}

export class ValidationFailedError extends EngineError {
  readonly kind = 'ValidationFailed';
  readonly status = 422;
  readonly title = 'Value failed plausibility checks';

  constructor(message: string, diagnostics: SourceAttempt[] = []) {
    super(message, diagnostics);
    this.name = 'ValidationFailedError';
  }
}

export class InsufficientHistoryError extends EngineError {
  readonly kind = 'InsufficientHistory';
  readonly status = 422;
  readonly title = 'Insufficient history';

  constructor(
    message: string,
    public readonly available: number,
    public readonly required: number
  ) {
    super(message);
    this.name = 'InsufficientHistoryError';
  }
}

export class UndefinedError extends EngineError {
  readonly kind = 'Undefined';
  readonly status = 422;
  readonly title = 'KPI is undefined';

  constructor(
    public readonly kpi: string,
    message: string,
    diagnostics: SourceAttempt[] = []
  ) {
    super(message, diagnostics);
    this.name = 'UndefinedError';
  }
}

export class SourceUnavailableError extends EngineError {
  readonly kind = 'SourceUnavailable';
  readonly status = 503;
  readonly title = 'Upstream sources unavailable';

  constructor(message: string, diagnostics: SourceAttempt[] = []) {
    super(message, diagnostics);
    this.name = 'SourceUnavailableError';
  }
}

export class DeadlineExceededError extends EngineError {
  readonly kind = 'DeadlineExceeded';
  readonly status = 504;
  readonly title = 'Request deadline exceeded';

  constructor(public readonly deadlineMs: number) {
    super(`Request did not complete within ${deadlineMs}ms`);
    this.name = 'DeadlineExceededError';
  }
}

export class InvalidRequestError extends EngineError {
  readonly kind = 'InvalidRequest';
  readonly status = 400;
  readonly title = 'Invalid request';

  constructor(message: string, public readonly available: string[] = []) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

/** Raised at startup when the KPI table is not a valid DAG */
export class KpiConfigurationError extends Error {
  constructor(message: string, public readonly path: string[] = []) {
    super(message);
    this.name = 'KpiConfigurationError';
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
