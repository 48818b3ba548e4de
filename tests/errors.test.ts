import { describe, it, expect } from 'vitest';
import {
  AdapterError,
  AmbiguousPeriodError,
  DeadlineExceededError,
  EngineError,
  InsufficientHistoryError,
  InvalidRequestError,
  KpiConfigurationError,
  NotFoundError,
  SourceUnavailableError,
  UndefinedError,
  ValidationFailedError,
  isEngineError,
} from '../src/core/errors.js';

describe('AdapterError', () => {
  it('marks only transient kinds as retryable', () => {
    expect(new AdapterError('Unavailable', 'down', 'sec').retryable).toBe(true);
    expect(new AdapterError('RateLimited', 'slow down', 'sec', 2000).retryable).toBe(true);
    expect(new AdapterError('NotFound', 'gone', 'sec').retryable).toBe(false);
    expect(new AdapterError('Malformed', 'bad json', 'sec').retryable).toBe(false);
  });

  it('carries adapter id and Retry-After', () => {
    const err = new AdapterError('RateLimited', 'slow down', 'market-data', 2000);
    expect(err.adapterId).toBe('market-data');
    expect(err.retryAfterMs).toBe(2000);
    expect(err.name).toBe('AdapterError');
    expect(isEngineError(err)).toBe(false);
  });
});

describe('EngineError subclasses', () => {
  const cases: Array<[EngineError, string, number]> = [
    [new NotFoundError('x'), 'NotFound', 404],
    [new AmbiguousPeriodError('x'), 'AmbiguousPeriod', 409],
    [new ValidationFailedError('x'), 'ValidationFailed', 422],
    [new InsufficientHistoryError('x', 2, 4), 'InsufficientHistory', 422],
    [new UndefinedError('grossMargin', 'x'), 'Undefined', 422],
    [new SourceUnavailableError('x'), 'SourceUnavailable', 503],
    [new DeadlineExceededError(100), 'DeadlineExceeded', 504],
    [new InvalidRequestError('x'), 'InvalidRequest', 400],
  ];

  it.each(cases)('%s has its kind and status', (err, kind, status) => {
    expect(err.kind).toBe(kind);
    expect(err.status).toBe(status);
    expect(isEngineError(err)).toBe(true);
    expect(err instanceof Error).toBe(true);
  });

  it('keeps diagnostics', () => {
    const err = new SourceUnavailableError('all down', [
      { source: 'regulatory-filing', outcome: 'Unavailable', message: 'HTTP 503', attempts: 3 },
    ]);
    expect(err.diagnostics).toHaveLength(1);
    expect(err.diagnostics[0].attempts).toBe(3);
  });

  it('InsufficientHistoryError reports what was found', () => {
    const err = new InsufficientHistoryError('need 4 quarters', 3, 4);
    expect(err.available).toBe(3);
    expect(err.required).toBe(4);
  });

  it('DeadlineExceededError names the deadline', () => {
    expect(new DeadlineExceededError(250).message).toBe('Request did not complete within 250ms');
  });

  it('InvalidRequestError lists alternatives', () => {
    expect(new InvalidRequestError('Unknown metric', ['revenue', 'grossMargin']).available).toEqual(['revenue', 'grossMargin']);
  });
});

describe('KpiConfigurationError', () => {
  it('is not an engine error', () => {
    const err = new KpiConfigurationError('KPI dependency cycle: a -> a', ['a', 'a']);
    expect(err.path).toEqual(['a', 'a']);
    expect(isEngineError(err)).toBe(false);
  });
});
