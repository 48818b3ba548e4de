import { describe, it, expect } from 'vitest';
import {
  hintFor,
  isValidDate,
  parsePeriodRequest,
  parsePeriodSpec,
  periodLabel,
  periodToken,
  trailingQuarters,
} from '../src/analysis/period-parser.js';
import { InvalidRequestError } from '../src/core/errors.js';

const NOW = new Date('2025-03-15T12:00:00Z');

describe('parsePeriodSpec', () => {
  it('parses latest in any case', () => {
    expect(parsePeriodSpec('latest')).toEqual({ kind: 'latest' });
    expect(parsePeriodSpec('LATEST')).toEqual({ kind: 'latest' });
  });

  it('parses fiscal quarters', () => {
    expect(parsePeriodSpec('2024-Q4')).toEqual({ kind: 'quarter', fiscal_year: 2024, fiscal_quarter: 4 });
    expect(parsePeriodSpec('2023-q1')).toEqual({ kind: 'quarter', fiscal_year: 2023, fiscal_quarter: 1 });
  });

  it('parses fiscal years', () => {
    expect(parsePeriodSpec('2022')).toEqual({ kind: 'year', fiscal_year: 2022 });
  });

  it('rejects anything else', () => {
    expect(() => parsePeriodSpec('2024-Q5')).toThrow(InvalidRequestError);
    expect(() => parsePeriodSpec('Q4 2024')).toThrow('Unrecognized period "Q4 2024"');
  });
});

describe('parsePeriodRequest', () => {
  it('defaults to latest quarterly as of today', () => {
    expect(parsePeriodRequest({}, NOW)).toEqual({
      period: { kind: 'latest' },
      frequency: 'Q',
      ttm: false,
      as_of: '2025-03-15',
    });
  });

  it('infers frequency from the period form', () => {
    expect(parsePeriodRequest({ period: '2024-Q2' }, NOW).frequency).toBe('Q');
    expect(parsePeriodRequest({ period: '2024' }, NOW).frequency).toBe('A');
    expect(parsePeriodRequest({ period: 'latest', freq: 'a' }, NOW).frequency).toBe('A');
  });

  it('rejects a quarter at annual frequency', () => {
    expect(() => parsePeriodRequest({ period: '2024-Q2', freq: 'A' }, NOW))
      .toThrow('A fiscal quarter cannot be requested at annual frequency');
  });

  it('rejects a year at quarterly frequency', () => {
    expect(() => parsePeriodRequest({ period: '2024', freq: 'Q' }, NOW)).toThrow(InvalidRequestError);
  });

  it('rejects TTM at annual frequency', () => {
    expect(() => parsePeriodRequest({ period: 'latest', freq: 'A', ttm: true }, NOW))
      .toThrow('TTM sums quarterly values; it requires quarterly frequency');
  });

  it('rejects unknown frequencies', () => {
    expect(() => parsePeriodRequest({ freq: 'M' }, NOW)).toThrow('Unrecognized frequency "M". Use Q or A.');
  });

  it('validates as_of', () => {
    expect(parsePeriodRequest({ as_of: '2024-12-31' }, NOW).as_of).toBe('2024-12-31');
    expect(() => parsePeriodRequest({ as_of: '2024-02-30' }, NOW)).toThrow('Invalid as_of date "2024-02-30"');
  });
});

describe('isValidDate', () => {
  it('accepts real calendar dates only', () => {
    expect(isValidDate('2024-02-29')).toBe(true);
    expect(isValidDate('2023-02-29')).toBe(false);
    expect(isValidDate('2024-1-01')).toBe(false);
  });
});

describe('hints and tokens', () => {
  it('builds a latest hint with no fiscal labels', () => {
    const request = parsePeriodRequest({}, NOW);
    const h = hintFor(request);
    expect(h).toEqual({ frequency: 'Q', fiscal_year: null, fiscal_quarter: null, as_of: '2025-03-15' });
    expect(periodToken(h)).toBe('latest@2025-03-15');
  });

  it('uses fiscal labels for explicit periods', () => {
    expect(periodToken(hintFor(parsePeriodRequest({ period: '2024-Q3' }, NOW)))).toBe('2024-Q3');
    expect(periodToken(hintFor(parsePeriodRequest({ period: '2024' }, NOW)))).toBe('2024');
  });

  it('drops the quarter from annual tokens', () => {
    expect(periodToken({ frequency: 'A', fiscal_year: 2024, fiscal_quarter: 4, as_of: '2025-01-01' })).toBe('2024');
    expect(periodLabel(2024, null)).toBe('2024');
  });
});

describe('trailingQuarters', () => {
  it('walks back across fiscal years, newest first', () => {
    expect(trailingQuarters(2024, 2, 4)).toEqual([
      { fiscal_year: 2024, fiscal_quarter: 2 },
      { fiscal_year: 2024, fiscal_quarter: 1 },
      { fiscal_year: 2023, fiscal_quarter: 4 },
      { fiscal_year: 2023, fiscal_quarter: 3 },
    ]);
  });
});
