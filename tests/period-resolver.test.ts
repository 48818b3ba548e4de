import { describe, it, expect } from 'vitest';
import { Decimal } from 'decimal.js';
import { clusterByMagnitude, resolvePeriod } from '../src/processing/period-resolver.js';
import { AmbiguousPeriodError } from '../src/core/errors.js';
import { hint, makeFact } from './helpers.js';

describe('resolvePeriod', () => {
  it('returns null when nothing matches', () => {
    expect(resolvePeriod([], hint())).toBeNull();
    expect(resolvePeriod([makeFact({ fiscal_quarter: 3 })], hint())).toBeNull();
  });

  it('ignores candidates of the other frequency', () => {
    const annual = makeFact({ frequency: 'A', fiscal_quarter: null, value: '391035000000' });
    expect(resolvePeriod([annual], hint())).toBeNull();
  });

  it('picks the explicit fiscal quarter', () => {
    const q3 = makeFact({ fiscal_quarter: 3, period_end: '2024-06-29', value: '85777000000' });
    const q4 = makeFact();
    const picked = resolvePeriod([q3, q4], hint());
    expect(picked?.fact.value).toBe('94930000000');
    expect(picked?.resolution).toBe('exact');
  });

  it('treats identical values from several filings as exact and cites the newest', () => {
    const original = makeFact({ filed: '2024-11-01', url: 'https://example.test/10-K' });
    const comparative = makeFact({ filed: '2025-01-31', url: 'https://example.test/10-Q' });
    const picked = resolvePeriod([original, comparative], hint());
    expect(picked?.resolution).toBe('exact');
    expect(picked?.fact.url).toBe('https://example.test/10-Q');
  });

  it('prefers a later filing that restated the value', () => {
    const original = makeFact({ value: '94930000000', filed: '2024-11-01' });
    const restated = makeFact({ value: '95100000000', filed: '2025-10-31' });
    const picked = resolvePeriod([restated, original], hint());
    expect(picked?.resolution).toBe('restated');
    expect(picked?.fact.value).toBe('95100000000');
  });

  it('is ambiguous when comparable values share a filing date', () => {
    const a = makeFact({ value: '94930000000', filed: '2024-11-01' });
    const b = makeFact({ value: '95100000000', filed: '2024-11-01' });
    expect(() => resolvePeriod([a, b], hint())).toThrow(AmbiguousPeriodError);
  });

  it('resolves a quarterly flow to the smaller magnitude and marks it heuristic', () => {
    const quarter = makeFact({ value: '94930000000' });
    const fullYear = makeFact({ value: '391035000000', filed: '2024-11-02' });
    const picked = resolvePeriod([fullYear, quarter], hint(), 'flow');
    expect(picked?.fact.value).toBe('94930000000');
    expect(picked?.resolution).toBe('heuristic');
  });

  it('does not apply the magnitude heuristic to instants', () => {
    const a = makeFact({ concept: 'totalAssets', value: '364980000000' });
    const b = makeFact({ concept: 'totalAssets', value: '36498000000' });
    expect(() => resolvePeriod([a, b], hint(), 'instant'))
      .toThrow('totalAssets 2024-Q4: 2 candidates of different magnitude (36498000000, 364980000000)');
  });

  describe('latest', () => {
    const latest = hint({ fiscal_year: null, fiscal_quarter: null, as_of: '2024-12-31' });
    const q3 = makeFact({ fiscal_quarter: 3, period_end: '2024-06-29', value: '85777000000' });
    const q4 = makeFact({ fiscal_quarter: 4, period_end: '2024-09-28' });

    it('picks the most recent period end', () => {
      expect(resolvePeriod([q3, q4], latest)?.fact.fiscal_quarter).toBe(4);
    });

    it('respects as_of', () => {
      expect(resolvePeriod([q3, q4], { ...latest, as_of: '2024-08-01' })?.fact.fiscal_quarter).toBe(3);
    });

    it('is ambiguous when one period end carries two fiscal labels', () => {
      const mislabelled = makeFact({ fiscal_year: 2025, fiscal_quarter: 1, period_end: '2024-09-28' });
      expect(() => resolvePeriod([q4, mislabelled], latest))
        .toThrow('Period ending 2024-09-28 is labelled as 2024-Q4 and 2025-Q1');
    });

    it('skips candidates without a fiscal quarter', () => {
      const unlabelled = makeFact({ fiscal_quarter: null, period_end: '2024-12-28' });
      expect(resolvePeriod([q4, unlabelled], latest)?.fact.period_end).toBe('2024-09-28');
    });
  });

  describe('annual', () => {
    const annual = hint({ frequency: 'A', fiscal_year: 2024, fiscal_quarter: null });

    it('prefers full-year facts over quarter-labelled ones', () => {
      const fy = makeFact({ frequency: 'A', fiscal_quarter: null, value: '391035000000' });
      const q4Instant = makeFact({ frequency: 'A', fiscal_quarter: 4, value: '94930000000' });
      expect(resolvePeriod([q4Instant, fy], annual)?.fact.value).toBe('391035000000');
    });

    it('matches the fiscal year', () => {
      const fy23 = makeFact({ frequency: 'A', fiscal_quarter: null, fiscal_year: 2023, period_end: '2023-09-30', value: '383285000000' });
      expect(resolvePeriod([fy23], annual)).toBeNull();
    });
  });
});

describe('clusterByMagnitude', () => {
  it('groups values within 1.5x of the smallest in each group', () => {
    const items = ['100', '140', '160', '400', '500'].map(v => ({ value: new Decimal(v) }));
    const clusters = clusterByMagnitude(items).map(c => c.map(i => i.value.toNumber()));
    expect(clusters).toEqual([[100, 140], [160], [400, 500]]);
  });
});
