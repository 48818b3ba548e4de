import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { formatCurrency, formatRatio, formatShareCount, formatValue, padRight } from '../src/output/format-utils.js';
import { renderError, renderRegistry, renderResult, renderResultJson, renderStatus } from '../src/output/result-renderer.js';
import { InvalidRequestError, NotFoundError } from '../src/core/errors.js';
import { KpiRegistry } from '../src/processing/kpi-registry.js';
import { CONCEPT_DEFINITIONS } from '../src/processing/concept-definitions.js';
import { KPI_DEFINITIONS } from '../src/processing/kpi-definitions.js';
import type { KpiResult } from '../src/core/types.js';
import type { EngineStatus } from '../src/core/engine.js';
import { makeFact } from './helpers.js';

// Plain output, whatever terminal runs the tests
chalk.level = 0;

const result: KpiResult = {
  kpi_name: 'grossMargin',
  ticker: 'AAPL',
  value: '0.452228',
  unit: 'ratio',
  unit_type: 'ratio',
  period_used: '2024-Q4',
  frequency: 'Q',
  ttm: false,
  inputs_used: {
    revenue: {
      type: 'fact',
      name: 'revenue',
      value: '94930000000',
      unit: 'USD',
      period: '2024-Q4',
      facts: [{ fact: makeFact(), resolution: 'exact', source_tier: 1, fallback_used: false }],
    },
  },
  confidence: 'high',
  citations: [{ source: 'regulatory-filing', url: 'https://example.test/r', period: '2024-Q4' }],
  trace: [{ name: 'grossMargin', formula: 'grossProfit / revenue', value: '0.452228', period: '2024-Q4' }],
  quality_flags: ['q4_derived'],
};

describe('formatCurrency', () => {
  it('formats trillions', () => {
    expect(formatCurrency(1.5e12)).toBe('$1.50T');
  });

  it('formats billions', () => {
    expect(formatCurrency(394328000000)).toBe('$394.33B');
  });

  it('formats millions', () => {
    expect(formatCurrency(5000000)).toBe('$5.00M');
  });

  it('formats thousands', () => {
    expect(formatCurrency(5000)).toBe('$5.00K');
  });

  it('formats small and negative values', () => {
    expect(formatCurrency(42)).toBe('$42');
    expect(formatCurrency(-2500000000)).toBe('-$2.50B');
  });
});

describe('formatShareCount', () => {
  it('scales share counts without a currency sign', () => {
    expect(formatShareCount(15204137000)).toBe('15.20B');
    expect(formatShareCount(950)).toBe('950');
  });
});

describe('formatValue', () => {
  it('formats by unit kind', () => {
    expect(formatRatio(0.4522279)).toBe('0.4522');
    expect(formatValue('0.452228', 'ratio')).toBe('0.4522');
    expect(formatValue('94930000000', 'currency')).toBe('$94.93B');
    expect(formatValue('15204137000', 'shares')).toBe('15.20B');
  });
});

describe('padRight', () => {
  it('ignores ANSI escapes when measuring', () => {
    expect(padRight('\x1b[31mab\x1b[39m', 4)).toBe('\x1b[31mab\x1b[39m  ');
    expect(padRight('abcdef', 4)).toBe('abcdef');
  });
});

describe('renderResult', () => {
  const lines = renderResult(result, 'Gross Margin').split('\n');

  it('leads with the value and confidence', () => {
    expect(lines[0]).toBe('AAPL — Gross Margin (2024-Q4)');
    expect(lines[3]).toBe('  Value:       0.4522 (0.452228 ratio)');
    expect(lines[4]).toBe('  Confidence:  high');
  });

  it('lists inputs with their sources', () => {
    expect(lines).toContain(`  ${'revenue'.padEnd(12)}${'$94.93B'.padEnd(12)}${'2024-Q4'.padEnd(12)}regulatory-filing`);
  });

  it('shows the calculation trace, provenance and flags', () => {
    expect(lines).toContain(`  ${'grossMargin'.padEnd(28)}${'grossProfit / revenue'.padEnd(34)}0.452228`);
    expect(lines).toContain(`  ${'regulatory-filing'.padEnd(20)}${'2024-Q4'.padEnd(12)}https://example.test/r`);
    expect(lines[lines.length - 1]).toBe('  Flags:    q4_derived');
  });

  it('marks TTM results in the header', () => {
    expect(renderResult({ ...result, ttm: true }).split('\n')[0]).toBe('AAPL — grossMargin (TTM 2024-Q4)');
  });
});

describe('renderResultJson', () => {
  it('emits the API body', () => {
    const body = JSON.parse(renderResultJson(result));
    expect(body).toMatchObject({ ticker: 'AAPL', metric: 'grossMargin', value: 0.452228, quality_flags: ['q4_derived'] });
  });
});

describe('renderError', () => {
  it('prints per-source diagnostics', () => {
    const error = new NotFoundError('No data for ZZZZ revenue (2024-Q4)', [
      { source: 'regulatory-filing', outcome: 'NotFound', message: 'Unknown ticker ZZZZ', attempts: 1 },
      { source: 'market-data', outcome: 'Unavailable', message: 'HTTP 503', attempts: 3 },
    ]);
    expect(renderError(error).split('\n')).toEqual([
      'No data found: No data for ZZZZ revenue (2024-Q4)',
      '  regulatory-filing: NotFound after 1 attempt (Unknown ticker ZZZZ)',
      '  market-data: Unavailable after 3 attempts (HTTP 503)',
    ]);
  });

  it('lists what is available for an unknown metric', () => {
    const error = new InvalidRequestError('Unknown metric "priceToBook"', ['revenue', 'grossMargin']);
    expect(renderError(error)).toBe('Invalid request: Unknown metric "priceToBook"\n  Available: revenue, grossMargin');
  });
});

describe('renderRegistry', () => {
  it('lists every concept and KPI', () => {
    const output = renderRegistry(new KpiRegistry(CONCEPT_DEFINITIONS, KPI_DEFINITIONS));
    expect(output).toContain('Base Concepts');
    expect(output).toContain(`  ${'marketCap'.padEnd(30)}${'Market Capitalization'.padEnd(32)}instant, live`);
    expect(output).toContain(`  ${' '.repeat(30)}grossProfit / revenue  [ratio]`);
  });
});

describe('renderStatus', () => {
  it('shows each adapter with its last error', () => {
    const status: EngineStatus = {
      status: 'degraded',
      adapters: [
        {
          id: 'regulatory-filing',
          tier: 1,
          status: 'degraded',
          consecutive_failures: 3,
          last_error: 'HTTP 503',
          last_error_at: '2025-06-30T12:00:00.000Z',
          last_success_at: null,
        },
      ],
      store: { entries: 2, inFlight: 0 },
      entities: 1,
    };
    const lines = renderStatus(status).split('\n');
    expect(lines).toContain('  Overall: degraded');
    expect(lines).toContain('  regulatory-filing     tier 1  degraded  failures 3');
    expect(lines).toContain(`  ${' '.repeat(22)}last error: HTTP 503`);
    expect(lines).toContain('  Fact store: 2 entries, 0 in flight');
    expect(lines).toContain('  Entities:   1');
  });
});
