import type { Frequency, PeriodHint, PeriodRequest, PeriodSpec } from '../core/types.js';
import { InvalidRequestError } from '../core/errors.js';

/**
 * Parses request periods:
 * - "latest"
 * - "2024-Q4" (fiscal quarter, frequency Q)
 * - "2024"    (fiscal year, frequency A)
 *
 * Frequency defaults from the period form; an explicit frequency that
 * contradicts it is rejected rather than reinterpreted.
 */

export interface RawPeriodRequest {
  period?: string;
  freq?: string;
  ttm?: boolean;
  as_of?: string;
}

const QUARTER_RE = /^(\d{4})-Q([1-4])$/i;
const YEAR_RE = /^(\d{4})$/;
const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function parsePeriodSpec(input: string): PeriodSpec {
  const raw = input.trim();
  if (raw.toLowerCase() === 'latest') return { kind: 'latest' };

  const q = QUARTER_RE.exec(raw);
  if (q) return { kind: 'quarter', fiscal_year: parseInt(q[1], 10), fiscal_quarter: parseInt(q[2], 10) };

  const y = YEAR_RE.exec(raw);
  if (y) return { kind: 'year', fiscal_year: parseInt(y[1], 10) };

  throw new InvalidRequestError(`Unrecognized period "${input}". Use latest, YYYY-Qn or YYYY.`);
}

function parseFrequency(input: string | undefined): Frequency | undefined {
  if (input === undefined || input === '') return undefined;
  const f = input.toUpperCase();
  if (f === 'Q' || f === 'A') return f;
  throw new InvalidRequestError(`Unrecognized frequency "${input}". Use Q or A.`);
}

export function isValidDate(input: string): boolean {
  if (!DATE_RE.test(input)) return false;
  const d = new Date(`${input}T00:00:00Z`);
  return !isNaN(d.getTime()) && d.toISOString().slice(0, 10) === input;
}

export function today(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

export function parsePeriodRequest(raw: RawPeriodRequest, now: Date = new Date()): PeriodRequest {
  const period = parsePeriodSpec(raw.period ?? 'latest');
  const explicit = parseFrequency(raw.freq);
  const ttm = raw.ttm ?? false;

  let frequency: Frequency;
  if (period.kind === 'quarter') {
    if (explicit === 'A') throw new InvalidRequestError('A fiscal quarter cannot be requested at annual frequency');
    frequency = 'Q';
  } else if (period.kind === 'year') {
    if (explicit === 'Q') throw new InvalidRequestError('A fiscal year cannot be requested at quarterly frequency');
    frequency = 'A';
  } else {
    frequency = explicit ?? 'Q';
  }

  if (ttm && frequency === 'A') {
    throw new InvalidRequestError('TTM sums quarterly values; it requires quarterly frequency');
  }

  const as_of = raw.as_of ?? today(now);
  if (!isValidDate(as_of)) throw new InvalidRequestError(`Invalid as_of date "${as_of}". Use YYYY-MM-DD.`);

  return { period, frequency, ttm, as_of };
}

// ── Labels and hints ───────────────────────────────────────────────────

export function periodLabel(fiscalYear: number, fiscalQuarter: number | null): string {
  return fiscalQuarter === null ? `${fiscalYear}` : `${fiscalYear}-Q${fiscalQuarter}`;
}

export function hintFor(request: PeriodRequest): PeriodHint {
  const { period, frequency, as_of } = request;
  switch (period.kind) {
    case 'latest':
      return { frequency, fiscal_year: null, fiscal_quarter: null, as_of };
    case 'quarter':
      return { frequency, fiscal_year: period.fiscal_year, fiscal_quarter: period.fiscal_quarter, as_of };
    case 'year':
      return { frequency, fiscal_year: period.fiscal_year, fiscal_quarter: null, as_of };
  }
}

/** Cache key token for a hint: the fiscal label, or `latest@<as_of>` */
export function periodToken(hint: PeriodHint): string {
  if (hint.fiscal_year === null) return `latest@${hint.as_of}`;
  return periodLabel(hint.fiscal_year, hint.frequency === 'Q' ? hint.fiscal_quarter : null);
}

/** The `count` fiscal quarters ending at (and including) the given one, newest first */
export function trailingQuarters(
  fiscalYear: number,
  fiscalQuarter: number,
  count: number
): Array<{ fiscal_year: number; fiscal_quarter: number }> {
  const out: Array<{ fiscal_year: number; fiscal_quarter: number }> = [];
  let fy = fiscalYear;
  let fq = fiscalQuarter;
  for (let i = 0; i < count; i++) {
    out.push({ fiscal_year: fy, fiscal_quarter: fq });
    fq -= 1;
    if (fq === 0) {
      fq = 4;
      fy -= 1;
    }
  }
  return out;
}
