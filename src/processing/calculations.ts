import { Decimal } from 'decimal.js';

/**
 * Decimal arithmetic for KPI formulas. Values travel as decimal strings
 * and are only converted to a JS number at the HTTP boundary.
 */

/** Thrown by divide(); the engine turns it into an UndefinedError for the KPI being computed */
export class DivisionByZeroError extends Error {
  constructor(public readonly denominator: string) {
    super(`${denominator} is zero`);
    this.name = 'DivisionByZeroError';
  }
}

export function toDecimal(value: string | number): Decimal | null {
  try {
    const d = new Decimal(value);
    return d.isFinite() ? d : null;
  } catch {
    // decimal.js throws on unparseable input
    return null;
  }
}

export function sum(values: Decimal[]): Decimal {
  return values.reduce((acc, v) => acc.plus(v), new Decimal(0));
}

export function divide(numerator: Decimal, denominator: Decimal, denominatorName = 'denominator'): Decimal {
  if (denominator.isZero()) throw new DivisionByZeroError(denominatorName);
  return numerator.dividedBy(denominator);
}

/**
 * Canonical string form of a value: ratios keep six decimal places,
 * currency and share counts keep two. Never exponent notation.
 */
export function formatDecimal(value: Decimal, unitType: 'currency' | 'shares' | 'ratio'): string {
  const places = unitType === 'ratio' ? 6 : 2;
  return value.toDecimalPlaces(places, Decimal.ROUND_HALF_EVEN).toFixed();
}

/** Ratio of the larger to the smaller magnitude; Infinity when exactly one is zero */
export function magnitudeRatio(a: Decimal, b: Decimal): number {
  const x = a.abs();
  const y = b.abs();
  if (x.isZero() && y.isZero()) return 1;
  if (x.isZero() || y.isZero()) return Infinity;
  const [hi, lo] = x.greaterThan(y) ? [x, y] : [y, x];
  return hi.dividedBy(lo).toNumber();
}
