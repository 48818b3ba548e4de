import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { Decimal } from 'decimal.js';
import type { ConceptDefinition, Fact, Frequency } from '../core/types.js';
import { toDecimal } from './calculations.js';

/**
 * Plausibility checks on raw facts and computed KPIs.
 *
 * Only accept or reject: a value is never adjusted. Bands come from a JSON
 * table with per-concept defaults and per-ticker overrides.
 */

const band = z
  .tuple([z.number(), z.number()])
  .refine(([min, max]) => min <= max, { message: 'band min must not exceed max' });

const frequencyBands = z.object({ Q: band.optional(), A: band.optional() }).strict();

export const plausibilitySchema = z.object({
  version: z.literal(1),
  concepts: z.record(frequencyBands),
  entities: z.record(z.record(frequencyBands)).default({}),
  kpis: z.record(band).default({}),
});

export type PlausibilityTable = z.infer<typeof plausibilitySchema>;

export type ValidationOutcome = { ok: true } | { ok: false; reason: string };

const ACCEPT: ValidationOutcome = { ok: true };

export class PlausibilityError extends Error {
  constructor(public readonly path: string, message: string) {
    super(`Invalid plausibility table ${path}: ${message}`);
    this.name = 'PlausibilityError';
  }
}

export class Validator {
  constructor(private readonly table: PlausibilityTable) {}

  static fromFile(path: string): Validator {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new PlausibilityError(path, err instanceof Error ? err.message : String(err));
    }
    const parsed = plausibilitySchema.safeParse(raw);
    if (!parsed.success) {
      throw new PlausibilityError(path, parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
    }
    return new Validator(parsed.data);
  }

  /** Entity override first, then the concept default */
  bandFor(concept: string, frequency: Frequency, ticker: string): [number, number] | undefined {
    return this.table.entities[ticker.toUpperCase()]?.[concept]?.[frequency]
      ?? this.table.concepts[concept]?.[frequency];
  }

  validateFact(fact: Fact, concept: ConceptDefinition, ticker: string): ValidationOutcome {
    if (fact.unit !== concept.unit) {
      return { ok: false, reason: `unit ${fact.unit} does not match expected ${concept.unit}` };
    }
    const value = toDecimal(fact.value);
    if (!value) return { ok: false, reason: `value "${fact.value}" is not a number` };
    return this.validateValue(concept, value, fact.frequency, ticker);
  }

  /**
   * Range checks a concept value. Also used for TTM sums, which are
   * checked against the annual band.
   */
  validateValue(concept: ConceptDefinition, value: Decimal, frequency: Frequency, ticker: string): ValidationOutcome {
    if (!concept.signed && value.isNegative() && !value.isZero()) {
      return { ok: false, reason: `${concept.id} must not be negative (got ${value.toFixed()})` };
    }
    const b = this.bandFor(concept.id, frequency, ticker);
    return b ? checkBand(value, b, `${ticker.toUpperCase()} ${concept.id} (${frequency})`) : ACCEPT;
  }

  validateKpi(name: string, value: Decimal): ValidationOutcome {
    const b = this.table.kpis[name];
    return b ? checkBand(value, b, name) : ACCEPT;
  }
}

function checkBand(value: Decimal, [min, max]: [number, number], what: string): ValidationOutcome {
  if (value.lessThan(min) || value.greaterThan(max)) {
    return {
      ok: false,
      reason: `${value.toFixed()} outside [${new Decimal(min).toFixed()}, ${new Decimal(max).toFixed()}] for ${what}`,
    };
  }
  return ACCEPT;
}
