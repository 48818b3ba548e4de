import { z } from 'zod';
import { Decimal } from 'decimal.js';
import type { ConceptDefinition, Fact, Frequency, PeriodHint } from '../core/types.js';

/**
 * XBRL companyfacts → candidate Facts.
 *
 * Every fact in companyfacts carries the fy/fp of the filing that reported
 * it, not of the period it measures: a FY2024 10-K reports FY2023 and
 * FY2022 comparatives under fy=2024. The measured period's fiscal labels
 * are therefore derived by shifting the filing's own label back by the
 * distance between the filing's report period end and the fact's end.
 *
 * Fiscal Q4 is rarely filed on its own. When no single-quarter value exists
 * for a fiscal year end, it is derived as FY minus the nine-month YTD value
 * and flagged `q4_derived`.
 */

export const SOURCE_ID = 'regulatory-filing';

const DAY_MS = 24 * 60 * 60 * 1000;
const QUARTER_DAYS = 365.25 / 4;
/** Tolerance when matching a date offset to a whole number of quarters */
const SLACK_DAYS = 20;

export const secFactSchema = z.object({
  end: z.string(),
  val: z.number(),
  accn: z.string(),
  fy: z.number().nullable().optional(),
  fp: z.string().nullable().optional(),
  form: z.string(),
  filed: z.string(),
  start: z.string().optional(),
  frame: z.string().optional(),
});

export type SecFact = z.infer<typeof secFactSchema>;

export const conceptUnitsSchema = z.object({
  units: z.record(z.array(secFactSchema)),
});

export const companyFactsSchema = z.object({
  cik: z.union([z.number(), z.string()]),
  entityName: z.string(),
  facts: z.record(z.record(z.unknown())),
});

export type CompanyFacts = z.infer<typeof companyFactsSchema>;

export interface FilingEntity {
  cik: string;
  name: string;
}

/** Unit-scoped raw facts for one XBRL concept, or [] when the company never reported it */
export function extractFacts(companyFacts: CompanyFacts, taxonomy: string, concept: string, unit: string): SecFact[] {
  const raw = companyFacts.facts[taxonomy]?.[concept];
  if (raw === undefined) return [];
  const parsed = conceptUnitsSchema.safeParse(raw);
  if (!parsed.success) return [];
  return parsed.data.units[unit] ?? [];
}

export function filingUrl(cik: string, accession: string): string {
  return `https://www.sec.gov/Archives/edgar/data/${cik}/${accession.replace(/-/g, '')}/`;
}

function days(from: string, to: string): number {
  return (Date.parse(to) - Date.parse(from)) / DAY_MS;
}

function isPeriodicForm(form: string): boolean {
  return form.startsWith('10-Q') || form.startsWith('10-K');
}

/** The filing's own quarter as an absolute index (fy * 4 + q - 1); FY counts as Q4 */
function filingQuarterIndex(fact: SecFact): number | null {
  if (!fact.fy || !fact.fp) return null;
  if (fact.fp === 'FY') return fact.fy * 4 + 3;
  const m = /^Q([1-4])$/.exec(fact.fp);
  return m ? fact.fy * 4 + parseInt(m[1], 10) - 1 : null;
}

/** Number of whole quarters between two dates, or null when the gap is not close to one */
function quarterShift(later: string, earlier: string): number | null {
  const gap = days(earlier, later);
  const shift = Math.round(gap / QUARTER_DAYS);
  return Math.abs(gap - shift * QUARTER_DAYS) <= SLACK_DAYS ? shift : null;
}

interface Labelled {
  raw: SecFact;
  frequency: Frequency;
  fiscal_year: number;
  fiscal_quarter: number | null;
  /** Duration in days; null for instants */
  duration: number | null;
}

/**
 * Assigns measured-period fiscal labels to every usable raw fact.
 * Returns quarterly, annual and nine-month YTD entries; the caller decides
 * which frequency it wants.
 */
function labelFacts(facts: SecFact[], aggregation: 'flow' | 'instant'): { labelled: Labelled[]; ytd9: Labelled[] } {
  // Report period end of each filing = the latest end date it reports for this concept
  const reportEnd = new Map<string, string>();
  for (const f of facts) {
    const current = reportEnd.get(f.accn);
    if (current === undefined || f.end > current) reportEnd.set(f.accn, f.end);
  }

  const labelled: Labelled[] = [];
  const ytd9: Labelled[] = [];

  for (const raw of facts) {
    if (!isPeriodicForm(raw.form)) continue;
    const filingIdx = filingQuarterIndex(raw);
    const end = reportEnd.get(raw.accn);
    if (filingIdx === null || end === undefined) continue;

    const shift = quarterShift(end, raw.end);
    if (shift === null) continue;
    const idx = filingIdx - shift;
    const fiscal_year = Math.floor(idx / 4);
    const fiscal_quarter = (idx % 4) + 1;

    if (aggregation === 'instant') {
      if (raw.start !== undefined) continue;
      labelled.push({ raw, frequency: 'Q', fiscal_year, fiscal_quarter, duration: null });
      if (fiscal_quarter === 4 && raw.form.startsWith('10-K')) {
        labelled.push({ raw, frequency: 'A', fiscal_year, fiscal_quarter: null, duration: null });
      }
      continue;
    }

    if (raw.start === undefined) continue;
    const duration = days(raw.start, raw.end);
    if (duration >= 60 && duration <= 120) {
      labelled.push({ raw, frequency: 'Q', fiscal_year, fiscal_quarter, duration });
    } else if (duration >= 330 && duration <= 400 && raw.form.startsWith('10-K') && fiscal_quarter === 4) {
      labelled.push({ raw, frequency: 'A', fiscal_year, fiscal_quarter: null, duration });
    } else if (duration >= 240 && duration <= 300 && fiscal_quarter === 3) {
      ytd9.push({ raw, frequency: 'Q', fiscal_year, fiscal_quarter, duration });
    }
  }

  return { labelled, ytd9 };
}

/** Q4 = FY − nine-month YTD, for fiscal years with no single-quarter Q4 on file */
function deriveQ4(labelled: Labelled[], ytd9: Labelled[]): Array<{ source: Labelled; value: Decimal; filed: string }> {
  const haveQ4 = new Set(
    labelled.filter(l => l.frequency === 'Q' && l.fiscal_quarter === 4).map(l => l.fiscal_year)
  );
  const out: Array<{ source: Labelled; value: Decimal; filed: string }> = [];

  for (const annual of labelled) {
    if (annual.frequency !== 'A' || haveQ4.has(annual.fiscal_year) || annual.raw.start === undefined) continue;
    const annualStart = annual.raw.start;
    // Latest-filed nine-month value covering the same fiscal year
    const match = ytd9
      .filter(y => y.fiscal_year === annual.fiscal_year && y.raw.start !== undefined && Math.abs(days(annualStart, y.raw.start)) <= 7)
      .sort((a, b) => b.raw.filed.localeCompare(a.raw.filed))[0];
    if (!match) continue;
    const value = new Decimal(annual.raw.val).minus(match.raw.val);
    out.push({ source: annual, value, filed: annual.raw.filed > match.raw.filed ? annual.raw.filed : match.raw.filed });
  }
  return out;
}

/**
 * Candidate facts of the requested frequency for one XBRL concept.
 * Period selection and deduplication are left to the period resolver.
 */
export function toCandidates(
  raw: SecFact[],
  concept: ConceptDefinition,
  entity: FilingEntity,
  frequency: Frequency,
  retrievedAt: string
): Fact[] {
  const { labelled, ytd9 } = labelFacts(raw, concept.aggregation);

  const base = (l: Labelled) => ({
    entity_id: entity.cik,
    entity_name: entity.name,
    concept: concept.id,
    period_end: l.raw.end,
    fiscal_year: l.fiscal_year,
    frequency,
    unit: concept.unit,
    source_id: SOURCE_ID,
    retrieved_at: retrievedAt,
    url: filingUrl(entity.cik, l.raw.accn),
    form: l.raw.form,
  });

  const facts: Fact[] = labelled
    .filter(l => l.frequency === frequency)
    .map(l => ({
      ...base(l),
      fiscal_quarter: l.fiscal_quarter,
      value: new Decimal(l.raw.val).toFixed(),
      filed: l.raw.filed,
      quality_flags: [],
    }));

  if (frequency === 'Q' && concept.aggregation === 'flow') {
    for (const d of deriveQ4(labelled, ytd9)) {
      facts.push({
        ...base(d.source),
        fiscal_quarter: 4,
        value: d.value.toFixed(),
        filed: d.filed,
        quality_flags: ['q4_derived'],
      });
    }
  }

  return facts;
}

/**
 * Picks which XBRL concept answers the request. Companies switch tags
 * over the years, so for `latest` the concept with the most recent period
 * wins (ties go to priority); for an explicit period the first concept by
 * priority that has it wins.
 */
export function selectCandidates(
  companyFacts: CompanyFacts,
  concept: ConceptDefinition,
  entity: FilingEntity,
  hint: PeriodHint,
  retrievedAt: string
): Fact[] {
  let best: { facts: Fact[]; maxEnd: string } | null = null;

  for (const x of [...concept.xbrl_concepts].sort((a, b) => a.priority - b.priority)) {
    const raw = extractFacts(companyFacts, x.taxonomy, x.concept, concept.unit);
    if (raw.length === 0) continue;

    const facts = toCandidates(raw, concept, entity, hint.frequency, retrievedAt)
      .filter(f => f.period_end <= hint.as_of);
    if (facts.length === 0) continue;

    if (hint.fiscal_year !== null) {
      const wanted = facts.filter(
        f => f.fiscal_year === hint.fiscal_year && (hint.frequency === 'A' || f.fiscal_quarter === hint.fiscal_quarter)
      );
      if (wanted.length > 0) return wanted;
      continue;
    }

    const maxEnd = facts.reduce((m, f) => (f.period_end > m ? f.period_end : m), facts[0].period_end);
    if (!best || maxEnd > best.maxEnd) best = { facts, maxEnd };
  }

  return best?.facts ?? [];
}
