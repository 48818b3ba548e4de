import type { Decimal } from 'decimal.js';
import type {
  Citation,
  Confidence,
  FactInput,
  Frequency,
  KpiInput,
  KpiResult,
  ResolvedFact,
  TraceStep,
  UnitKind,
} from '../core/types.js';
import { formatDecimal } from '../processing/calculations.js';
import { periodLabel } from './period-parser.js';

/**
 * Builds the final KpiResult. Every result carries provenance: one
 * citation per distinct (source, period) touched, in evaluation order.
 */

export interface ComposeInput {
  name: string;
  ticker: string;
  value: Decimal;
  unit: string;
  unit_type: UnitKind;
  period_used: string;
  frequency: Frequency;
  ttm: boolean;
  inputs: Record<string, FactInput | KpiInput>;
  trace: TraceStep[];
  /** Best (lowest) priority tier in the adapter chain */
  topTier: number;
}

/** Every fact under a result, depth first, in input order */
export function collectFacts(inputs: Record<string, FactInput | KpiInput>): ResolvedFact[] {
  const out: ResolvedFact[] = [];
  for (const input of Object.values(inputs)) {
    if (input.type === 'fact') out.push(...input.facts);
    else out.push(...collectFacts(input.result.inputs_used));
  }
  return out;
}

function factPeriod(r: ResolvedFact): string {
  const { fact } = r;
  return periodLabel(fact.fiscal_year, fact.frequency === 'Q' ? fact.fiscal_quarter : null);
}

export function buildCitations(facts: ResolvedFact[]): Citation[] {
  const seen = new Set<string>();
  const citations: Citation[] = [];
  for (const r of facts) {
    const period = factPeriod(r);
    const key = `${r.fact.source_id}|${period}`;
    if (seen.has(key)) continue;
    seen.add(key);
    citations.push({ source: r.fact.source_id, url: r.fact.url, period });
  }
  return citations;
}

/**
 * high: every input came from the top tier on its first accepted source.
 * medium: some input needed a fallback source.
 * low: some input is approximate or its period was picked heuristically.
 */
export function deriveConfidence(facts: ResolvedFact[], topTier: number): Confidence {
  if (facts.some(r => r.fact.approximate === true || r.resolution === 'heuristic')) return 'low';
  if (facts.some(r => r.fallback_used || r.source_tier > topTier)) return 'medium';
  return 'high';
}

export function qualityFlags(facts: ResolvedFact[]): string[] {
  const flags = new Set<string>();
  for (const r of facts) {
    for (const f of r.fact.quality_flags) flags.add(f);
    if (r.resolution === 'restated') flags.add('restated');
    if (r.resolution === 'heuristic') flags.add('heuristic_period');
    if (r.fallback_used) flags.add(`fallback:${r.fact.source_id}`);
  }
  return [...flags];
}

export function composeResult(input: ComposeInput): KpiResult {
  const facts = collectFacts(input.inputs);
  return {
    kpi_name: input.name,
    ticker: input.ticker.toUpperCase(),
    value: formatDecimal(input.value, input.unit_type),
    unit: input.unit,
    unit_type: input.unit_type,
    period_used: input.period_used,
    frequency: input.frequency,
    ttm: input.ttm,
    inputs_used: input.inputs,
    confidence: deriveConfidence(facts, input.topTier),
    citations: buildCitations(facts),
    trace: input.trace,
    quality_flags: qualityFlags(facts),
  };
}
