/**
 * Core data model for finkpi.
 *
 * Design principles:
 * - Facts are immutable and append-only
 * - "Latest" is resolved to an explicit fiscal period, never stored as such on a Fact
 * - KPI results reference Facts, never mutate them
 * - Provenance is always included
 */

export type Frequency = 'Q' | 'A';

export type Confidence = 'high' | 'medium' | 'low';

/** A covered company. Registered lazily on the first accepted fact. */
export interface Entity {
  id: string;
  tickers: string[];
  name: string;
}

/** What callers (and adapters) know about an entity before anything is fetched */
export interface EntityRef {
  ticker: string;
}

export interface Fact {
  entity_id: string;
  entity_name: string;
  concept: string;
  period_end: string;
  fiscal_quarter: number | null;
  fiscal_year: number;
  frequency: Frequency;
  /** Decimal string; arithmetic never goes through a JS number */
  value: string;
  unit: string;
  source_id: string;
  retrieved_at: string;
  url: string;
  form?: string;
  filed?: string;
  /** Set when the value was scraped or estimated rather than reported */
  approximate?: boolean;
  quality_flags: string[];
}

/** Requested period, as parsed from `latest | YYYY-Qn | YYYY` */
export type PeriodSpec =
  | { kind: 'latest' }
  | { kind: 'quarter'; fiscal_year: number; fiscal_quarter: number }
  | { kind: 'year'; fiscal_year: number };

export interface PeriodRequest {
  period: PeriodSpec;
  frequency: Frequency;
  ttm: boolean;
  /** YYYY-MM-DD upper bound for candidate period ends */
  as_of: string;
}

/** The period an adapter is asked for */
export interface PeriodHint {
  frequency: Frequency;
  fiscal_year: number | null;
  fiscal_quarter: number | null;
  as_of: string;
}

/** Fact store cache key */
export interface FactKey {
  entity: string;
  concept: string;
  /** Canonical period token: `2024-Q4`, `2024`, or `latest@<as_of>` */
  period: string;
  frequency: Frequency;
  /** Upper bound on `period_end`; a fact cached under one bound never answers an earlier one */
  as_of: string;
}

export type Resolution = 'exact' | 'restated' | 'heuristic';

/** A fact as selected for one key, with how it was obtained */
export interface ResolvedFact {
  fact: Fact;
  resolution: Resolution;
  source_tier: number;
  /** True when an earlier adapter in the chain failed or was rejected first */
  fallback_used: boolean;
}

export interface Citation {
  source: string;
  url: string;
  period: string;
}

export type UnitKind = 'currency' | 'shares' | 'ratio';

/** Base financial line item */
export interface ConceptDefinition {
  id: string;
  display_name: string;
  statement_type: 'income_statement' | 'balance_sheet' | 'cash_flow' | 'market';
  unit: string;
  unit_type: UnitKind;
  /** Flow concepts sum across quarters; instants are point-in-time snapshots */
  aggregation: 'flow' | 'instant';
  /** Signed concepts may legitimately be negative */
  signed: boolean;
  /** Live market data, cached for minutes rather than a day */
  live: boolean;
  /** Ordered by priority (try first = priority 1) */
  xbrl_concepts: XbrlConcept[];
}

export interface XbrlConcept {
  taxonomy: string;
  concept: string;
  priority: number;
}

export interface FactInput {
  type: 'fact';
  name: string;
  value: string;
  unit: string;
  period: string;
  facts: ResolvedFact[];
}

export interface KpiInput {
  type: 'kpi';
  result: KpiResult;
}

export interface TraceStep {
  name: string;
  formula: string;
  value: string;
  period: string;
}

export interface KpiResult {
  kpi_name: string;
  ticker: string;
  value: string;
  unit: string;
  unit_type: UnitKind;
  period_used: string;
  frequency: Frequency;
  ttm: boolean;
  inputs_used: Record<string, FactInput | KpiInput>;
  confidence: Confidence;
  citations: Citation[];
  trace: TraceStep[];
  quality_flags: string[];
}
