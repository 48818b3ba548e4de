import type { Decimal } from 'decimal.js';
import type { Fact, PeriodHint, Resolution } from '../core/types.js';
import { AmbiguousPeriodError } from '../core/errors.js';
import { magnitudeRatio, toDecimal } from './calculations.js';
import { periodLabel } from '../analysis/period-parser.js';

/**
 * Picks one canonical fact out of the candidates a single adapter returned.
 *
 * Candidates for the same fiscal period can disagree when a later filing
 * restated the figure, or when an annual value is mislabeled quarterly.
 * Restatements resolve to the most recently filed value. A quarterly flow
 * whose candidates differ in magnitude resolves to the smaller one, and the
 * result is marked 'heuristic'. Anything else is ambiguous.
 */

/** Values within this factor of each other are considered the same figure reported differently */
export const COMPARABLE_MAGNITUDE = 1.5;

export interface PeriodResolution {
  fact: Fact;
  resolution: Resolution;
}

interface Candidate {
  fact: Fact;
  value: Decimal;
}

export function resolvePeriod(
  candidates: Fact[],
  hint: PeriodHint,
  aggregation: 'flow' | 'instant' = 'flow'
): PeriodResolution | null {
  const pool: Candidate[] = [];
  for (const fact of candidates) {
    if (fact.frequency !== hint.frequency || fact.period_end > hint.as_of) continue;
    const value = toDecimal(fact.value);
    if (value) pool.push({ fact, value });
  }

  const group = hint.frequency === 'Q' ? quarterlyGroup(pool, hint) : annualGroup(pool, hint);
  if (group.length === 0) return null;

  const clusters = clusterByMagnitude(group);
  if (clusters.length === 1) return pickWithinCluster(clusters[0]);

  const label = describe(group[0].fact);
  if (hint.frequency === 'Q' && aggregation === 'flow') {
    // Smaller magnitude wins: a full-year figure tagged as a quarter is the usual culprit
    const picked = pickWithinCluster(clusters[0]);
    return { fact: picked.fact, resolution: 'heuristic' };
  }
  throw new AmbiguousPeriodError(
    `${group[0].fact.concept} ${label}: ${clusters.length} candidates of different magnitude (` +
      clusters.map(c => c[0].fact.value).join(', ') + ')'
  );
}

function quarterlyGroup(pool: Candidate[], hint: PeriodHint): Candidate[] {
  const labelled = pool.filter(c => c.fact.fiscal_quarter !== null);
  if (hint.fiscal_year !== null && hint.fiscal_quarter !== null) {
    return labelled.filter(
      c => c.fact.fiscal_year === hint.fiscal_year && c.fact.fiscal_quarter === hint.fiscal_quarter
    );
  }
  // Latest: the most recent quarter end, keeping only fiscal-labelled candidates
  const latestEnd = maxPeriodEnd(labelled);
  if (latestEnd === null) return [];
  const atEnd = labelled.filter(c => c.fact.period_end === latestEnd);
  // Two different fiscal labels on the same period end means the source disagrees with itself
  const labels = new Set(atEnd.map(c => describe(c.fact)));
  if (labels.size > 1) {
    throw new AmbiguousPeriodError(`Period ending ${latestEnd} is labelled as ${[...labels].join(' and ')}`);
  }
  return atEnd;
}

function annualGroup(pool: Candidate[], hint: PeriodHint): Candidate[] {
  const unquartered = pool.filter(c => c.fact.fiscal_quarter === null);
  const usable = unquartered.length > 0 ? unquartered : pool;
  if (hint.fiscal_year !== null) {
    return usable.filter(c => c.fact.fiscal_year === hint.fiscal_year);
  }
  const latestEnd = maxPeriodEnd(usable);
  return latestEnd === null ? [] : usable.filter(c => c.fact.period_end === latestEnd);
}

function maxPeriodEnd(pool: Candidate[]): string | null {
  let max: string | null = null;
  for (const c of pool) if (max === null || c.fact.period_end > max) max = c.fact.period_end;
  return max;
}

/** Groups candidates of comparable magnitude, smallest cluster first */
export function clusterByMagnitude<T extends { value: Decimal }>(items: T[]): T[][] {
  const sorted = [...items].sort((a, b) => a.value.abs().comparedTo(b.value.abs()));
  const clusters: T[][] = [];
  for (const item of sorted) {
    const current = clusters[clusters.length - 1];
    if (current && magnitudeRatio(current[0].value, item.value) < COMPARABLE_MAGNITUDE) {
      current.push(item);
    } else {
      clusters.push([item]);
    }
  }
  return clusters;
}

function pickWithinCluster(cluster: Candidate[]): PeriodResolution {
  const distinct = new Set(cluster.map(c => c.value.toString()));
  const byFiled = [...cluster].sort((a, b) => (b.fact.filed ?? '').localeCompare(a.fact.filed ?? ''));
  const newest = byFiled[0];

  if (distinct.size === 1) return { fact: newest.fact, resolution: 'exact' };

  // Restated: the newest filing must be strictly newer than every filing that disagrees with it
  const newestFiled = newest.fact.filed;
  const contested = byFiled.some(
    c => !c.value.equals(newest.value) && (newestFiled === undefined || (c.fact.filed ?? '') >= newestFiled)
  );
  if (!contested) return { fact: newest.fact, resolution: 'restated' };

  throw new AmbiguousPeriodError(
    `${newest.fact.concept} ${describe(newest.fact)}: ${distinct.size} comparable values ` +
      `(${[...distinct].join(', ')}) with no later filing to prefer`
  );
}

function describe(fact: Fact): string {
  return fact.frequency === 'Q' ? periodLabel(fact.fiscal_year, fact.fiscal_quarter) : periodLabel(fact.fiscal_year, null);
}
