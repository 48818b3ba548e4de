import type { EntityRef, Fact, PeriodHint } from '../src/core/types.js';
import type { SourceAdapter } from '../src/adapters/types.js';
import type { EngineConfig } from '../src/core/config.js';
import { AdapterError } from '../src/core/errors.js';
import { Validator, type PlausibilityTable } from '../src/processing/validation.js';

// ── Shared test fixtures ──────────────────────────────────────────────

export function makeFact(overrides: Partial<Fact> = {}): Fact {
  return {
    entity_id: '0000320193',
    entity_name: 'Apple Inc.',
    concept: 'revenue',
    period_end: '2024-09-28',
    fiscal_quarter: 4,
    fiscal_year: 2024,
    frequency: 'Q',
    value: '94930000000',
    unit: 'USD',
    source_id: 'regulatory-filing',
    retrieved_at: '2024-12-01T00:00:00.000Z',
    url: 'https://www.sec.gov/Archives/edgar/data/320193/000032019324000123/',
    form: '10-K',
    filed: '2024-11-01',
    quality_flags: [],
    ...overrides,
  };
}

export function hint(overrides: Partial<PeriodHint> = {}): PeriodHint {
  return { frequency: 'Q', fiscal_year: 2024, fiscal_quarter: 4, as_of: '2025-06-30', ...overrides };
}

export function testConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    port: 3005,
    host: '127.0.0.1',
    logLevel: 'silent',
    secUserAgent: 'finkpi-tests test@example.com',
    secRequestsPerSecond: 10,
    adapterTimeoutMs: 1000,
    adapterMaxRetries: 2,
    retryBaseDelayMs: 0,
    requestDeadlineMs: 5000,
    factTtlMs: 60_000,
    liveFactTtlMs: 5_000,
    healthFailureThreshold: 3,
    healthCooldownMs: 60_000,
    ledgerPath: null,
    plausibilityPath: 'config/plausibility.json',
    ...overrides,
  };
}

export function permissiveValidator(overrides: Partial<PlausibilityTable> = {}): Validator {
  return new Validator({ version: 1, concepts: {}, entities: {}, kpis: {}, ...overrides });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

type Responder = (entity: EntityRef, concept: string, hint: PeriodHint) => Fact[] | Promise<Fact[]>;

/**
 * In-process adapter. `respond` decides per call; `calls` records every
 * (ticker, concept, period) the router asked for.
 */
export class FakeAdapter implements SourceAdapter {
  readonly supportedConcepts: ReadonlySet<string>;
  readonly calls: Array<{ ticker: string; concept: string; hint: PeriodHint }> = [];

  constructor(
    readonly id: string,
    readonly priorityTier: number,
    concepts: string[],
    private readonly respond: Responder
  ) {
    this.supportedConcepts = new Set(concepts);
  }

  async fetch(entity: EntityRef, concept: string, h: PeriodHint, signal: AbortSignal): Promise<Fact[]> {
    signal.throwIfAborted();
    this.calls.push({ ticker: entity.ticker, concept, hint: h });
    return this.respond(entity, concept, h);
  }

  callsFor(concept: string): number {
    return this.calls.filter(c => c.concept === concept).length;
  }
}

/**
 * Adapter backed by a table of facts keyed `concept|label`, where label
 * is `2024-Q4` or `2024`. Unknown keys are NotFound, as a real source
 * would answer for a period it has no filing for.
 */
export function tableAdapter(
  id: string,
  tier: number,
  table: Record<string, string>,
  build: (concept: string, fy: number, fq: number | null, value: string) => Fact = defaultBuild(id)
): FakeAdapter {
  const concepts = [...new Set(Object.keys(table).map(k => k.split('|')[0]))];
  return new FakeAdapter(id, tier, concepts, (_entity, concept, h) => {
    const facts: Fact[] = [];
    for (const [key, value] of Object.entries(table)) {
      const [c, label] = key.split('|');
      if (c !== concept) continue;
      const m = /^(\d{4})(?:-Q([1-4]))?$/.exec(label);
      if (!m) continue;
      const fy = parseInt(m[1], 10);
      const fq = m[2] ? parseInt(m[2], 10) : null;
      facts.push(build(c, fy, fq, value));
    }
    const matching = facts.filter(f => f.frequency === h.frequency);
    if (matching.length === 0) throw new AdapterError('NotFound', `No ${concept} facts`, id);
    return matching;
  });
}

const QUARTER_END = ['03-31', '06-30', '09-30', '12-31'];

function defaultBuild(id: string) {
  return (concept: string, fy: number, fq: number | null, value: string): Fact =>
    makeFact({
      concept,
      fiscal_year: fy,
      fiscal_quarter: fq,
      frequency: fq === null ? 'A' : 'Q',
      period_end: `${fy}-${QUARTER_END[(fq ?? 4) - 1]}`,
      value,
      source_id: id,
      url: `https://example.test/${id}/${concept}/${fy}${fq === null ? '' : `-Q${fq}`}`,
      filed: `${fy + 1}-01-15`,
    });
}
