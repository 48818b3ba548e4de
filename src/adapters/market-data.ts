import { z } from 'zod';
import { Decimal } from 'decimal.js';
import type { ConceptDefinition, EntityRef, Fact, PeriodHint } from '../core/types.js';
import { AdapterError } from '../core/errors.js';
import { toDecimal } from '../processing/calculations.js';
import { filingUrl } from '../processing/xbrl-facts.js';
import { getJson, type FetchFn, type SourceAdapter } from './types.js';

/**
 * Market data adapter (Finnhub).
 *
 * - /stock/financials-reported: as-reported statements with the issuer's
 *   own fiscal year/quarter, used for every XBRL-backed concept
 * - /stock/profile2: live market capitalization (reported in millions)
 */

const FINNHUB_API_BASE = 'https://finnhub.io/api/v1';
export const MARKET_DATA_ID = 'market-data';

const lineItemSchema = z.object({
  concept: z.string(),
  unit: z.string().optional(),
  value: z.union([z.number(), z.string()]),
});

const filingSchema = z.object({
  accessNumber: z.string(),
  cik: z.string().optional(),
  year: z.number(),
  quarter: z.number(),
  form: z.string(),
  startDate: z.string(),
  endDate: z.string(),
  filedDate: z.string(),
  report: z.object({
    bs: z.array(lineItemSchema).optional(),
    ic: z.array(lineItemSchema).optional(),
    cf: z.array(lineItemSchema).optional(),
  }),
});

const financialsSchema = z.object({
  cik: z.string().optional(),
  symbol: z.string().optional(),
  data: z.array(filingSchema).nullable().optional(),
});

const profileSchema = z.object({
  name: z.string().optional(),
  ticker: z.string().optional(),
  marketCapitalization: z.number().optional(),
});

type Filing = z.infer<typeof filingSchema>;
type LineItem = z.infer<typeof lineItemSchema>;

export interface MarketDataOptions {
  fetchFn: FetchFn;
  apiKey: string;
  concepts: ConceptDefinition[];
  now?: () => Date;
}

function buildFinnhubUrl(path: string, params: Record<string, string>): string {
  return `${FINNHUB_API_BASE}${path}?${new URLSearchParams(params).toString()}`;
}

const day = (finnhubDate: string) => finnhubDate.slice(0, 10);

function statementItems(filing: Filing, concept: ConceptDefinition): LineItem[] {
  switch (concept.statement_type) {
    case 'balance_sheet': return filing.report.bs ?? [];
    case 'income_statement': return filing.report.ic ?? [];
    case 'cash_flow': return filing.report.cf ?? [];
    case 'market': return [];
  }
}

export class MarketDataAdapter implements SourceAdapter {
  readonly id = MARKET_DATA_ID;
  readonly priorityTier = 2;
  readonly supportedConcepts: ReadonlySet<string>;
  private readonly concepts: Map<string, ConceptDefinition>;

  constructor(private readonly options: MarketDataOptions) {
    const supported = options.concepts.filter(c => c.live || c.xbrl_concepts.length > 0);
    this.concepts = new Map(supported.map(c => [c.id, c]));
    this.supportedConcepts = new Set(this.concepts.keys());
  }

  private now(): Date {
    return this.options.now?.() ?? new Date();
  }

  async fetch(entity: EntityRef, conceptId: string, hint: PeriodHint, signal: AbortSignal): Promise<Fact[]> {
    const concept = this.concepts.get(conceptId);
    if (!concept) throw new AdapterError('NotFound', `${conceptId} is not provided by ${this.id}`, this.id);
    return concept.live
      ? this.fetchLive(entity, concept, hint, signal)
      : this.fetchReported(entity, concept, hint, signal);
  }

  // ── As-reported financials ───────────────────────────────────────────

  private async fetchReported(entity: EntityRef, concept: ConceptDefinition, hint: PeriodHint, signal: AbortSignal): Promise<Fact[]> {
    const symbol = entity.ticker.toUpperCase();
    const url = buildFinnhubUrl('/stock/financials-reported', {
      symbol,
      freq: hint.frequency === 'Q' ? 'quarterly' : 'annual',
      token: this.options.apiKey,
    });
    const parsed = financialsSchema.safeParse(await getJson(this.options.fetchFn, this.id, url, { signal }));
    if (!parsed.success) throw new AdapterError('Malformed', 'Unexpected financials-reported shape', this.id);

    const filings = parsed.data.data ?? [];
    if (filings.length === 0) throw new AdapterError('NotFound', `No reported financials for ${symbol}`, this.id);

    const tags = [...concept.xbrl_concepts]
      .sort((a, b) => a.priority - b.priority)
      .map(x => `${x.taxonomy}_${x.concept}`);
    const retrievedAt = this.now().toISOString();
    const facts: Fact[] = [];

    for (const filing of filings) {
      const quarterly = filing.quarter >= 1 && filing.quarter <= 4;
      if ((hint.frequency === 'Q') !== quarterly) continue;

      // 10-Q cash flow statements are year-to-date; keep single-quarter durations only
      if (hint.frequency === 'Q' && concept.aggregation === 'flow') {
        const duration = (Date.parse(day(filing.endDate)) - Date.parse(day(filing.startDate))) / 86_400_000;
        if (duration < 60 || duration > 120) continue;
      }

      const items = statementItems(filing, concept);
      const item = tags.map(tag => items.find(i => i.concept === tag)).find(i => i !== undefined);
      if (!item) continue;

      const value = toDecimal(item.value);
      if (!value) continue;

      const cik = filing.cik ?? parsed.data.cik ?? symbol;
      facts.push({
        entity_id: cik,
        entity_name: parsed.data.symbol ?? symbol,
        concept: concept.id,
        period_end: day(filing.endDate),
        fiscal_quarter: quarterly ? filing.quarter : null,
        fiscal_year: filing.year,
        frequency: hint.frequency,
        value: value.toFixed(),
        unit: item.unit === undefined || item.unit.toLowerCase() === 'usd' ? 'USD' : item.unit.toUpperCase(),
        source_id: this.id,
        retrieved_at: retrievedAt,
        url: filingUrl(cik, filing.accessNumber),
        form: filing.form,
        filed: day(filing.filedDate),
        quality_flags: [],
      });
    }

    if (facts.length === 0) {
      throw new AdapterError('NotFound', `No ${concept.id} (${hint.frequency}) in reported financials for ${symbol}`, this.id);
    }
    return facts;
  }

  // ── Live quote data ──────────────────────────────────────────────────

  private async fetchLive(entity: EntityRef, concept: ConceptDefinition, hint: PeriodHint, signal: AbortSignal): Promise<Fact[]> {
    const now = this.now();
    const today = now.toISOString().slice(0, 10);
    if (hint.fiscal_year !== null || hint.as_of < today) {
      throw new AdapterError('NotFound', `${concept.id} is live data with no history`, this.id);
    }

    const symbol = entity.ticker.toUpperCase();
    const url = buildFinnhubUrl('/stock/profile2', { symbol, token: this.options.apiKey });
    const parsed = profileSchema.safeParse(await getJson(this.options.fetchFn, this.id, url, { signal }));
    if (!parsed.success) throw new AdapterError('Malformed', 'Unexpected profile2 shape', this.id);

    const cap = parsed.data.marketCapitalization;
    if (cap === undefined) throw new AdapterError('NotFound', `No market data for ${symbol}`, this.id);

    // Live values carry calendar labels; there is no fiscal period to attach them to
    const quarter = Math.floor(now.getUTCMonth() / 3) + 1;
    return [{
      entity_id: symbol,
      entity_name: parsed.data.name ?? symbol,
      concept: concept.id,
      period_end: today,
      fiscal_quarter: hint.frequency === 'Q' ? quarter : null,
      fiscal_year: now.getUTCFullYear(),
      frequency: hint.frequency,
      value: new Decimal(cap).times(1_000_000).toFixed(),
      unit: concept.unit,
      source_id: this.id,
      retrieved_at: now.toISOString(),
      url: `https://finnhub.io/api/v1/stock/profile2?symbol=${encodeURIComponent(symbol)}`,
      quality_flags: ['live_quote'],
    }];
  }
}
