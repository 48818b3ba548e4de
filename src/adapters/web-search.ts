import { z } from 'zod';
import { Decimal } from 'decimal.js';
import type { ConceptDefinition, EntityRef, Fact, PeriodHint } from '../core/types.js';
import { AdapterError } from '../core/errors.js';
import { periodLabel } from '../analysis/period-parser.js';
import { getJson, type FetchFn, type SourceAdapter } from './types.js';

/**
 * Last-resort adapter: a JSON web search API.
 *
 * Pulls a labelled dollar amount out of the top result snippets. Every
 * fact it returns is approximate, and it only answers explicit fiscal
 * periods, since a snippet cannot say which period is "latest".
 */

export const WEB_SEARCH_ID = 'web-search';

const searchResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().default(''),
      url: z.string(),
      snippet: z.string().default(''),
      published: z.string().optional(),
    })
  ),
});

const SCALE: Record<string, number> = {
  trillion: 1e12,
  t: 1e12,
  billion: 1e9,
  bn: 1e9,
  b: 1e9,
  million: 1e6,
  mm: 1e6,
  m: 1e6,
  thousand: 1e3,
  k: 1e3,
};

const AMOUNT_RE = /\$\s?(\d{1,3}(?:,\d{3})+|\d+(?:\.\d+)?)\s*(trillion|billion|million|thousand|bn|mm|[tbmk])?\b/i;

/**
 * First dollar amount that follows a mention of the label, in dollars.
 * Returns null when the label is absent or no amount follows it.
 */
export function extractAmount(text: string, label: string): Decimal | null {
  const at = text.toLowerCase().indexOf(label.toLowerCase());
  if (at < 0) return null;
  const m = AMOUNT_RE.exec(text.slice(at + label.length));
  if (!m) return null;
  const scale = m[2] ? SCALE[m[2].toLowerCase()] ?? 1 : 1;
  return new Decimal(m[1].replace(/,/g, '')).times(scale);
}

export interface WebSearchOptions {
  fetchFn: FetchFn;
  url: string;
  apiKey: string;
  concepts: ConceptDefinition[];
  now?: () => Date;
}

export class WebSearchAdapter implements SourceAdapter {
  readonly id = WEB_SEARCH_ID;
  readonly priorityTier = 3;
  readonly supportedConcepts: ReadonlySet<string>;
  private readonly concepts: Map<string, ConceptDefinition>;

  constructor(private readonly options: WebSearchOptions) {
    const supported = options.concepts.filter(c => !c.live && c.unit_type === 'currency');
    this.concepts = new Map(supported.map(c => [c.id, c]));
    this.supportedConcepts = new Set(this.concepts.keys());
  }

  async fetch(entity: EntityRef, conceptId: string, hint: PeriodHint, signal: AbortSignal): Promise<Fact[]> {
    const concept = this.concepts.get(conceptId);
    if (!concept) throw new AdapterError('NotFound', `${conceptId} is not searchable`, this.id);
    if (hint.fiscal_year === null) {
      throw new AdapterError('NotFound', 'Web search needs an explicit fiscal period', this.id);
    }

    const symbol = entity.ticker.toUpperCase();
    const quarter = hint.frequency === 'Q' ? hint.fiscal_quarter : null;
    const label = periodLabel(hint.fiscal_year, quarter);
    const query = `${symbol} ${concept.display_name} fiscal ${quarter === null ? `year ${hint.fiscal_year}` : `Q${quarter} ${hint.fiscal_year}`}`;
    const url = `${this.options.url}?${new URLSearchParams({ q: query }).toString()}`;

    const body = await getJson(this.options.fetchFn, this.id, url, {
      headers: { Authorization: `Bearer ${this.options.apiKey}`, Accept: 'application/json' },
      signal,
    });
    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) throw new AdapterError('Malformed', 'Unexpected search response shape', this.id);

    for (const result of parsed.data.results) {
      const amount = extractAmount(`${result.title} ${result.snippet}`, concept.display_name);
      if (!amount) continue;
      const retrievedAt = (this.options.now?.() ?? new Date()).toISOString();
      return [{
        entity_id: symbol,
        entity_name: symbol,
        concept: concept.id,
        period_end: hint.as_of,
        fiscal_quarter: quarter,
        fiscal_year: hint.fiscal_year,
        frequency: hint.frequency,
        value: amount.toFixed(),
        unit: concept.unit,
        source_id: this.id,
        retrieved_at: retrievedAt,
        url: result.url,
        filed: result.published?.slice(0, 10),
        approximate: true,
        quality_flags: ['approximate', `search:${label}`],
      }];
    }

    throw new AdapterError('NotFound', `No ${concept.display_name} amount in search results for ${symbol} ${label}`, this.id);
  }
}
