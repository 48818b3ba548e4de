import type { ConceptDefinition, EntityRef, Fact, PeriodHint } from '../core/types.js';
import { AdapterError } from '../core/errors.js';
import type { RateLimiter } from '../core/rate-limiter.js';
import { companyFactsSchema, selectCandidates, SOURCE_ID } from '../processing/xbrl-facts.js';
import { getJson, type FetchFn, type SourceAdapter } from './types.js';
import type { TickerDirectory } from './ticker-directory.js';

/**
 * Regulatory filings adapter: SEC EDGAR XBRL companyfacts.
 *
 * Rate limited per SEC fair access policy (10 req/s, shared limiter).
 * SEC requires a User-Agent with contact information.
 */

const BASE_URL = 'https://data.sec.gov';

export interface SecFilingsOptions {
  fetchFn: FetchFn;
  userAgent: string;
  limiter: RateLimiter;
  directory: TickerDirectory;
  concepts: ConceptDefinition[];
  now?: () => Date;
}

export class SecFilingsAdapter implements SourceAdapter {
  readonly id = SOURCE_ID;
  readonly priorityTier = 1;
  readonly supportedConcepts: ReadonlySet<string>;
  private readonly concepts: Map<string, ConceptDefinition>;

  constructor(private readonly options: SecFilingsOptions) {
    const withXbrl = options.concepts.filter(c => c.xbrl_concepts.length > 0);
    this.concepts = new Map(withXbrl.map(c => [c.id, c]));
    this.supportedConcepts = new Set(this.concepts.keys());
  }

  async fetch(entity: EntityRef, conceptId: string, hint: PeriodHint, signal: AbortSignal): Promise<Fact[]> {
    const concept = this.concepts.get(conceptId);
    if (!concept) throw new AdapterError('NotFound', `${conceptId} is not reported in XBRL`, this.id);

    const company = await this.options.directory.lookup(entity.ticker);
    if (!company) throw new AdapterError('NotFound', `Unknown ticker ${entity.ticker.toUpperCase()}`, this.id);

    await this.options.limiter.acquire(signal);
    const url = `${BASE_URL}/api/xbrl/companyfacts/CIK${company.cik.padStart(10, '0')}.json`;
    const body = await getJson(this.options.fetchFn, this.id, url, {
      headers: { 'User-Agent': this.options.userAgent, Accept: 'application/json' },
      signal,
    });

    const parsed = companyFactsSchema.safeParse(body);
    if (!parsed.success) throw new AdapterError('Malformed', `Unexpected companyfacts shape for CIK ${company.cik}`, this.id);

    const retrievedAt = (this.options.now?.() ?? new Date()).toISOString();
    const facts = selectCandidates(parsed.data, concept, { cik: company.cik, name: parsed.data.entityName }, hint, retrievedAt);
    if (facts.length === 0) {
      throw new AdapterError('NotFound', `No ${concept.id} (${hint.frequency}) facts for ${company.ticker}`, this.id);
    }
    return facts;
  }
}
