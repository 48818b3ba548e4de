import type { EngineConfig } from '../core/config.js';
import type { ConceptDefinition } from '../core/types.js';
import { RateLimiter } from '../core/rate-limiter.js';
import { SecFilingsAdapter } from './sec-filings.js';
import { MarketDataAdapter } from './market-data.js';
import { WebSearchAdapter } from './web-search.js';
import { TickerDirectory } from './ticker-directory.js';
import type { FetchFn, SourceAdapter } from './types.js';

/**
 * Static adapter registry. The chain is fixed at startup: an adapter whose
 * credentials are not configured is left out rather than replaced by
 * placeholder data.
 */
export function buildAdapters(
  config: EngineConfig,
  concepts: ConceptDefinition[],
  fetchFn: FetchFn = globalThis.fetch
): SourceAdapter[] {
  const limiter = new RateLimiter(config.secRequestsPerSecond);
  const directory = new TickerDirectory({
    fetchFn,
    userAgent: config.secUserAgent,
    limiter,
    adapterId: 'regulatory-filing',
    timeoutMs: config.adapterTimeoutMs,
  });

  const adapters: SourceAdapter[] = [
    new SecFilingsAdapter({ fetchFn, userAgent: config.secUserAgent, limiter, directory, concepts }),
  ];

  if (config.finnhubApiKey) {
    adapters.push(new MarketDataAdapter({ fetchFn, apiKey: config.finnhubApiKey, concepts }));
  }
  if (config.searchApiUrl && config.searchApiKey) {
    adapters.push(new WebSearchAdapter({ fetchFn, url: config.searchApiUrl, apiKey: config.searchApiKey, concepts }));
  }

  return adapters.sort((a, b) => a.priorityTier - b.priorityTier);
}
