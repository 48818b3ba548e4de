import { z } from 'zod';
import { AdapterError } from '../core/errors.js';
import type { RateLimiter } from '../core/rate-limiter.js';
import { getJson, type FetchFn } from './types.js';

/**
 * Ticker → CIK lookup backed by SEC's company_tickers.json.
 *
 * The directory is loaded once and shared. A failed load is forgotten, so
 * the next lookup tries again instead of failing for the process lifetime.
 */

export const TICKERS_URL = 'https://www.sec.gov/files/company_tickers.json';

const tickerFileSchema = z.record(
  z.object({
    cik_str: z.number(),
    ticker: z.string(),
    title: z.string(),
  })
);

export interface CikLookup {
  cik: string;
  ticker: string;
  name: string;
}

export interface TickerDirectoryOptions {
  fetchFn: FetchFn;
  userAgent: string;
  limiter: RateLimiter;
  adapterId: string;
  timeoutMs: number;
}

export class TickerDirectory {
  private loading: Promise<Map<string, CikLookup>> | null = null;

  constructor(private readonly options: TickerDirectoryOptions) {}

  async lookup(ticker: string): Promise<CikLookup | null> {
    const map = await this.load();
    return map.get(ticker.toUpperCase().trim()) ?? null;
  }

  private load(): Promise<Map<string, CikLookup>> {
    if (!this.loading) {
      this.loading = this.fetchDirectory().catch((err: unknown) => {
        this.loading = null;
        throw err;
      });
    }
    return this.loading;
  }

  private async fetchDirectory(): Promise<Map<string, CikLookup>> {
    const { fetchFn, userAgent, limiter, adapterId, timeoutMs } = this.options;
    // Shared by every caller, so it runs on its own timeout rather than one request's signal
    const signal = AbortSignal.timeout(timeoutMs);

    let body: unknown;
    try {
      await limiter.acquire(signal);
      body = await getJson(fetchFn, adapterId, TICKERS_URL, {
        headers: { 'User-Agent': userAgent, Accept: 'application/json' },
        signal,
      });
    } catch (err) {
      if (err instanceof AdapterError) throw err;
      throw new AdapterError('Unavailable', `Ticker directory load failed: ${String(err)}`, adapterId);
    }

    const parsed = tickerFileSchema.safeParse(body);
    if (!parsed.success) throw new AdapterError('Malformed', 'Unexpected company_tickers.json shape', adapterId);

    const map = new Map<string, CikLookup>();
    for (const entry of Object.values(parsed.data)) {
      const ticker = entry.ticker.toUpperCase();
      map.set(ticker, { cik: String(entry.cik_str), ticker, name: entry.title });
    }
    return map;
  }
}
