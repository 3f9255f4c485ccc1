import { padCik, type SecClient } from './sec-client.js';
import { ResolutionError } from './errors.js';
import type { CikLookup } from './types.js';

/**
 * Company resolver: ticker -> CIK.
 *
 * Uses SEC's company tickers JSON endpoint, which maps every listed ticker
 * to its CIK. The table is fetched once per resolver and kept in memory for
 * the rest of the run.
 */

export function normalizeTicker(ticker: string): string {
  // EDGAR writes share classes with a dash (BRK-B); BRK.B and brk-b mean the same
  return ticker.trim().toUpperCase().replace(/\./g, '-');
}

export class CompanyResolver {
  private tickerMap: Map<string, CikLookup> | null = null;
  private loading: Promise<Map<string, CikLookup>> | null = null;

  constructor(private readonly client: Pick<SecClient, 'getCompanyTickers'>) {}

  /** Fetch the ticker table if it is not loaded yet. Errors propagate. */
  async load(): Promise<void> {
    await this.getTickerMap();
  }

  async resolve(ticker: string): Promise<CikLookup> {
    const map = await this.getTickerMap();
    const company = map.get(normalizeTicker(ticker));
    if (!company) {
      throw new ResolutionError(ticker.trim().toUpperCase());
    }
    // Callers get their own copy so the table stays as loaded for the whole run
    return { ...company };
  }

  private async getTickerMap(): Promise<Map<string, CikLookup>> {
    if (this.tickerMap) return this.tickerMap;

    // Share one in-flight load; a failed load can be retried by the next call
    if (!this.loading) {
      this.loading = this.fetchTickerMap().finally(() => {
        this.loading = null;
      });
    }
    this.tickerMap = await this.loading;
    return this.tickerMap;
  }

  private async fetchTickerMap(): Promise<Map<string, CikLookup>> {
    const table = await this.client.getCompanyTickers();
    const map = new Map<string, CikLookup>();

    for (const entry of Object.values(table)) {
      const ticker = entry.ticker.toUpperCase();
      // First row wins; the table lists each ticker once
      if (map.has(ticker)) continue;
      map.set(ticker, {
        cik: padCik(entry.cik_str),
        ticker,
        name: entry.title,
      });
    }

    return map;
  }
}
