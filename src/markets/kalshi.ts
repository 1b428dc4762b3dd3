import type { MarketIntelConfig } from '../core/config.js';
import { FetchError } from '../core/errors.js';
import { getJson } from '../core/http.js';
import type { PlatformClient } from './client.js';

export interface KalshiPage {
  markets: unknown[];
  cursor?: string;
}

export class KalshiMarketClient implements PlatformClient {
  private baseUrl: string;
  private pageLimit: number;
  private maxPages: number;
  private userAgent: string;

  constructor(config: MarketIntelConfig) {
    this.baseUrl = config.kalshi.apiBase.replace(/\/$/, '');
    this.pageLimit = config.kalshi.pageLimit;
    this.maxPages = config.kalshi.maxPages;
    this.userAgent = config.fetch.userAgent;
  }

  async fetchActiveMarkets(signal?: AbortSignal): Promise<unknown[]> {
    const all: unknown[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < this.maxPages; page += 1) {
      const result = await this.fetchMarketsPage({ cursor, signal });
      all.push(...result.markets);
      cursor = result.cursor;
      if (!cursor || result.markets.length === 0) break;
    }

    return all;
  }

  async fetchMarketsPage(options: { cursor?: string; signal?: AbortSignal }): Promise<KalshiPage> {
    const url = new URL(`${this.baseUrl}/markets`);
    url.searchParams.set('status', 'open');
    url.searchParams.set('limit', String(this.pageLimit));
    if (options.cursor) url.searchParams.set('cursor', options.cursor);

    const data = await getJson('kalshi', url, {
      userAgent: this.userAgent,
      signal: options.signal,
    });
    if (typeof data !== 'object' || data === null || !('markets' in data)) {
      throw new FetchError('kalshi', 'unexpected /markets response shape');
    }
    const markets: unknown = data.markets;
    if (!Array.isArray(markets)) {
      throw new FetchError('kalshi', 'markets is not an array');
    }
    const cursor: unknown = 'cursor' in data ? data.cursor : undefined;

    return {
      markets,
      cursor: typeof cursor === 'string' && cursor.length > 0 ? cursor : undefined,
    };
  }
}
