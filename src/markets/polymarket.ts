import type { MarketIntelConfig } from '../core/config.js';
import { FetchError } from '../core/errors.js';
import { getJson } from '../core/http.js';
import type { PlatformClient } from './client.js';

export interface MarketPageResult {
  markets: unknown[];
  nextOffset?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class PolymarketMarketClient implements PlatformClient {
  private gammaUrl: string;
  private pageLimit: number;
  private maxPages: number;
  private userAgent: string;

  constructor(config: MarketIntelConfig) {
    this.gammaUrl = config.polymarket.apiBase.replace(/\/$/, '');
    this.pageLimit = config.polymarket.pageLimit;
    this.maxPages = config.polymarket.maxPages;
    this.userAgent = config.fetch.userAgent;
  }

  async fetchActiveMarkets(signal?: AbortSignal): Promise<unknown[]> {
    const all: unknown[] = [];
    let offset = 0;

    for (let page = 0; page < this.maxPages; page += 1) {
      const pageResult = await this.fetchMarketsPage({
        limit: this.pageLimit,
        offset,
        active: true,
        closed: false,
        signal,
      });
      all.push(...pageResult.markets);

      if (pageResult.nextOffset != null) {
        offset = pageResult.nextOffset;
      } else if (pageResult.markets.length < this.pageLimit) {
        break;
      } else {
        offset += this.pageLimit;
      }
    }

    return all;
  }

  async fetchMarketsPage(options: {
    limit?: number;
    offset?: number;
    active?: boolean;
    closed?: boolean;
    signal?: AbortSignal;
  }): Promise<MarketPageResult> {
    const url = new URL(`${this.gammaUrl}/markets`);
    if (options.limit != null) url.searchParams.set('limit', String(options.limit));
    if (options.offset != null) url.searchParams.set('offset', String(options.offset));
    if (options.active != null) url.searchParams.set('active', options.active ? 'true' : 'false');
    if (options.closed != null) url.searchParams.set('closed', options.closed ? 'true' : 'false');
    url.searchParams.set('order', 'volume24hr');
    url.searchParams.set('ascending', 'false');

    const data = await getJson('polymarket', url, {
      userAgent: this.userAgent,
      signal: options.signal,
    });

    let list: unknown;
    let nextOffset: unknown;
    if (Array.isArray(data)) {
      list = data;
    } else if (isRecord(data)) {
      list = data.markets ?? data.data ?? data.results;
      nextOffset = data.next_offset ?? data.nextOffset;
    }
    if (!Array.isArray(list)) {
      throw new FetchError('polymarket', 'unexpected /markets response shape');
    }

    return {
      markets: list,
      nextOffset: typeof nextOffset === 'number' ? nextOffset : undefined,
    };
  }
}
