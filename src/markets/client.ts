import type { MarketIntelConfig } from '../core/config.js';
import { KalshiMarketClient } from './kalshi.js';
import { PolymarketMarketClient } from './polymarket.js';
import type { Platform } from './types.js';

/** Source of raw, not yet normalized, market payloads. */
export interface MarketFetchClient {
  fetchActiveMarkets(platform: Platform, signal?: AbortSignal): Promise<unknown[]>;
}

export interface PlatformClient {
  fetchActiveMarkets(signal?: AbortSignal): Promise<unknown[]>;
}

export class HttpMarketFetchClient implements MarketFetchClient {
  private clients: Record<Platform, PlatformClient>;

  constructor(config: MarketIntelConfig) {
    this.clients = {
      polymarket: new PolymarketMarketClient(config),
      kalshi: new KalshiMarketClient(config),
    };
  }

  fetchActiveMarkets(platform: Platform, signal?: AbortSignal): Promise<unknown[]> {
    return this.clients[platform].fetchActiveMarkets(signal);
  }
}
