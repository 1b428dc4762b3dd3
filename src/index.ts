/**
 * market-intel
 *
 * Cross-platform prediction market scanner: matches equivalent Polymarket
 * and Kalshi markets, detects price gaps, big moves and relevant news, and
 * sends deduplicated multilingual alerts.
 */

export {
  ConfigSchema,
  SUPPORTED_LANGUAGES,
  loadConfig,
  parseConfig,
  redactConfig,
  type CategoryRule,
  type FeedConfig,
  type Language,
  type MarketIntelConfig,
} from './core/config.js';
export { DeliveryError, FetchError, ParseError, PersistenceError } from './core/errors.js';
export { Logger, type LogLevel } from './core/logger.js';

export * from './markets/types.js';
export { normalizeMarket, normalizeMarkets } from './markets/normalize.js';
export { HttpMarketFetchClient, type MarketFetchClient } from './markets/client.js';
export { matchMarkets, type MatchOptions } from './matching/matcher.js';
export { titleSimilarity } from './matching/similarity.js';

export * from './signals/types.js';
export {
  buildSnapshot,
  detectCorrelations,
  detectGaps,
  detectMoves,
  toBps,
  type CorrelationOptions,
} from './signals/engine.js';
export type { NewsItem } from './intel/types.js';
export { RssFetcher, type NewsFetchClient } from './intel/rss.js';
export { filterNews } from './intel/relevance.js';
export { pruneAlertHistory, shouldFire, signalKey, type DedupPolicy } from './alerts/dedup.js';

export * from './memory/types.js';
export { StateStore, type StateRepository } from './memory/state_store.js';
export { formatSignal, escapeHtml } from './notify/formatter.js';
export type { ChannelAdapter } from './interface/channels.js';
export { TelegramAdapter } from './interface/telegram.js';
export { ScanCycle, type CycleReport, type CycleError } from './scanner/cycle.js';
export { ScanScheduler } from './scanner/scheduler.js';

// Version
export const VERSION = '0.1.0';
