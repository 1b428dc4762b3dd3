import { indexAlerts, mergeAlertRecords, pruneAlertHistory, shouldFire, type DedupPolicy } from '../alerts/dedup.js';
import type { FeedConfig, Language, MarketIntelConfig } from '../core/config.js';
import { DeliveryError, errorMessage } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { filterNews } from '../intel/relevance.js';
import type { NewsFetchClient } from '../intel/rss.js';
import type { NewsItem } from '../intel/types.js';
import type { ChannelAdapter } from '../interface/channels.js';
import type { MarketFetchClient } from '../markets/client.js';
import { normalizeMarkets } from '../markets/normalize.js';
import { PLATFORMS, type Market, type MatchedPair, type Platform } from '../markets/types.js';
import { matchMarkets } from '../matching/matcher.js';
import { trimSeenHistory, type StateRepository } from '../memory/state_store.js';
import type { AlertRecord, PersistedState } from '../memory/types.js';
import {
  formatDigest,
  formatHeartbeat,
  formatSignal,
  formatStartup,
} from '../notify/formatter.js';
import { buildSnapshot, detectCorrelations, detectGaps, detectMoves } from '../signals/engine.js';
import type { Signal } from '../signals/types.js';

export type CycleStage =
  | 'load'
  | 'fetch'
  | 'parse'
  | 'gap'
  | 'move'
  | 'correlation'
  | 'news'
  | 'delivery'
  | 'commit';

export interface CycleError {
  stage: CycleStage;
  message: string;
}

export interface CycleReport {
  startedAt: string;
  finishedAt: string;
  signalsFired: number;
  fired: Record<Signal['kind'], number>;
  suppressed: number;
  /** Signals that would have fired but exceeded the per-cycle cap of their kind. */
  capped: number;
  marketsTracked: Record<Platform, number>;
  pairs: number;
  newsItems: number;
  deliveryFailures: number;
  committed: boolean;
  aborted: boolean;
  /** Committed cycles so far, including this one when it committed. */
  cycleCount: number;
  errors: CycleError[];
}

export interface ScanCycleParams {
  config: MarketIntelConfig;
  store: StateRepository;
  markets: MarketFetchClient;
  news: NewsFetchClient;
  /** Null runs the cycle without delivering anything. */
  channel: ChannelAdapter | null;
  /** Compute and report only: nothing is delivered or committed. */
  dryRun?: boolean;
  logger?: Logger;
  now?: () => Date;
}

function emptyReport(startedAt: Date): CycleReport {
  return {
    startedAt: startedAt.toISOString(),
    finishedAt: startedAt.toISOString(),
    signalsFired: 0,
    fired: { gap: 0, move: 0, correlation: 0, news: 0 },
    suppressed: 0,
    capped: 0,
    marketsTracked: { polymarket: 0, kalshi: 0 },
    pairs: 0,
    newsItems: 0,
    deliveryFailures: 0,
    committed: false,
    aborted: false,
    cycleCount: 0,
    errors: [],
  };
}

/**
 * One scan: fetch, normalize, match, detect, deduplicate, deliver, commit.
 * Safe to call repeatedly; the caller guarantees cycles never overlap.
 */
export class ScanCycle {
  private logger: Logger;
  private now: () => Date;

  constructor(private params: ScanCycleParams) {
    this.logger = params.logger ?? new Logger('info');
    this.now = params.now ?? (() => new Date());
  }

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const cfg = this.params.config;
    const now = this.now();
    const report = emptyReport(now);

    let state: PersistedState;
    try {
      state = this.params.store.load();
    } catch (error) {
      this.fail(report, 'load', 'Cannot load state; cycle skipped', error);
      return this.finish(report);
    }
    report.cycleCount = state.snapshot.cycleCount;

    const [polyRaw, kalshiRaw, newsItems] = await Promise.all([
      this.fetchPlatform('polymarket', report, signal),
      this.fetchPlatform('kalshi', report, signal),
      this.fetchNews(report, signal),
    ]);
    if (signal?.aborted) {
      return this.abort(report);
    }

    const listed: Record<Platform, Market[]> = { polymarket: [], kalshi: [] };
    const raws: Record<Platform, unknown[] | null> = { polymarket: polyRaw, kalshi: kalshiRaw };
    const failedPlatforms = new Set<Platform>();
    for (const platform of PLATFORMS) {
      const payloads = raws[platform];
      if (payloads === null) {
        failedPlatforms.add(platform);
        continue;
      }
      const result = normalizeMarkets(payloads, platform, now, {
        rules: cfg.news.rules,
        now,
      });
      for (const parseError of result.errors) {
        this.logger.debug(parseError.message);
      }
      if (result.errors.length > 0) {
        report.errors.push({
          stage: 'parse',
          message: `${platform}: ${result.errors.length} malformed record(s) skipped`,
        });
      }
      listed[platform] = result.markets;
      report.marketsTracked[platform] = result.markets.length;
    }
    const markets = [...listed.polymarket, ...listed.kalshi];

    const pairs = matchMarkets(listed.polymarket, listed.kalshi, {
      similarityFloor: cfg.matching.similarityFloor,
      restrictCategories: cfg.matching.restrictCategories,
    });
    report.pairs = pairs.length;

    const history = indexAlerts(state.alerts);
    const fired: AlertRecord[] = [];
    const policy: DedupPolicy = {
      cooldownMinutes: cfg.alerts.cooldownMinutes,
      reAlertDeltaBps: cfg.alerts.reAlertDeltaBps,
    };
    // Signals arrive biggest first, so a capped kind keeps its strongest alerts.
    const limits = cfg.alerts.maxPerCycle;
    const deliver = async (signals: Signal[]): Promise<void> => {
      for (const candidate of signals) {
        if (signal?.aborted) return;
        const decision = shouldFire(candidate, history, now, policy);
        if (!decision.fire) {
          report.suppressed += 1;
          continue;
        }
        const limit = limits[candidate.kind];
        if (limit > 0 && report.fired[candidate.kind] >= limit) {
          report.capped += 1;
          continue;
        }
        fired.push(decision.record);
        report.fired[candidate.kind] += 1;
        report.signalsFired += 1;
        await this.broadcast(report, (language) => formatSignal(candidate, language), signal);
      }
    };

    await this.runPipeline(report, 'gap', () =>
      deliver(detectGaps(pairs, cfg.alerts.thresholdBps))
    );
    await this.runPipeline(report, 'move', () =>
      deliver(detectMoves(markets, state.snapshot, cfg.alerts.thresholdBps))
    );
    if (cfg.correlation.enabled) {
      await this.runPipeline(report, 'correlation', () =>
        deliver(
          detectCorrelations(markets, state.snapshot, {
            thresholdBps: cfg.correlation.moveThresholdBps,
            laggardRatio: cfg.correlation.laggardRatio,
            hints: cfg.correlation.hints,
          })
        )
      );
    }

    let newIds: string[] = [];
    report.newsItems = newsItems.length;
    await this.runPipeline(report, 'news', async () => {
      const seen = new Set(state.seenItems.map((item) => item.itemId));
      const result = filterNews(newsItems, cfg.news.rules, seen, {
        duplicateTitleSimilarity: cfg.news.duplicateTitleSimilarity,
      });
      newIds = result.newItemIds;
      await deliver(result.signals);
    });

    if (signal?.aborted) {
      return this.abort(report);
    }

    if (this.params.dryRun) {
      this.logger.info('Dry run; state not committed');
      return this.finish(report);
    }

    const next = this.nextState({ state, markets, listed, pairs, failedPlatforms, fired, newIds, now });
    try {
      this.params.store.commit(next);
      report.committed = true;
      report.cycleCount = next.snapshot.cycleCount;
    } catch (error) {
      this.fail(report, 'commit', 'State commit failed; previous snapshot kept', error);
    }

    if (report.committed) {
      await this.sendPeriodic(report, markets, now, signal);
    }
    return this.finish(report);
  }

  /** Startup notice from the last committed snapshot. */
  async announceStartup(): Promise<void> {
    const cfg = this.params.config;
    const { snapshot } = this.params.store.load();
    const report = emptyReport(this.now());
    await this.broadcast(report, (language) =>
      formatStartup(
        {
          marketsTracked: Object.keys(snapshot.markets).length,
          pairs: Object.keys(snapshot.pairs).length,
          intervalMinutes: cfg.scan.intervalMinutes,
          thresholdBps: cfg.alerts.thresholdBps,
          cooldownMinutes: cfg.alerts.cooldownMinutes,
          languages: cfg.languages,
          feeds: cfg.news.enabled ? cfg.news.feeds.length : 0,
        },
        language
      )
    );
  }

  private nextState(params: {
    state: PersistedState;
    markets: Market[];
    listed: Record<Platform, Market[]>;
    pairs: MatchedPair[];
    failedPlatforms: Set<Platform>;
    fired: AlertRecord[];
    newIds: string[];
    now: Date;
  }): PersistedState {
    const cfg = this.params.config;
    const seenAt = params.now.toISOString();
    const seenItems = trimSeenHistory(
      [...params.state.seenItems, ...params.newIds.map((itemId) => ({ itemId, seenAt }))],
      cfg.news.seenHistoryLimit,
      cfg.news.seenHistoryKeep
    );

    const alerts = pruneAlertHistory(mergeAlertRecords(params.state.alerts, params.fired), {
      listed: {
        polymarket: new Set(params.listed.polymarket.map((market) => market.externalId)),
        kalshi: new Set(params.listed.kalshi.map((market) => market.externalId)),
      },
      unavailable: params.failedPlatforms,
      newsIds: new Set(seenItems.map((item) => item.itemId)),
    });

    const snapshot = buildSnapshot({
      markets: params.markets,
      pairs: params.pairs,
      previous: params.state.snapshot,
      failedPlatforms: params.failedPlatforms,
      now: params.now,
    });

    return { snapshot, alerts, seenItems };
  }

  private sourceSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.params.config.fetch.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }

  /** Raw payloads, or null when the platform could not be fetched. */
  private async fetchPlatform(
    platform: Platform,
    report: CycleReport,
    signal?: AbortSignal
  ): Promise<unknown[] | null> {
    try {
      return await this.params.markets.fetchActiveMarkets(platform, this.sourceSignal(signal));
    } catch (error) {
      this.fail(report, 'fetch', `Fetching ${platform} markets failed`, error);
      return null;
    }
  }

  private async fetchNews(report: CycleReport, signal?: AbortSignal): Promise<NewsItem[]> {
    const cfg = this.params.config;
    if (!cfg.news.enabled) return [];

    const fetchFeed = async (feed: FeedConfig): Promise<NewsItem[]> => {
      try {
        return await this.params.news.fetchFeedItems(feed, this.sourceSignal(signal));
      } catch (error) {
        this.fail(report, 'fetch', `Fetching feed ${feed.name} failed`, error);
        return [];
      }
    };
    const batches = await Promise.all(cfg.news.feeds.map(fetchFeed));
    return batches.flat();
  }

  private async runPipeline(
    report: CycleReport,
    stage: 'gap' | 'move' | 'correlation' | 'news',
    run: () => Promise<void>
  ): Promise<void> {
    try {
      await run();
    } catch (error) {
      this.fail(report, stage, `${stage} pipeline failed`, error);
    }
  }

  /**
   * Sends once per (language, chat target); failures are logged and counted.
   * Stops at the first target reached after `signal` aborts.
   */
  private async broadcast(
    report: CycleReport,
    render: (language: Language) => string,
    signal?: AbortSignal
  ): Promise<void> {
    const { channel, config } = this.params;
    if (!channel || this.params.dryRun || !config.telegram.enabled || config.telegram.chatIds.length === 0) {
      this.logger.debug('Delivery disabled; message not sent');
      return;
    }

    for (const language of config.languages) {
      const text = render(language);
      for (const target of config.telegram.chatIds) {
        if (signal?.aborted) return;
        try {
          await channel.sendMessage(target, text, signal);
        } catch (error) {
          if (signal?.aborted) return;
          const failure = new DeliveryError(target, language, errorMessage(error), { cause: error });
          report.deliveryFailures += 1;
          report.errors.push({ stage: 'delivery', message: failure.message });
          this.logger.warn(failure.message);
        }
      }
    }
  }

  private async sendPeriodic(
    report: CycleReport,
    markets: Market[],
    now: Date,
    signal?: AbortSignal
  ): Promise<void> {
    const { scan } = this.params.config;
    const count = report.cycleCount;
    if (scan.heartbeatEveryCycles > 0 && count % scan.heartbeatEveryCycles === 0) {
      await this.broadcast(report, (language) =>
        formatHeartbeat(
          { cycleCount: count, marketsTracked: markets.length, pairs: report.pairs, at: now },
          language
        ),
        signal
      );
    }
    if (scan.digestEveryCycles > 0 && count % scan.digestEveryCycles === 0) {
      await this.broadcast(
        report,
        (language) => formatDigest(markets, language, scan.digestSize),
        signal
      );
    }
  }

  private fail(report: CycleReport, stage: CycleStage, message: string, error: unknown): void {
    report.errors.push({ stage, message: `${message}: ${errorMessage(error)}` });
    this.logger.error(message, error);
  }

  private abort(report: CycleReport): CycleReport {
    report.aborted = true;
    this.logger.warn('Cycle aborted; nothing committed');
    return this.finish(report);
  }

  private finish(report: CycleReport): CycleReport {
    report.finishedAt = this.now().toISOString();
    this.logger.info(
      `Cycle done: ${report.signalsFired} fired, ${report.suppressed} suppressed, ` +
        `${report.marketsTracked.polymarket}+${report.marketsTracked.kalshi} markets, ` +
        `${report.pairs} pairs, ${report.capped} capped, ${report.errors.length} error(s)` +
        (report.committed ? '' : ' (not committed)')
    );
    return report;
  }
}
