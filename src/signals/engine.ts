import type { CorrelationHint } from '../core/config.js';
import { containsPhrase } from '../core/text.js';
import { marketKey, pairKey, type Market, type MatchedPair, type Platform } from '../markets/types.js';
import type { MarketObservation, PairObservation, Snapshot } from '../memory/types.js';
import type { CorrelationLeg, CorrelationSignal, GapSignal, MoveSignal } from './types.js';

/**
 * Absolute price difference in whole basis points. Rounded so float noise
 * (0.723 - 0.551 = 0.17199999...) cannot flip an inclusive threshold.
 */
export function toBps(a: number, b: number): number {
  return Math.round(Math.abs(a - b) * 10_000);
}

export function detectGaps(pairs: MatchedPair[], thresholdBps: number): GapSignal[] {
  const signals: GapSignal[] = [];
  for (const pair of pairs) {
    const gapBps = toBps(pair.poly.price, pair.kalshi.price);
    if (gapBps < thresholdBps) continue;
    signals.push({
      kind: 'gap',
      pair,
      gapBps,
      direction: pair.poly.price >= pair.kalshi.price ? 'poly_higher' : 'kalshi_higher',
    });
  }
  return signals.sort((a, b) => b.gapBps - a.gapBps);
}

export function detectMoves(
  markets: Market[],
  snapshot: Snapshot,
  thresholdBps: number
): MoveSignal[] {
  const signals: MoveSignal[] = [];
  for (const market of markets) {
    const prior = snapshot.markets[marketKey(market.platform, market.externalId)];
    // First sighting: a baseline, not a zero move.
    if (!prior) continue;

    const moveBps = toBps(market.price, prior.price);
    if (moveBps < thresholdBps) continue;

    const priorAt = Date.parse(prior.fetchedAt);
    const elapsedMinutes = Number.isFinite(priorAt)
      ? Math.max(0, Math.round((market.fetchedAt.getTime() - priorAt) / 60_000))
      : 0;

    signals.push({
      kind: 'move',
      market,
      beforePrice: prior.price,
      afterPrice: market.price,
      moveBps,
      elapsedMinutes,
      direction: market.price >= prior.price ? 'up' : 'down',
    });
  }
  return signals.sort((a, b) => b.moveBps - a.moveBps);
}

export interface CorrelationOptions {
  thresholdBps: number;
  /** The partner counts as lagging below thresholdBps * laggardRatio. */
  laggardRatio: number;
  hints: CorrelationHint[];
}

function matchingHint(a: Market, b: Market, hints: CorrelationHint[]): CorrelationHint | null {
  for (const hint of hints) {
    const [first, second] = hint;
    if (
      (containsPhrase(a.matchTitle, first) && containsPhrase(b.matchTitle, second)) ||
      (containsPhrase(a.matchTitle, second) && containsPhrase(b.matchTitle, first))
    ) {
      return hint;
    }
  }
  return null;
}

function legKey(leg: CorrelationLeg): string {
  return marketKey(leg.market.platform, leg.market.externalId);
}

/**
 * Hinted market pairs where one side moved at least thresholdBps since the
 * last snapshot and the other stayed under the laggard limit. Markets seen
 * for the first time have no move and never take part.
 */
export function detectCorrelations(
  markets: Market[],
  snapshot: Snapshot,
  options: CorrelationOptions
): CorrelationSignal[] {
  if (options.hints.length === 0) return [];

  const legs: CorrelationLeg[] = [];
  for (const market of markets) {
    const prior = snapshot.markets[marketKey(market.platform, market.externalId)];
    if (!prior) continue;
    legs.push({
      market,
      beforePrice: prior.price,
      moveBps: Math.round((market.price - prior.price) * 10_000),
    });
  }

  const laggardLimit = options.thresholdBps * options.laggardRatio;
  const signals: CorrelationSignal[] = [];
  legs.forEach((a, index) => {
    for (const b of legs.slice(index + 1)) {
      const hint = matchingHint(a.market, b.market, options.hints);
      if (!hint) continue;
      const sizeA = Math.abs(a.moveBps);
      const sizeB = Math.abs(b.moveBps);
      if (sizeA >= options.thresholdBps && sizeB < laggardLimit) {
        signals.push({ kind: 'correlation', mover: a, laggard: b, hint });
      } else if (sizeB >= options.thresholdBps && sizeA < laggardLimit) {
        signals.push({ kind: 'correlation', mover: b, laggard: a, hint });
      }
    }
  });

  return signals.sort(
    (x, y) =>
      Math.abs(y.mover.moveBps) - Math.abs(x.mover.moveBps) ||
      legKey(x.mover).localeCompare(legKey(y.mover)) ||
      legKey(x.laggard).localeCompare(legKey(y.laggard))
  );
}

/**
 * Next snapshot to commit. Markets of a platform that could not be fetched
 * this cycle keep their previous observation so the move baseline survives
 * an outage.
 */
export function buildSnapshot(params: {
  markets: Market[];
  pairs: MatchedPair[];
  previous: Snapshot;
  failedPlatforms?: Iterable<Platform>;
  now: Date;
}): Snapshot {
  const markets: Record<string, MarketObservation> = {};
  const failed = new Set<string>(params.failedPlatforms ?? []);

  if (failed.size > 0) {
    for (const [key, observation] of Object.entries(params.previous.markets)) {
      const platform = key.slice(0, key.indexOf(':'));
      if (failed.has(platform)) {
        markets[key] = observation;
      }
    }
  }
  for (const market of params.markets) {
    markets[marketKey(market.platform, market.externalId)] = {
      price: market.price,
      fetchedAt: market.fetchedAt.toISOString(),
    };
  }

  const pairs: Record<string, PairObservation> = {};
  for (const pair of params.pairs) {
    pairs[pairKey(pair.poly.externalId, pair.kalshi.externalId)] = {
      gapBps: toBps(pair.poly.price, pair.kalshi.price),
      observedAt: params.now.toISOString(),
    };
  }

  return {
    markets,
    pairs,
    savedAt: params.now.toISOString(),
    cycleCount: params.previous.cycleCount + 1,
  };
}
