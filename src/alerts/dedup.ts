import { marketKey, pairKey, type Platform } from '../markets/types.js';
import type { AlertKind, AlertRecord } from '../memory/types.js';
import type { Signal } from '../signals/types.js';

export interface DedupPolicy {
  cooldownMinutes: number;
  reAlertDeltaBps: number;
}

export type FireDecision =
  | { fire: true; record: AlertRecord; reason: 'first' | 'cooldown_elapsed' | 'value_changed' }
  | { fire: false; reason: 'cooldown' | 'already_sent' };

export function signalKey(signal: Signal): string {
  switch (signal.kind) {
    case 'gap':
      return `gap:${pairKey(signal.pair.poly.externalId, signal.pair.kalshi.externalId)}`;
    case 'move':
      return `move:${marketKey(signal.market.platform, signal.market.externalId)}`;
    case 'correlation': {
      const { mover, laggard } = signal;
      return `correlation:${marketKey(mover.market.platform, mover.market.externalId)}|${marketKey(
        laggard.market.platform,
        laggard.market.externalId
      )}`;
    }
    case 'news':
      return `news:${signal.item.id}`;
  }
}

export function signalValue(signal: Signal): number | null {
  switch (signal.kind) {
    case 'gap':
      return signal.gapBps;
    case 'move':
      return signal.moveBps;
    case 'correlation':
      return Math.abs(signal.mover.moveBps);
    case 'news':
      return null;
  }
}

export function indexAlerts(records: AlertRecord[]): Map<string, AlertRecord> {
  return new Map(records.map((record) => [record.signalKey, record]));
}

/**
 * Whether a computed signal is worth telling someone about now. Pure
 * function of the signal and the alert history; the caller persists the
 * returned record when it fires.
 */
export function shouldFire(
  signal: Signal,
  history: ReadonlyMap<string, AlertRecord>,
  now: Date,
  policy: DedupPolicy
): FireDecision {
  const key = signalKey(signal);
  const value = signalValue(signal);
  const record: AlertRecord = {
    signalKey: key,
    kind: signal.kind,
    lastFiredAt: now.toISOString(),
    lastValue: value,
  };

  const previous = history.get(key);
  if (!previous) {
    return { fire: true, record, reason: 'first' };
  }
  if (signal.kind === 'news') {
    return { fire: false, reason: 'already_sent' };
  }

  const lastFiredAt = Date.parse(previous.lastFiredAt);
  const elapsedMs = now.getTime() - lastFiredAt;
  if (!Number.isFinite(lastFiredAt) || elapsedMs > policy.cooldownMinutes * 60_000) {
    return { fire: true, record, reason: 'cooldown_elapsed' };
  }
  if (
    value !== null &&
    (previous.lastValue === null || Math.abs(value - previous.lastValue) > policy.reAlertDeltaBps)
  ) {
    return { fire: true, record, reason: 'value_changed' };
  }
  return { fire: false, reason: 'cooldown' };
}

export interface ActiveListings {
  /** Listed external ids per platform this cycle. */
  listed: Record<Platform, ReadonlySet<string>>;
  /** Platforms whose listing could not be fetched; their records are kept. */
  unavailable: ReadonlySet<Platform>;
  /** News item ids still present in the seen history. */
  newsIds: ReadonlySet<string>;
}

function isListed(platform: Platform, id: string, active: ActiveListings): boolean {
  return active.unavailable.has(platform) || active.listed[platform].has(id);
}

/** `platform:id` market key still listed (or its platform unknown this cycle). */
function isMarketKeyListed(key: string, active: ActiveListings): boolean {
  const split = key.indexOf(':');
  const platform = key.slice(0, split);
  const id = key.slice(split + 1);
  if (platform !== 'polymarket' && platform !== 'kalshi') return false;
  return isListed(platform, id, active);
}

function isActive(record: AlertRecord, active: ActiveListings): boolean {
  const kind: AlertKind = record.kind;
  const body = record.signalKey.slice(kind.length + 1);
  switch (kind) {
    case 'news':
      return active.newsIds.has(body);
    case 'gap': {
      const [polyId = '', kalshiId = ''] = body.split('|');
      return isListed('polymarket', polyId, active) && isListed('kalshi', kalshiId, active);
    }
    case 'correlation': {
      const [moverKey = '', laggardKey = ''] = body.split('|');
      return isMarketKeyListed(moverKey, active) && isMarketKeyListed(laggardKey, active);
    }
    case 'move':
      return isMarketKeyListed(body, active);
  }
}

/** Drops records whose market, pair or news item is no longer tracked. */
export function pruneAlertHistory(records: AlertRecord[], active: ActiveListings): AlertRecord[] {
  return records.filter((record) => isActive(record, active));
}

/** Replaces (or adds) the records of fired signals; one record per key. */
export function mergeAlertRecords(records: AlertRecord[], fired: AlertRecord[]): AlertRecord[] {
  const merged = indexAlerts(records);
  for (const record of fired) {
    merged.set(record.signalKey, record);
  }
  return [...merged.values()];
}
