export interface MarketObservation {
  price: number;
  /** ISO timestamp. */
  fetchedAt: string;
}

export interface PairObservation {
  gapBps: number;
  observedAt: string;
}

export interface Snapshot {
  /** Keyed by marketKey(platform, externalId). */
  markets: Record<string, MarketObservation>;
  /** Keyed by pairKey(polyId, kalshiId). */
  pairs: Record<string, PairObservation>;
  savedAt: string | null;
  cycleCount: number;
}

export type AlertKind = 'gap' | 'move' | 'correlation' | 'news';

export interface AlertRecord {
  signalKey: string;
  kind: AlertKind;
  lastFiredAt: string;
  /** bps magnitude for gap and move alerts, null for news. */
  lastValue: number | null;
}

export interface SeenItem {
  itemId: string;
  seenAt: string;
}

export interface PersistedState {
  snapshot: Snapshot;
  alerts: AlertRecord[];
  seenItems: SeenItem[];
}

export function emptySnapshot(): Snapshot {
  return { markets: {}, pairs: {}, savedAt: null, cycleCount: 0 };
}

export function emptyState(): PersistedState {
  return { snapshot: emptySnapshot(), alerts: [], seenItems: [] };
}
