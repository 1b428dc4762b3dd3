import type { Market, MatchedPair } from '../markets/types.js';
import type { NewsItem } from '../intel/types.js';

export interface GapSignal {
  kind: 'gap';
  pair: MatchedPair;
  gapBps: number;
  direction: 'poly_higher' | 'kalshi_higher';
}

export interface MoveSignal {
  kind: 'move';
  market: Market;
  beforePrice: number;
  afterPrice: number;
  moveBps: number;
  elapsedMinutes: number;
  direction: 'up' | 'down';
}

export interface CorrelationLeg {
  market: Market;
  beforePrice: number;
  /** Signed: positive when the price rose since the last snapshot. */
  moveBps: number;
}

/** One market of a hinted pair moved hard while its partner barely moved. */
export interface CorrelationSignal {
  kind: 'correlation';
  mover: CorrelationLeg;
  laggard: CorrelationLeg;
  hint: [string, string];
}

export interface NewsSignal {
  kind: 'news';
  item: NewsItem;
  matchedKeywords: string[];
  category: string;
}

export type Signal = GapSignal | MoveSignal | CorrelationSignal | NewsSignal;
