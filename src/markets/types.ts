export const PLATFORMS = ['polymarket', 'kalshi'] as const;
export type Platform = (typeof PLATFORMS)[number];

export const PLATFORM_LABELS: Record<Platform, string> = {
  polymarket: 'Polymarket',
  kalshi: 'Kalshi',
};

export interface Market {
  platform: Platform;
  externalId: string;
  /** Display title: original case, trimmed, whitespace collapsed. */
  title: string;
  /** Lowercased, punctuation-free form used for matching. */
  matchTitle: string;
  category: string;
  /** YES probability in [0, 1]. */
  price: number;
  url: string;
  fetchedAt: Date;
  volume?: number;
}

export interface MatchedPair {
  poly: Market;
  kalshi: Market;
  similarity: number;
}

export function marketKey(platform: Platform, externalId: string): string {
  return `${platform}:${externalId}`;
}

export function pairKey(polyId: string, kalshiId: string): string {
  return `${polyId}|${kalshiId}`;
}
