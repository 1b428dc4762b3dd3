import type { Market, MatchedPair } from '../markets/types.js';
import { detailsConflict, titleSimilarity } from './similarity.js';

export const DEFAULT_SIMILARITY_FLOOR = 0.55;

export interface MatchOptions {
  similarityFloor?: number;
  /** Skip candidates whose (known) categories differ. */
  restrictCategories?: boolean;
}

interface Candidate {
  poly: Market;
  kalshi: Market;
  similarity: number;
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function categoriesCompatible(a: Market, b: Market): boolean {
  if (a.category === 'other' || b.category === 'other') return true;
  return a.category === b.category;
}

/**
 * Highest similarity first, then Polymarket id, then Kalshi id. A total
 * order over candidates, so the assignment does not depend on input order.
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.similarity !== b.similarity) return b.similarity - a.similarity;
  return (
    compareIds(a.poly.externalId, b.poly.externalId) ||
    compareIds(a.kalshi.externalId, b.kalshi.externalId)
  );
}

/**
 * Greedy maximum-weight one-to-one assignment between Polymarket and Kalshi
 * markets: repeatedly commit the best remaining candidate whose two markets
 * are both still free. Titles that disagree on a number, month or name are
 * never candidates, however similar the rest reads.
 */
export function matchMarkets(
  polyMarkets: Market[],
  kalshiMarkets: Market[],
  options: MatchOptions = {}
): MatchedPair[] {
  const floor = options.similarityFloor ?? DEFAULT_SIMILARITY_FLOOR;
  const restrict = options.restrictCategories ?? false;

  const candidates: Candidate[] = [];
  for (const poly of polyMarkets) {
    for (const kalshi of kalshiMarkets) {
      if (restrict && !categoriesCompatible(poly, kalshi)) continue;
      const similarity = titleSimilarity(poly.matchTitle, kalshi.matchTitle);
      if (similarity < floor) continue;
      if (detailsConflict(poly.title, kalshi.title)) continue;
      candidates.push({ poly, kalshi, similarity });
    }
  }
  candidates.sort(compareCandidates);

  const usedPoly = new Set<string>();
  const usedKalshi = new Set<string>();
  const pairs: MatchedPair[] = [];

  for (const candidate of candidates) {
    if (usedPoly.has(candidate.poly.externalId) || usedKalshi.has(candidate.kalshi.externalId)) {
      continue;
    }
    usedPoly.add(candidate.poly.externalId);
    usedKalshi.add(candidate.kalshi.externalId);
    pairs.push({
      poly: candidate.poly,
      kalshi: candidate.kalshi,
      similarity: candidate.similarity,
    });
  }

  return pairs;
}
