import { MONTHS } from '../core/text.js';

export const STOP_WORDS = new Set([
  'will', 'the', 'a', 'an', 'by', 'be', 'of', 'in', 'to', 'and', 'or', 'is', 'it',
  'at', 'on', 'for', 'has', 'have', 'does', 'do', 'this', 'that', 'before', 'after',
]);

function tokens(matchTitle: string): Set<string> {
  return new Set(matchTitle.split(' ').filter((word) => word.length > 0 && !STOP_WORDS.has(word)));
}

/**
 * Jaccard similarity over word sets (stop words filtered).
 * Inputs are expected in matching form (see toMatchText).
 */
export function jaccardSimilarity(a: string, b: string): number {
  const wordsA = tokens(a);
  const wordsB = tokens(b);

  if (wordsA.size === 0 && wordsB.size === 0) return a === b ? 1 : 0;
  if (wordsA.size === 0 || wordsB.size === 0) return 0;

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection += 1;
  }
  return intersection / (wordsA.size + wordsB.size - intersection);
}

function bigramCounts(value: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i < value.length - 1; i += 1) {
    const bigram = value.slice(i, i + 2);
    counts.set(bigram, (counts.get(bigram) ?? 0) + 1);
  }
  return counts;
}

/**
 * Dice coefficient over character bigrams (multiset). Catches plural and
 * inflection differences ("cut" / "cuts") that word sets miss.
 */
export function diceSimilarity(a: string, b: string): number {
  if (a === b) return a.length > 0 ? 1 : 0;
  if (a.length < 2 || b.length < 2) return 0;

  const bigramsA = bigramCounts(a);
  const bigramsB = bigramCounts(b);

  let intersection = 0;
  for (const [bigram, countA] of bigramsA) {
    intersection += Math.min(countA, bigramsB.get(bigram) ?? 0);
  }
  return (2 * intersection) / (a.length - 1 + (b.length - 1));
}

/** Symmetric, bounded to [0, 1]. */
export function titleSimilarity(a: string, b: string): number {
  return Math.max(jaccardSimilarity(a, b), diceSimilarity(a, b));
}

function displayWords(title: string): string[] {
  return title
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/['\u2018\u2019`\u00b4]/g, '')
    .split(/[^\p{L}\p{N}]+/u)
    .filter((word) => word.length > 0 && !STOP_WORDS.has(word.toLowerCase()));
}

/**
 * Words of a display title that say which question it asks: numbers, months
 * (folded, so "Dec" and "December" agree) and capitalized names. A title in
 * Title Case has no usable names, so only numbers and months count there.
 */
export function detailTokens(title: string): Set<string> {
  const details = new Set<string>();
  const names: string[] = [];
  let lettered = 0;

  for (const word of displayWords(title)) {
    const lower = word.toLowerCase();
    const month = lower === 'may' && word !== 'May' ? undefined : MONTHS[lower];
    if (month !== undefined) {
      details.add(`month:${month}`);
    } else if (/^\p{N}/u.test(word)) {
      details.add(lower);
    } else {
      lettered += 1;
      if (/^\p{Lu}/u.test(word)) names.push(lower);
    }
  }
  if (names.length * 2 <= lettered) {
    for (const name of names) details.add(name);
  }
  return details;
}

/**
 * True when each title carries a detail the other lacks: a different strike,
 * date or person. A detail present on one side only is not a conflict.
 */
export function detailsConflict(titleA: string, titleB: string): boolean {
  const a = detailTokens(titleA);
  const b = detailTokens(titleB);
  const onlyInA = [...a].some((token) => !b.has(token));
  const onlyInB = [...b].some((token) => !a.has(token));
  return onlyInA && onlyInB;
}
