import type { CategoryRule } from '../core/config.js';
import { containsPhrase, toMatchText } from '../core/text.js';
import { titleSimilarity } from '../matching/similarity.js';
import type { NewsSignal } from '../signals/types.js';
import type { NewsItem } from './types.js';

export interface RelevanceOptions {
  /** Titles at least this similar to an earlier item of the batch are duplicates. */
  duplicateTitleSimilarity?: number;
}

export interface RelevanceResult {
  signals: NewsSignal[];
  /** Every genuinely new item id of the batch, relevant or not. */
  newItemIds: string[];
  duplicates: number;
}

export function matchRules(
  text: string,
  rules: CategoryRule[]
): { keywords: string[]; category: string } | null {
  const matchText = toMatchText(text);
  const keywords: string[] = [];
  let bestCategory: string | null = null;
  let bestCount = 0;

  for (const rule of rules) {
    let count = 0;
    for (const keyword of rule.keywords) {
      if (!containsPhrase(matchText, keyword)) continue;
      count += 1;
      const normalized = keyword.trim().toLowerCase();
      if (!keywords.includes(normalized)) keywords.push(normalized);
    }
    if (count > bestCount) {
      bestCount = count;
      bestCategory = rule.category;
    }
  }

  return bestCategory ? { keywords, category: bestCategory } : null;
}

/**
 * Turns a batch of fetched items into news signals. Items already present in
 * the seen history never qualify again, whatever the current rules say.
 */
export function filterNews(
  items: NewsItem[],
  rules: CategoryRule[],
  seen: ReadonlySet<string>,
  options: RelevanceOptions = {}
): RelevanceResult {
  const threshold = options.duplicateTitleSimilarity ?? 0.8;
  const signals: NewsSignal[] = [];
  const newItemIds: string[] = [];
  const batchIds = new Set<string>();
  const batchTitles: string[] = [];
  let duplicates = 0;

  for (const item of items) {
    if (seen.has(item.id) || batchIds.has(item.id)) continue;
    batchIds.add(item.id);
    newItemIds.push(item.id);

    const titleKey = toMatchText(item.title);
    const isDuplicate = batchTitles.some((other) => titleSimilarity(titleKey, other) >= threshold);
    batchTitles.push(titleKey);
    if (isDuplicate) {
      duplicates += 1;
      continue;
    }

    const match = matchRules(`${item.title} ${item.summary ?? ''}`, rules);
    if (!match) continue;
    signals.push({
      kind: 'news',
      item,
      matchedKeywords: match.keywords,
      category: match.category,
    });
  }

  return { signals, newItemIds, duplicates };
}
