import { createHash } from 'node:crypto';

import fetch from 'node-fetch';
import Parser from 'rss-parser';

import type { FeedConfig, MarketIntelConfig } from '../core/config.js';
import { FetchError, errorMessage } from '../core/errors.js';
import { collapseWhitespace } from '../core/text.js';
import type { NewsItem } from './types.js';

/** Source of news items for one feed. */
export interface NewsFetchClient {
  fetchFeedItems(feed: FeedConfig, signal?: AbortSignal): Promise<NewsItem[]>;
}

export interface FeedEntry {
  guid?: string;
  id?: string;
  link?: string;
  title?: string;
  contentSnippet?: string;
  content?: string;
  isoDate?: string;
}

export function hashTitle(title: string): string {
  return createHash('sha256').update(title).digest('hex').slice(0, 32);
}

/** "Headline - Source" as published by aggregator feeds. */
export function splitSourceFromTitle(title: string): { title: string; source?: string } {
  const cut = title.lastIndexOf(' - ');
  if (cut <= 0) return { title };
  const source = title.slice(cut + 3).trim();
  const head = title.slice(0, cut).trim();
  if (!source || !head) return { title };
  return { title: head, source };
}

export function toNewsItem(entry: FeedEntry, feed: FeedConfig, feedTitle?: string): NewsItem | null {
  const rawTitle = collapseWhitespace(entry.title ?? '');
  if (!rawTitle) return null;

  let title = rawTitle;
  let source = feed.name || feedTitle || feed.url;
  if (feed.splitSourceFromTitle) {
    const split = splitSourceFromTitle(rawTitle);
    title = split.title;
    source = split.source ?? source;
  }

  const link = entry.link?.trim() || undefined;
  const guid = (entry.guid ?? entry.id)?.trim() || undefined;
  const summary = collapseWhitespace(entry.contentSnippet ?? entry.content ?? '') || undefined;

  return {
    id: guid ?? link ?? hashTitle(rawTitle),
    title,
    summary,
    url: link,
    source,
    publishedAt: entry.isoDate,
    feedGroup: feed.group,
  };
}

export class RssFetcher implements NewsFetchClient {
  private parser = new Parser<Record<string, unknown>, FeedEntry>();
  private userAgent: string;

  constructor(config: MarketIntelConfig) {
    this.userAgent = config.fetch.userAgent;
  }

  async fetchFeedItems(feed: FeedConfig, signal?: AbortSignal): Promise<NewsItem[]> {
    const source = `rss:${feed.name}`;
    const response = await fetch(feed.url, {
      headers: {
        Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml',
        'User-Agent': this.userAgent,
      },
      signal,
    }).catch((error: unknown) => {
      throw new FetchError(source, errorMessage(error), { cause: error });
    });
    if (!response.ok) {
      throw new FetchError(source, `HTTP ${response.status}`);
    }

    const xml = await response.text();
    const parsed = await this.parser.parseString(xml).catch((error: unknown) => {
      throw new FetchError(source, `unparseable feed: ${errorMessage(error)}`, { cause: error });
    });

    const items: NewsItem[] = [];
    for (const entry of parsed.items ?? []) {
      const item = toNewsItem(entry, feed, parsed.title);
      if (item) items.push(item);
    }
    return items;
  }
}
