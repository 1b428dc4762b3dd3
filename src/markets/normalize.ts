import { z } from 'zod';

import type { CategoryRule } from '../core/config.js';
import { ParseError } from '../core/errors.js';
import { MONTHS, collapseWhitespace, containsPhrase, toMatchText } from '../core/text.js';
import type { Market, Platform } from './types.js';

const numeric = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isFinite(parsed) || (typeof value === 'string' && value.trim() === '')) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${String(value)}` });
    return z.NEVER;
  }
  return parsed;
});

const identifier = z.union([z.string().min(1), z.number()]).transform(String);

const PolymarketRawSchema = z.object({
  id: identifier,
  question: z.string().nullish(),
  groupItemTitle: z.string().nullish(),
  slug: z.string().nullish(),
  events: z.array(z.object({ slug: z.string().nullish() }).passthrough()).nullish(),
  outcomePrices: z.union([z.string(), z.array(z.union([z.string(), z.number()]))]).nullish(),
  lastTradePrice: numeric.nullish(),
  bestAsk: numeric.nullish(),
  active: z.boolean().nullish(),
  closed: z.boolean().nullish(),
  archived: z.boolean().nullish(),
  acceptingOrders: z.boolean().nullish(),
  category: z.string().nullish(),
  volume: numeric.nullish(),
  volumeNum: numeric.nullish(),
});

const KalshiRawSchema = z.object({
  ticker: z.string().min(1),
  event_ticker: z.string().nullish(),
  title: z.string().nullish(),
  subtitle: z.string().nullish(),
  yes_sub_title: z.string().nullish(),
  status: z.string().nullish(),
  category: z.string().nullish(),
  last_price: numeric.nullish(),
  last_price_dollars: numeric.nullish(),
  yes_bid: numeric.nullish(),
  yes_ask: numeric.nullish(),
  volume: numeric.nullish(),
});

const KALSHI_TRADING_STATUSES = new Set(['open', 'active']);

const CATEGORY_SYNONYMS: Record<string, string> = {
  crypto: 'crypto',
  cryptocurrency: 'crypto',
  bitcoin: 'crypto',
  defi: 'crypto',
  politics: 'politics',
  elections: 'politics',
  election: 'politics',
  geopolitics: 'politics',
  'world politics': 'politics',
  'us politics': 'politics',
  economics: 'macro',
  economy: 'macro',
  finance: 'macro',
  'fed rates': 'macro',
  macro: 'macro',
  sports: 'sports',
  sport: 'sports',
  tech: 'tech',
  technology: 'tech',
  science: 'tech',
  ai: 'tech',
  climate: 'climate',
  weather: 'climate',
  'climate and weather': 'climate',
};

export interface NormalizeOptions {
  rules?: CategoryRule[];
  now?: Date;
}

export interface NormalizeResult {
  markets: Market[];
  errors: ParseError[];
  /** Inactive, expired or duplicate records that were dropped on purpose. */
  skipped: number;
}

export function inferCategory(
  declared: string | null | undefined,
  matchTitle: string,
  rules: CategoryRule[] = []
): string {
  const key = collapseWhitespace((declared ?? '').toLowerCase().replace(/[-_]/g, ' '));
  const mapped = CATEGORY_SYNONYMS[key];
  if (mapped) return mapped;
  for (const rule of rules) {
    if (rule.keywords.some((keyword) => containsPhrase(matchTitle, keyword))) {
      return rule.category;
    }
  }
  return 'other';
}

/**
 * True when the title pins the question to a month that has already ended,
 * e.g. "Fed cut in March 2024?" seen in June 2024.
 */
export function isExpiredTitle(matchTitle: string, now: Date = new Date()): boolean {
  const words = matchTitle.split(' ');
  const month = words.map((word) => MONTHS[word]).find((value) => value !== undefined);
  if (month === undefined) return false;
  const yearWord = words.find((word) => /^20\d{2}$/.test(word));
  if (!yearWord) return false;
  const year = Number(yearWord);
  const currentYear = now.getUTCFullYear();
  const currentMonth = now.getUTCMonth() + 1;
  return year < currentYear || (year === currentYear && month < currentMonth);
}

function checkPrice(platform: Platform, externalId: string, price: number | undefined): number {
  if (price === undefined) {
    throw new ParseError(platform, 'no usable price', externalId);
  }
  if (!Number.isFinite(price) || price < 0 || price > 1) {
    throw new ParseError(platform, `price out of range: ${price}`, externalId);
  }
  return price;
}

function parseOutcomePrices(
  raw: string | Array<string | number> | null | undefined,
  externalId: string
): number | undefined {
  if (raw == null) return undefined;
  let list: unknown = raw;
  if (typeof raw === 'string') {
    if (raw.trim() === '') return undefined;
    try {
      list = JSON.parse(raw);
    } catch {
      throw new ParseError('polymarket', 'outcomePrices is not valid JSON', externalId);
    }
  }
  if (!Array.isArray(list) || list.length === 0) return undefined;
  const first = Number(list[0]);
  if (!Number.isFinite(first)) {
    throw new ParseError('polymarket', 'outcomePrices[0] is not a number', externalId);
  }
  return first;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`)
    .join('; ');
}

function rawId(raw: unknown, field: string): string | undefined {
  if (raw && typeof raw === 'object' && field in raw) {
    const value: unknown = Reflect.get(raw, field);
    if (typeof value === 'string' || typeof value === 'number') return String(value);
  }
  return undefined;
}

function normalizePolymarket(raw: unknown, fetchedAt: Date, options: NormalizeOptions): Market | null {
  const parsed = PolymarketRawSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError('polymarket', describeIssues(parsed.error), rawId(raw, 'id'));
  }
  const m = parsed.data;
  if (m.active === false || m.closed === true || m.archived === true || m.acceptingOrders === false) {
    return null;
  }

  const title = collapseWhitespace(m.question ?? m.groupItemTitle ?? '');
  if (!title) {
    throw new ParseError('polymarket', 'missing question', m.id);
  }
  const matchTitle = toMatchText(title);
  if (isExpiredTitle(matchTitle, options.now ?? fetchedAt)) return null;

  const price = checkPrice(
    'polymarket',
    m.id,
    parseOutcomePrices(m.outcomePrices, m.id) ?? m.lastTradePrice ?? m.bestAsk ?? undefined
  );
  const slug = m.events?.find((event) => event.slug)?.slug ?? m.slug;

  return {
    platform: 'polymarket',
    externalId: m.id,
    title,
    matchTitle,
    category: inferCategory(m.category, matchTitle, options.rules),
    price,
    url: slug ? `https://polymarket.com/event/${slug}` : 'https://polymarket.com',
    fetchedAt,
    volume: m.volumeNum ?? m.volume ?? undefined,
  };
}

function kalshiPrice(m: z.infer<typeof KalshiRawSchema>): number | undefined {
  if (m.last_price != null && m.last_price > 0) return m.last_price / 100;
  if (m.last_price_dollars != null && m.last_price_dollars > 0) return m.last_price_dollars;
  if (m.yes_bid != null && m.yes_ask != null && m.yes_ask > 0) {
    return (m.yes_bid + m.yes_ask) / 200;
  }
  if (m.yes_ask != null && m.yes_ask > 0) return m.yes_ask / 100;
  if (m.last_price != null) return m.last_price / 100;
  return undefined;
}

/**
 * Strike siblings of one Kalshi event share a title and differ only in the
 * subtitle ("4.25% or above"), so the subtitle joins the title when it adds
 * something.
 */
function kalshiTitle(m: z.infer<typeof KalshiRawSchema>): string {
  const base = collapseWhitespace(m.title ?? '');
  const detail = collapseWhitespace(m.yes_sub_title || m.subtitle || '');
  if (!base) return detail;
  if (!detail || containsPhrase(toMatchText(base), detail)) return base;
  return `${base} (${detail})`;
}

function normalizeKalshi(raw: unknown, fetchedAt: Date, options: NormalizeOptions): Market | null {
  const parsed = KalshiRawSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError('kalshi', describeIssues(parsed.error), rawId(raw, 'ticker'));
  }
  const m = parsed.data;
  if (m.status != null && !KALSHI_TRADING_STATUSES.has(m.status.toLowerCase())) {
    return null;
  }

  const title = kalshiTitle(m);
  if (!title) {
    throw new ParseError('kalshi', 'missing title', m.ticker);
  }
  const matchTitle = toMatchText(title);
  if (isExpiredTitle(matchTitle, options.now ?? fetchedAt)) return null;

  const price = checkPrice('kalshi', m.ticker, kalshiPrice(m));
  const pathTicker = (m.event_ticker ?? m.ticker).toLowerCase();

  return {
    platform: 'kalshi',
    externalId: m.ticker,
    title,
    matchTitle,
    category: inferCategory(m.category, matchTitle, options.rules),
    price,
    url: `https://kalshi.com/markets/${pathTicker}`,
    fetchedAt,
    volume: m.volume ?? undefined,
  };
}

/**
 * Converts one raw platform payload into a Market. Returns null for markets
 * that are not accepting trades (closed, resolved, expired); throws
 * ParseError for malformed payloads.
 */
export function normalizeMarket(
  raw: unknown,
  platform: Platform,
  fetchedAt: Date,
  options: NormalizeOptions = {}
): Market | null {
  return platform === 'polymarket'
    ? normalizePolymarket(raw, fetchedAt, options)
    : normalizeKalshi(raw, fetchedAt, options);
}

export function normalizeMarkets(
  raws: unknown[],
  platform: Platform,
  fetchedAt: Date,
  options: NormalizeOptions = {}
): NormalizeResult {
  const markets: Market[] = [];
  const errors: ParseError[] = [];
  const seen = new Set<string>();
  let skipped = 0;

  for (const raw of raws) {
    try {
      const market = normalizeMarket(raw, platform, fetchedAt, options);
      if (!market || seen.has(market.externalId)) {
        skipped += 1;
        continue;
      }
      seen.add(market.externalId);
      markets.push(market);
    } catch (error) {
      if (error instanceof ParseError) {
        errors.push(error);
        continue;
      }
      throw error;
    }
  }

  return { markets, errors, skipped };
}
