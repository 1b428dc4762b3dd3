import { describe, expect, it } from 'vitest';

import type { CategoryRule } from '../../src/core/config.js';
import { ParseError } from '../../src/core/errors.js';
import { toMatchText } from '../../src/core/text.js';
import {
  inferCategory,
  isExpiredTitle,
  normalizeMarket,
  normalizeMarkets,
} from '../../src/markets/normalize.js';

const fetchedAt = new Date('2026-03-01T12:00:00.000Z');
const rules: CategoryRule[] = [
  { category: 'crypto', keywords: ['bitcoin', 'ethereum'] },
  { category: 'macro', keywords: ['fed', 'rate cut'] },
];

describe('toMatchText', () => {
  it('strips punctuation variance and collapses whitespace', () => {
    expect(toMatchText('  Will the Fed  cut rates?! ')).toBe('will the fed cut rates');
    expect(toMatchText("Trump's “big” win - $5%")).toBe('trumps big win 5');
    expect(toMatchText('Élection présidentielle')).toBe('election presidentielle');
  });
});

describe('normalizeMarket (polymarket)', () => {
  it('maps a gamma market', () => {
    const market = normalizeMarket(
      {
        id: 12345,
        question: 'Will  Bitcoin reach $150k in 2027?',
        outcomePrices: '["0.723", "0.277"]',
        events: [{ slug: 'bitcoin-150k' }],
        slug: 'will-bitcoin-reach-150k',
        active: true,
        closed: false,
        volumeNum: 1500.5,
      },
      'polymarket',
      fetchedAt,
      { rules }
    );
    expect(market).toEqual({
      platform: 'polymarket',
      externalId: '12345',
      title: 'Will Bitcoin reach $150k in 2027?',
      matchTitle: 'will bitcoin reach 150k in 2027',
      category: 'crypto',
      price: 0.723,
      url: 'https://polymarket.com/event/bitcoin-150k',
      fetchedAt,
      volume: 1500.5,
    });
  });

  it('falls back to lastTradePrice then bestAsk', () => {
    const lastTrade = normalizeMarket(
      { id: 'a', question: 'Q one', lastTradePrice: '0.4', bestAsk: 0.45 },
      'polymarket',
      fetchedAt
    );
    const ask = normalizeMarket({ id: 'b', question: 'Q two', bestAsk: 0.45 }, 'polymarket', fetchedAt);
    expect(lastTrade?.price).toBe(0.4);
    expect(ask?.price).toBe(0.45);
  });

  it('discards markets not accepting trades', () => {
    const base = { id: 'x', question: 'Will it rain?', outcomePrices: ['0.5', '0.5'] };
    expect(normalizeMarket({ ...base, closed: true }, 'polymarket', fetchedAt)).toBeNull();
    expect(normalizeMarket({ ...base, active: false }, 'polymarket', fetchedAt)).toBeNull();
    expect(normalizeMarket({ ...base, archived: true }, 'polymarket', fetchedAt)).toBeNull();
    expect(normalizeMarket({ ...base, acceptingOrders: false }, 'polymarket', fetchedAt)).toBeNull();
  });

  it('discards markets whose title names a past month', () => {
    const market = normalizeMarket(
      { id: 'old', question: 'Fed rate cut in January 2026?', outcomePrices: ['0.1', '0.9'] },
      'polymarket',
      fetchedAt
    );
    expect(market).toBeNull();
  });

  it('throws ParseError for malformed payloads', () => {
    expect(() => normalizeMarket({ question: 'no id' }, 'polymarket', fetchedAt)).toThrow(ParseError);
    expect(() =>
      normalizeMarket({ id: 'p', question: 'Bad price', outcomePrices: '["1.7"]' }, 'polymarket', fetchedAt)
    ).toThrow('price out of range: 1.7');
    expect(() =>
      normalizeMarket({ id: 'q', question: 'Bad json', outcomePrices: '[0.5' }, 'polymarket', fetchedAt)
    ).toThrow('outcomePrices is not valid JSON');
    expect(() => normalizeMarket({ id: 'r', question: 'No price' }, 'polymarket', fetchedAt)).toThrow(
      'no usable price'
    );
  });
});

describe('normalizeMarket (kalshi)', () => {
  it('maps a trade API market with a cents price', () => {
    const market = normalizeMarket(
      {
        ticker: 'KXFEDCUT-27JAN',
        event_ticker: 'KXFEDCUT',
        title: 'Fed cuts rates in 2027',
        status: 'active',
        last_price: 42,
        volume: 900,
      },
      'kalshi',
      fetchedAt,
      { rules }
    );
    expect(market).toMatchObject({
      platform: 'kalshi',
      externalId: 'KXFEDCUT-27JAN',
      matchTitle: 'fed cuts rates in 2027',
      category: 'macro',
      price: 0.42,
      url: 'https://kalshi.com/markets/kxfedcut',
      volume: 900,
    });
  });

  it('uses the dollar price, the bid/ask midpoint, then the ask', () => {
    const dollars = normalizeMarket(
      { ticker: 'A', title: 'A market', last_price_dollars: '0.5510' },
      'kalshi',
      fetchedAt
    );
    const mid = normalizeMarket(
      { ticker: 'B', title: 'B market', last_price: 0, yes_bid: 40, yes_ask: 50 },
      'kalshi',
      fetchedAt
    );
    const ask = normalizeMarket({ ticker: 'C', title: 'C market', yes_ask: 30 }, 'kalshi', fetchedAt);
    expect(dollars?.price).toBe(0.551);
    expect(mid?.price).toBe(0.45);
    expect(ask?.price).toBe(0.3);
  });

  it('drops settled and closed markets', () => {
    expect(
      normalizeMarket({ ticker: 'S', title: 'Settled', status: 'settled', last_price: 99 }, 'kalshi', fetchedAt)
    ).toBeNull();
    expect(
      normalizeMarket({ ticker: 'C', title: 'Closed', status: 'closed', last_price: 10 }, 'kalshi', fetchedAt)
    ).toBeNull();
  });

  it('appends the yes subtitle so sibling strikes keep distinct titles', () => {
    const sibling = (ticker: string, subtitle: string) =>
      normalizeMarket(
        {
          ticker,
          event_ticker: 'KXFED-27MAR',
          title: 'Fed funds rate after the March 2027 meeting?',
          yes_sub_title: subtitle,
          last_price: 40,
        },
        'kalshi',
        fetchedAt
      );

    expect(sibling('KXFED-27MAR-T4.25', '4.25% or above')?.title).toBe(
      'Fed funds rate after the March 2027 meeting? (4.25% or above)'
    );
    expect(sibling('KXFED-27MAR-T4.50', '4.50% or above')?.matchTitle).toBe(
      'fed funds rate after the march 2027 meeting 4 50 or above'
    );
  });

  it('falls back to the legacy subtitle and never repeats what the title says', () => {
    const legacy = normalizeMarket(
      { ticker: 'L', title: 'Bitcoin above $150,000?', subtitle: 'Dec 31, 2027', last_price: 20 },
      'kalshi',
      fetchedAt
    );
    const repeated = normalizeMarket(
      { ticker: 'R', title: 'Bitcoin above $150,000 on Dec 31, 2027?', yes_sub_title: 'Dec 31, 2027', last_price: 20 },
      'kalshi',
      fetchedAt
    );
    expect(legacy?.title).toBe('Bitcoin above $150,000? (Dec 31, 2027)');
    expect(repeated?.title).toBe('Bitcoin above $150,000 on Dec 31, 2027?');
  });
});

describe('normalizeMarkets', () => {
  it('collects parse errors, skips inactive records and later duplicates', () => {
    const result = normalizeMarkets(
      [
        { id: '1', question: 'First', outcomePrices: ['0.2'] },
        { id: '1', question: 'First again', outcomePrices: ['0.3'] },
        { id: '2', question: 'Closed', outcomePrices: ['0.2'], closed: true },
        { id: '3' },
        'not an object',
      ],
      'polymarket',
      fetchedAt
    );
    expect(result.markets.map((market) => market.title)).toEqual(['First']);
    expect(result.skipped).toBe(2);
    expect(result.errors).toHaveLength(2);
    expect(result.errors[0]).toBeInstanceOf(ParseError);
  });
});

describe('inferCategory', () => {
  it('prefers the declared category through the synonym table', () => {
    expect(inferCategory('Cryptocurrency', 'anything', rules)).toBe('crypto');
    expect(inferCategory('US-Politics', 'anything', rules)).toBe('politics');
  });

  it('falls back to title keywords, then other', () => {
    expect(inferCategory(undefined, 'ethereum above 5000', rules)).toBe('crypto');
    expect(inferCategory('Culture', 'oscars best picture', rules)).toBe('other');
  });
});

describe('isExpiredTitle', () => {
  it('compares month and year against now', () => {
    const now = new Date('2026-03-15T00:00:00.000Z');
    expect(isExpiredTitle('rate cut in february 2026', now)).toBe(true);
    expect(isExpiredTitle('rate cut in march 2026', now)).toBe(false);
    expect(isExpiredTitle('winner 2025 december', now)).toBe(true);
    expect(isExpiredTitle('rate cut in march', now)).toBe(false);
  });
});
