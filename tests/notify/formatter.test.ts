import { describe, expect, it } from 'vitest';

import { SUPPORTED_LANGUAGES } from '../../src/core/config.js';
import {
  escapeHtml,
  formatDigest,
  formatHeartbeat,
  formatPercent,
  formatSignal,
  formatStartup,
  truncateText,
} from '../../src/notify/formatter.js';
import type { CorrelationSignal, GapSignal, MoveSignal, NewsSignal } from '../../src/signals/types.js';
import { T0, makeMarket, makePair } from '../fixtures/markets.js';

const DIVIDER = '━━━━━━━━━━━━━━━━━━━━━━';

const gap: GapSignal = {
  kind: 'gap',
  pair: makePair(
    makeMarket('polymarket', 'p1', 'Will X happen?', 0.723),
    makeMarket('kalshi', 'K1', 'X happens by Dec', 0.551),
    0.82
  ),
  gapBps: 1720,
  direction: 'poly_higher',
};

const move: MoveSignal = {
  kind: 'move',
  market: makeMarket('kalshi', 'K1', 'Fed cuts rates', 0.452),
  beforePrice: 0.628,
  afterPrice: 0.452,
  moveBps: 1760,
  elapsedMinutes: 120,
  direction: 'down',
};

const news: NewsSignal = {
  kind: 'news',
  item: {
    id: 'guid-1',
    title: 'Bitcoin <ETF> approved',
    url: 'https://news.example/a?x=1&y=2',
    source: 'Wire',
  },
  matchedKeywords: ['bitcoin', 'etf'],
  category: 'crypto',
};

const correlation: CorrelationSignal = {
  kind: 'correlation',
  mover: { market: makeMarket('polymarket', 'p1', 'Will Bitcoin hit a new high?', 0.25), beforePrice: 0.4, moveBps: -1500 },
  laggard: { market: makeMarket('kalshi', 'K1', 'Ethereum above $8,000', 0.51), beforePrice: 0.5, moveBps: 100 },
  hint: ['bitcoin', 'ethereum'],
};

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml('Will <b>"AT&T"</b> win?')).toBe('Will &lt;b&gt;&quot;AT&amp;T&quot;&lt;/b&gt; win?');
  });
});

describe('truncateText', () => {
  it('keeps short text and cuts long text at a word boundary', () => {
    expect(truncateText('alpha beta', 12)).toBe('alpha beta');
    expect(truncateText('alpha beta gamma delta', 12)).toBe('alpha beta…');
    expect(truncateText('abcdefghijklmnop', 5)).toBe('abcde…');
  });
});

describe('formatPercent', () => {
  it('renders one decimal', () => {
    expect(formatPercent(0.723)).toBe('72.3%');
    expect(formatPercent(0.5)).toBe('50.0%');
    expect(formatPercent(0.12345)).toBe('12.3%');
  });
});

describe('formatSignal', () => {
  it('renders a gap alert in English', () => {
    expect(formatSignal(gap, 'en')).toBe(
      [
        '⚖️ <b>Cross-platform gap</b>',
        DIVIDER,
        '',
        '📊 <b>Will X happen?</b>',
        '↔️ X happens by Dec',
        '',
        'Polymarket: 72.3%',
        'Kalshi: 55.1%',
        '📐 Gap: 1720 bps (Polymarket higher)',
        '🔗 Title match: 82.0%',
        '',
        '<a href="https://example.test/polymarket/p1">Polymarket</a> | <a href="https://example.test/kalshi/K1">Kalshi</a>',
        DIVIDER,
      ].join('\n')
    );
  });

  it('renders a downward move in French', () => {
    const lines = formatSignal(move, 'fr').split('\n');
    expect(lines[0]).toBe('📉 <b>Forte baisse</b>');
    expect(lines).toContain('Source: Kalshi');
    expect(lines).toContain('Avant: 62.8% → Maintenant: 45.2%');
    expect(lines).toContain('Variation: -1760 bps (en 120 min)');
  });

  it('renders news in Hebrew with escaped headline and link', () => {
    const lines = formatSignal(news, 'he').split('\n');
    expect(lines[0]).toBe('📰 <b>חדשות רלוונטיות לשווקים</b>');
    expect(lines).toContain('📌 <b>Bitcoin &lt;ETF&gt; approved</b>');
    expect(lines).toContain('מילות מפתח: bitcoin, etf');
    expect(lines).toContain(
      '<a href="https://news.example/a?x=1&amp;y=2">https://news.example/a?x=1&amp;y=2</a>'
    );
  });

  it('renders a correlation anomaly in English', () => {
    expect(formatSignal(correlation, 'en')).toBe(
      [
        '🔗 <b>Correlation anomaly</b>',
        DIVIDER,
        '',
        '📊 Moved: <b>Will Bitcoin hit a new high?</b> (Polymarket)',
        '    40.0% → 25.0% (-1500 bps)',
        '',
        '💤 Did not react: <b>Ethereum above $8,000</b> (Kalshi)',
        '    50.0% → 51.0% (+100 bps)',
        '',
        '🧩 Linked by: bitcoin / ethereum',
        '',
        '<a href="https://example.test/polymarket/p1">Polymarket</a> | <a href="https://example.test/kalshi/K1">Kalshi</a>',
        DIVIDER,
      ].join('\n')
    );
  });

  it('shortens a long news summary before escaping it', () => {
    const long: NewsSignal = { ...news, item: { ...news.item, summary: 'AT&T '.repeat(200) } };
    const lines = formatSignal(long, 'en').split('\n');
    expect(lines[5]).toBe(`${'AT&amp;T '.repeat(119)}AT&amp;T…`);
  });

  it('is deterministic and never leaks raw markup from titles', () => {
    const hostile: GapSignal = {
      ...gap,
      pair: { ...gap.pair, poly: { ...gap.pair.poly, title: '<script>alert("x")</script>' } },
    };
    for (const language of SUPPORTED_LANGUAGES) {
      const text = formatSignal(hostile, language);
      expect(text).toBe(formatSignal(hostile, language));
      expect(text).toContain('&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;');
      expect(text).not.toContain('<script>');
    }
  });
});

describe('periodic messages', () => {
  it('renders the startup notice', () => {
    const text = formatStartup(
      {
        marketsTracked: 340,
        pairs: 12,
        intervalMinutes: 120,
        thresholdBps: 500,
        cooldownMinutes: 120,
        languages: ['en', 'he'],
        feeds: 8,
      },
      'en'
    );
    const lines = text.split('\n');
    expect(lines[0]).toBe('🤖 <b>Market monitor started</b>');
    expect(lines).toContain('📊 Markets tracked: 340');
    expect(lines).toContain('🎯 Alert threshold: 500 bps');
    expect(lines).toContain('🌐 Languages: en, he');
  });

  it('renders the heartbeat', () => {
    expect(formatHeartbeat({ cycleCount: 24, marketsTracked: 300, pairs: 10, at: T0 }, 'en')).toBe(
      [
        '💓 <b>Still watching</b>',
        '🔁 Cycles completed: 24',
        '📊 Markets tracked: 300',
        '🔗 Matched pairs: 10',
        '🕐 Last scan: 2026-03-01 12:00 UTC',
      ].join('\n')
    );
  });

  it('renders the digest ordered by volume', () => {
    const markets = [
      makeMarket('polymarket', 'a', 'Low volume', 0.2, { volume: 10 }),
      makeMarket('kalshi', 'B', 'High & mighty', 0.8, { volume: 500 }),
      makeMarket('polymarket', 'c', 'No volume', 0.5),
    ];
    expect(formatDigest(markets, 'en', 2)).toBe(
      [
        '📊 <b>Market digest</b>',
        DIVIDER,
        '',
        '● High &amp; mighty',
        '    Kalshi: 80.0%',
        '○ Low volume',
        '    Polymarket: 20.0%',
        DIVIDER,
      ].join('\n')
    );
    expect(formatDigest([], 'fr')).toContain('Aucun marché suivi pour le moment.');
  });
});
