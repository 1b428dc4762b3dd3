import type { Language } from '../core/config.js';
import { PLATFORM_LABELS, type Market } from '../markets/types.js';
import type {
  CorrelationLeg,
  CorrelationSignal,
  GapSignal,
  MoveSignal,
  NewsSignal,
  Signal,
} from '../signals/types.js';
import { LOCALES, type LocaleStrings } from './locales.js';

const DIVIDER = '━━━━━━━━━━━━━━━━━━━━━━';
const MAX_SUMMARY_CHARS = 600;

/** Escapes text for Telegram's HTML parse mode. */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function formatPercent(probability: number): string {
  return `${(probability * 100).toFixed(1)}%`;
}

export function formatBps(bps: number): string {
  return `${Math.round(bps)} bps`;
}

function link(url: string, label: string): string {
  return `<a href="${escapeHtml(url)}">${escapeHtml(label)}</a>`;
}

function signedBps(bps: number): string {
  return `${bps >= 0 ? '+' : '-'}${formatBps(Math.abs(bps))}`;
}

/** Cuts raw text at a word boundary; escaping happens afterwards. */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const head = text.slice(0, maxChars);
  const space = head.lastIndexOf(' ');
  return `${(space > maxChars / 2 ? head.slice(0, space) : head).trimEnd()}…`;
}

function formatUtc(at: Date): string {
  return `${at.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

function formatGap(signal: GapSignal, t: LocaleStrings): string {
  const { poly, kalshi } = signal.pair;
  const higher = signal.direction === 'poly_higher' ? poly.platform : kalshi.platform;
  const lines = [
    `⚖️ <b>${t.gapTitle}</b>`,
    DIVIDER,
    '',
    `📊 <b>${escapeHtml(poly.title)}</b>`,
  ];
  if (kalshi.title !== poly.title) {
    lines.push(`↔️ ${escapeHtml(kalshi.title)}`);
  }
  lines.push(
    '',
    `${PLATFORM_LABELS.polymarket}: ${formatPercent(poly.price)}`,
    `${PLATFORM_LABELS.kalshi}: ${formatPercent(kalshi.price)}`,
    `📐 ${t.gap}: ${formatBps(signal.gapBps)} (${t.higherOn(PLATFORM_LABELS[higher])})`,
    `🔗 ${t.titleMatch}: ${formatPercent(signal.pair.similarity)}`,
    '',
    `${link(poly.url, PLATFORM_LABELS.polymarket)} | ${link(kalshi.url, PLATFORM_LABELS.kalshi)}`,
    DIVIDER
  );
  return lines.join('\n');
}

function formatMove(signal: MoveSignal, t: LocaleStrings): string {
  const { market } = signal;
  const up = signal.direction === 'up';
  const sign = up ? '+' : '-';
  return [
    `${up ? '📈' : '📉'} <b>${up ? t.moveUpTitle : t.moveDownTitle}</b>`,
    DIVIDER,
    '',
    `📊 <b>${escapeHtml(market.title)}</b>`,
    `${t.source}: ${PLATFORM_LABELS[market.platform]}`,
    '',
    `${t.before}: ${formatPercent(signal.beforePrice)} → ${t.now}: ${formatPercent(signal.afterPrice)}`,
    `${t.change}: ${sign}${formatBps(signal.moveBps)} (${t.minutes(signal.elapsedMinutes)})`,
    '',
    link(market.url, PLATFORM_LABELS[market.platform]),
    DIVIDER,
  ].join('\n');
}

function correlationLeg(label: string, leg: CorrelationLeg): string[] {
  const { market } = leg;
  return [
    `${label}: <b>${escapeHtml(market.title)}</b> (${PLATFORM_LABELS[market.platform]})`,
    `    ${formatPercent(leg.beforePrice)} → ${formatPercent(market.price)} (${signedBps(leg.moveBps)})`,
  ];
}

function formatCorrelation(signal: CorrelationSignal, t: LocaleStrings): string {
  return [
    `🔗 <b>${t.correlationTitle}</b>`,
    DIVIDER,
    '',
    ...correlationLeg(`📊 ${t.mover}`, signal.mover),
    '',
    ...correlationLeg(`💤 ${t.laggard}`, signal.laggard),
    '',
    `🧩 ${t.linkedBy}: ${escapeHtml(signal.hint.join(' / '))}`,
    '',
    `${link(signal.mover.market.url, PLATFORM_LABELS[signal.mover.market.platform])} | ${link(
      signal.laggard.market.url,
      PLATFORM_LABELS[signal.laggard.market.platform]
    )}`,
    DIVIDER,
  ].join('\n');
}

function formatNews(signal: NewsSignal, t: LocaleStrings): string {
  const { item } = signal;
  const lines = [`📰 <b>${t.newsTitle}</b>`, DIVIDER, '', `📌 <b>${escapeHtml(item.title)}</b>`];
  if (item.summary) {
    lines.push('', escapeHtml(truncateText(item.summary, MAX_SUMMARY_CHARS)));
  }
  lines.push(
    '',
    `${t.source}: ${escapeHtml(item.source)}`,
    `${t.category}: ${escapeHtml(signal.category)}`,
    `${t.keywords}: ${escapeHtml(signal.matchedKeywords.join(', '))}`
  );
  if (item.url) {
    lines.push('', link(item.url, item.url));
  }
  lines.push(DIVIDER);
  return lines.join('\n');
}

/**
 * Renders a signal for one language. Pure: same signal and language, same
 * text. Every piece of upstream text passes through escapeHtml.
 */
export function formatSignal(signal: Signal, language: Language): string {
  const t = LOCALES[language];
  switch (signal.kind) {
    case 'gap':
      return formatGap(signal, t);
    case 'move':
      return formatMove(signal, t);
    case 'correlation':
      return formatCorrelation(signal, t);
    case 'news':
      return formatNews(signal, t);
  }
}

export interface StartupInfo {
  marketsTracked: number;
  pairs: number;
  intervalMinutes: number;
  thresholdBps: number;
  cooldownMinutes: number;
  languages: Language[];
  feeds: number;
}

export function formatStartup(info: StartupInfo, language: Language): string {
  const t = LOCALES[language];
  return [
    `🤖 <b>${t.startupTitle}</b>`,
    DIVIDER,
    '',
    `🔍 ${t.status}: ${t.active}`,
    `📊 ${t.markets}: ${info.marketsTracked}`,
    `🔗 ${t.pairs}: ${info.pairs}`,
    `⏰ ${t.interval}: ${info.intervalMinutes} min`,
    `🎯 ${t.threshold}: ${formatBps(info.thresholdBps)}`,
    `⏳ ${t.cooldown}: ${info.cooldownMinutes} min`,
    `📰 ${t.feeds}: ${info.feeds}`,
    `🌐 ${t.languages}: ${info.languages.join(', ')}`,
    DIVIDER,
  ].join('\n');
}

export interface HeartbeatInfo {
  cycleCount: number;
  marketsTracked: number;
  pairs: number;
  at: Date;
}

export function formatHeartbeat(info: HeartbeatInfo, language: Language): string {
  const t = LOCALES[language];
  return [
    `💓 <b>${t.heartbeatTitle}</b>`,
    `🔁 ${t.cycles}: ${info.cycleCount}`,
    `📊 ${t.markets}: ${info.marketsTracked}`,
    `🔗 ${t.pairs}: ${info.pairs}`,
    `🕐 ${t.lastScan}: ${formatUtc(info.at)}`,
  ].join('\n');
}

/** Top markets by volume; markets without volume sort last. */
export function formatDigest(markets: Market[], language: Language, limit = 20): string {
  const t = LOCALES[language];
  const lines = [`📊 <b>${t.digestTitle}</b>`, DIVIDER, ''];
  const top = [...markets]
    .sort((a, b) => (b.volume ?? -1) - (a.volume ?? -1) || a.title.localeCompare(b.title))
    .slice(0, limit);

  if (top.length === 0) {
    lines.push(t.noMarkets);
  }
  for (const market of top) {
    lines.push(
      `${market.price > 0.5 ? '●' : '○'} ${escapeHtml(market.title)}`,
      `    ${PLATFORM_LABELS[market.platform]}: ${formatPercent(market.price)}`
    );
  }
  lines.push(DIVIDER);
  return lines.join('\n');
}
