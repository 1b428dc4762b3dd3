import fetch from 'node-fetch';

import type { MarketIntelConfig } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import type { ChannelAdapter } from './channels.js';

const TELEGRAM_MAX_MESSAGE_CHARS = 4000; // Telegram hard limit is 4096; keep headroom.

const ELEMENT = /<(\/?)[a-z][^>]*>/gi;

/**
 * Where to end a chunk of one over-long line: a word boundary when there is
 * one in the second half, never inside an entity or tag, and before an
 * element that would otherwise be left open.
 */
function chunkEnd(line: string, maxChars: number): number {
  let cut = line.lastIndexOf(' ', maxChars);
  if (cut < Math.floor(maxChars / 2)) cut = maxChars;

  const amp = line.lastIndexOf('&', cut - 1);
  if (amp !== -1 && !line.slice(amp, cut).includes(';')) cut = amp;
  const lt = line.lastIndexOf('<', cut - 1);
  if (lt !== -1 && !line.slice(lt, cut).includes('>')) cut = lt;

  let depth = 0;
  let openedAt = -1;
  for (const match of line.slice(0, cut).matchAll(ELEMENT)) {
    if (match[1]) {
      depth = Math.max(0, depth - 1);
    } else {
      if (depth === 0) openedAt = match.index ?? -1;
      depth += 1;
    }
  }
  if (depth > 0 && openedAt > 0) cut = openedAt;

  return cut > 0 ? cut : maxChars;
}

/** Splits HTML message text into chunks Telegram accepts, packing whole lines. */
export function splitTelegramMessage(text: string, maxChars: number = TELEGRAM_MAX_MESSAGE_CHARS): string[] {
  if (text.length <= maxChars) return [text];

  const chunks: string[] = [];
  let current = '';
  const flush = (): void => {
    const trimmed = current.trimEnd();
    if (trimmed.length > 0) chunks.push(trimmed);
    current = '';
  };

  for (const line of text.split('\n')) {
    const joined = current.length === 0 ? line : `${current}\n${line}`;
    if (joined.length <= maxChars) {
      current = joined;
      continue;
    }
    flush();
    let rest = line;
    while (rest.length > maxChars) {
      const cut = chunkEnd(rest, maxChars);
      chunks.push(rest.slice(0, cut).trimEnd());
      rest = rest.slice(cut).trimStart();
    }
    current = rest;
  }
  flush();

  return chunks.length > 0 ? chunks : [''];
}

export class TelegramAdapter implements ChannelAdapter {
  name = 'telegram';
  private token: string;
  private apiBase: string;
  private disableWebPagePreview: boolean;
  private timeoutMs: number;

  constructor(config: MarketIntelConfig) {
    this.token = config.telegram.token;
    this.apiBase = config.telegram.apiBase.replace(/\/+$/, '');
    this.disableWebPagePreview = config.telegram.disableWebPagePreview;
    this.timeoutMs = config.fetch.timeoutMs;
  }

  async sendMessage(target: string, text: string, signal?: AbortSignal): Promise<void> {
    if (!this.token) {
      throw new Error('Telegram bot token is not configured');
    }
    const chunks = splitTelegramMessage(text);
    for (const chunk of chunks) {
      if (signal?.aborted) {
        throw new Error('Telegram send aborted');
      }
      const timeout = AbortSignal.timeout(this.timeoutMs);
      const response = await fetch(`${this.apiBase}/bot${this.token}/sendMessage`, {
        method: 'POST',
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: target,
          text: chunk,
          parse_mode: 'HTML',
          disable_web_page_preview: this.disableWebPagePreview,
        }),
      }).catch((error: unknown) => {
        // The request URL carries the token; keep it out of the message.
        throw new Error(`Telegram send failed: ${errorMessage(error).replaceAll(this.token, '***')}`);
      });
      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new Error(
          `Telegram send failed (${response.status}): ${body || 'no response body'}`
        );
      }
    }
  }
}
