import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

import fetch, { Response, type RequestInit } from 'node-fetch';

import { parseConfig } from '../../src/core/config.js';
import { TelegramAdapter, splitTelegramMessage } from '../../src/interface/telegram.js';

const fetchMock = vi.mocked(fetch);

const config = parseConfig({
  telegram: { token: 'test-token', chatIds: ['42'], apiBase: 'https://telegram.example/' },
});

function hangUntilAborted(_url: unknown, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('request aborted')));
  });
}

function sentBody(call: number): unknown {
  return JSON.parse(String(fetchMock.mock.calls[call]?.[1]?.body));
}

describe('splitTelegramMessage', () => {
  it('returns short messages unchanged', () => {
    expect(splitTelegramMessage('hello')).toEqual(['hello']);
  });

  it('packs whole lines into chunks under the limit', () => {
    const text = ['aaaa', 'bbbb', 'cccc'].join('\n');
    expect(splitTelegramMessage(text, 9)).toEqual(['aaaa\nbbbb', 'cccc']);
  });

  it('hard-splits a single long line', () => {
    expect(splitTelegramMessage('x'.repeat(25), 10)).toEqual(['x'.repeat(10), 'x'.repeat(10), 'x'.repeat(5)]);
  });

  it('never cuts through an HTML entity', () => {
    expect(splitTelegramMessage('aaaaaaa&amp;bbb', 10)).toEqual(['aaaaaaa', '&amp;bbb']);
  });

  it('moves an unfinished element into the next chunk', () => {
    expect(splitTelegramMessage('xx <b>bold</b>', 11)).toEqual(['xx', '<b>bold</b>']);
    expect(splitTelegramMessage('see <a href="https://e.test/a">Wire</a>', 36)).toEqual([
      'see',
      '<a href="https://e.test/a">Wire</a>',
    ]);
  });
});

describe('TelegramAdapter', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('posts HTML messages to the Bot API', async () => {
    fetchMock.mockResolvedValue(new Response('{"ok":true}', { status: 200 }));

    await new TelegramAdapter(config).sendMessage('42', '<b>Gap</b>');

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://telegram.example/bottest-token/sendMessage');
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
    expect(sentBody(0)).toEqual({
      chat_id: '42',
      text: '<b>Gap</b>',
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    });
  });

  it('sends long messages in several requests', async () => {
    fetchMock.mockImplementation(async () => new Response('{"ok":true}', { status: 200 }));
    const text = Array.from({ length: 3 }, () => 'y'.repeat(3000)).join('\n');

    await new TelegramAdapter(config).sendMessage('42', text);

    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('rejects when Telegram refuses the message', async () => {
    fetchMock.mockResolvedValue(
      new Response('{"ok":false,"description":"Bad Request: chat not found"}', { status: 400 })
    );
    await expect(new TelegramAdapter(config).sendMessage('7', 'hi')).rejects.toThrow(
      'Telegram send failed (400): {"ok":false,"description":"Bad Request: chat not found"}'
    );
  });

  it('keeps the token out of transport errors', async () => {
    fetchMock.mockRejectedValue(
      new Error('request to https://telegram.example/bottest-token/sendMessage failed')
    );
    await expect(new TelegramAdapter(config).sendMessage('42', 'hi')).rejects.toThrow(
      'Telegram send failed: request to https://telegram.example/bot***/sendMessage failed'
    );
  });

  it('refuses to send without a token', async () => {
    await expect(new TelegramAdapter(parseConfig({})).sendMessage('42', 'hi')).rejects.toThrow(
      'Telegram bot token is not configured'
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('gives up on a request that never answers', async () => {
    fetchMock.mockImplementation(hangUntilAborted);
    const quick = parseConfig({ telegram: { token: 'test-token', chatIds: ['42'] }, fetch: { timeoutMs: 20 } });

    await expect(new TelegramAdapter(quick).sendMessage('42', 'hi')).rejects.toThrow(
      'Telegram send failed: request aborted'
    );
  });

  it('passes the caller signal to the request and stops once it aborts', async () => {
    fetchMock.mockImplementation(hangUntilAborted);
    const controller = new AbortController();
    const sending = new TelegramAdapter(config).sendMessage('42', 'hi', controller.signal);
    controller.abort();
    await expect(sending).rejects.toThrow('Telegram send failed: request aborted');

    fetchMock.mockClear();
    await expect(new TelegramAdapter(config).sendMessage('42', 'hi', controller.signal)).rejects.toThrow(
      'Telegram send aborted'
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
