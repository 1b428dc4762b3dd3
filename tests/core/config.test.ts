import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, describe, expect, it, vi } from 'vitest';

import { loadConfig, parseConfig, redactConfig } from '../../src/core/config.js';

describe('parseConfig', () => {
  it('fills every default from an empty document', () => {
    const config = parseConfig({});
    expect(config.alerts).toEqual({
      thresholdBps: 500,
      cooldownMinutes: 120,
      reAlertDeltaBps: 100,
      maxPerCycle: { gap: 3, move: 3, correlation: 2, news: 10 },
    });
    expect(config.correlation).toEqual({ enabled: true, moveThresholdBps: 1000, laggardRatio: 0.3, hints: [] });
    expect(config.matching.similarityFloor).toBe(0.55);
    expect(config.languages).toEqual(['en']);
    expect(config.scan.intervalMinutes).toBe(120);
    expect(config.scan.heartbeatEveryCycles).toBe(12);
    expect(config.news.seenHistoryLimit).toBe(5000);
    expect(config.news.seenHistoryKeep).toBe(3000);
    expect(config.memory.dbPath).toBe(join(homedir(), '.market-intel', 'state.sqlite'));
  });

  it('applies environment overrides', () => {
    const config = parseConfig(
      { alerts: { thresholdBps: 800 } },
      {
        TELEGRAM_BOT_TOKEN: 'test-token',
        TELEGRAM_CHAT_ID: '111, 222',
        ALERT_THRESHOLD_BPS: '300',
        CHECK_INTERVAL_MINUTES: '15',
        LANGUAGES: 'he,fr',
        MARKET_INTEL_DB_PATH: '/tmp/state.sqlite',
      }
    );
    expect(config.telegram.token).toBe('test-token');
    expect(config.telegram.chatIds).toEqual(['111', '222']);
    expect(config.alerts.thresholdBps).toBe(300);
    expect(config.scan.intervalMinutes).toBe(15);
    expect(config.languages).toEqual(['he', 'fr']);
    expect(config.memory.dbPath).toBe('/tmp/state.sqlite');
  });

  it('ignores unusable override values', () => {
    const config = parseConfig({}, { ALERT_THRESHOLD_BPS: 'lots', LANGUAGES: 'en,de' });
    expect(config.alerts.thresholdBps).toBe(500);
    expect(config.languages).toEqual(['en']);
  });

  it('accepts numeric chat ids', () => {
    const config = parseConfig({ telegram: { chatIds: [-100123, '456'] } });
    expect(config.telegram.chatIds).toEqual(['-100123', '456']);
  });

  it('rejects unsupported languages in the document', () => {
    expect(() => parseConfig({ languages: ['de'] })).toThrow();
  });

  it('takes correlation hints as keyword pairs only', () => {
    const config = parseConfig({ correlation: { hints: [['rate cut', 'recession']] } });
    expect(config.correlation.hints).toEqual([['rate cut', 'recession']]);
    expect(() => parseConfig({ correlation: { hints: [['bitcoin']] } })).toThrow();
  });
});

describe('redactConfig', () => {
  it('masks the bot token only', () => {
    const config = parseConfig({ telegram: { token: 'test-secret', chatIds: ['1'] } });
    const redacted = redactConfig(config);
    expect(redacted.telegram.token).toBe('***');
    expect(redacted.telegram.chatIds).toEqual(['1']);
    expect(config.telegram.token).toBe('test-secret');
  });
});

describe('loadConfig', () => {
  let dir: string | null = null;

  afterEach(() => {
    vi.unstubAllEnvs();
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it('reads YAML from an explicit path', () => {
    dir = mkdtempSync(join(tmpdir(), 'market-intel-config-'));
    const path = join(dir, 'config.yaml');
    writeFileSync(
      path,
      [
        'alerts:',
        '  thresholdBps: 750',
        'languages: [en, he]',
        'news:',
        '  rules:',
        '    - category: crypto',
        '      keywords: [bitcoin]',
      ].join('\n')
    );
    vi.stubEnv('TELEGRAM_BOT_TOKEN', '');
    vi.stubEnv('ALERT_THRESHOLD_BPS', '');

    const config = loadConfig(path);
    expect(config.alerts.thresholdBps).toBe(750);
    expect(config.languages).toEqual(['en', 'he']);
    expect(config.news.rules).toEqual([{ category: 'crypto', keywords: ['bitcoin'] }]);
  });

  it('loads the bundled default configuration', () => {
    vi.stubEnv('MARKET_INTEL_CONFIG_PATH', '');
    vi.stubEnv('LANGUAGES', '');
    vi.stubEnv('ALERT_THRESHOLD_BPS', '');
    const config = loadConfig();
    expect(config.languages).toEqual(['en', 'he', 'fr']);
    expect(config.news.feeds.length).toBeGreaterThan(0);
    expect(config.news.rules.map((rule) => rule.category)).toContain('crypto');
    expect(config.correlation.hints).toContainEqual(['bitcoin', 'ethereum']);
  });
});
