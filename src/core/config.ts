import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';
import yaml from 'yaml';

export const SUPPORTED_LANGUAGES = ['en', 'he', 'fr'] as const;
export type Language = (typeof SUPPORTED_LANGUAGES)[number];

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

const FeedSchema = z.object({
  name: z.string(),
  url: z.string().url(),
  group: z.string().optional(),
  splitSourceFromTitle: z.boolean().default(false),
});

const RuleSchema = z.object({
  category: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
});

/** Two keywords whose markets are expected to move together. */
const HintSchema = z.tuple([z.string().min(1), z.string().min(1)]);

export const ConfigSchema = z.object({
  polymarket: z
    .object({
      apiBase: z.string().default('https://gamma-api.polymarket.com'),
      pageLimit: z.number().int().positive().default(200),
      maxPages: z.number().int().positive().default(5),
    })
    .default({}),
  kalshi: z
    .object({
      apiBase: z.string().default('https://api.elections.kalshi.com/trade-api/v2'),
      pageLimit: z.number().int().positive().default(500),
      maxPages: z.number().int().positive().default(4),
    })
    .default({}),
  fetch: z
    .object({
      timeoutMs: z.number().int().positive().default(30_000),
      userAgent: z.string().default('market-intel/0.1'),
    })
    .default({}),
  scan: z
    .object({
      intervalMinutes: z.number().positive().default(120),
      heartbeatEveryCycles: z.number().int().nonnegative().default(12),
      digestEveryCycles: z.number().int().nonnegative().default(0),
      digestSize: z.number().int().positive().default(20),
      startupNotice: z.boolean().default(true),
    })
    .default({}),
  alerts: z
    .object({
      thresholdBps: z.number().int().positive().default(500),
      cooldownMinutes: z.number().nonnegative().default(120),
      reAlertDeltaBps: z.number().int().nonnegative().default(100),
      // Most alerts of each kind sent in one cycle; 0 lifts the cap.
      maxPerCycle: z
        .object({
          gap: z.number().int().nonnegative().default(3),
          move: z.number().int().nonnegative().default(3),
          correlation: z.number().int().nonnegative().default(2),
          news: z.number().int().nonnegative().default(10),
        })
        .default({}),
    })
    .default({}),
  correlation: z
    .object({
      enabled: z.boolean().default(true),
      moveThresholdBps: z.number().int().positive().default(1000),
      laggardRatio: z.number().min(0).max(1).default(0.3),
      hints: z.array(HintSchema).default([]),
    })
    .default({}),
  matching: z
    .object({
      similarityFloor: z.number().min(0).max(1).default(0.55),
      restrictCategories: z.boolean().default(true),
    })
    .default({}),
  news: z
    .object({
      enabled: z.boolean().default(true),
      feeds: z.array(FeedSchema).default([]),
      rules: z.array(RuleSchema).default([]),
      seenHistoryLimit: z.number().int().positive().default(5000),
      seenHistoryKeep: z.number().int().positive().default(3000),
      duplicateTitleSimilarity: z.number().min(0).max(1).default(0.8),
    })
    .default({}),
  telegram: z
    .object({
      enabled: z.boolean().default(true),
      token: z.string().default(''),
      chatIds: z.array(z.union([z.string(), z.number()]).transform(String)).default([]),
      apiBase: z.string().default('https://api.telegram.org'),
      disableWebPagePreview: z.boolean().default(true),
    })
    .default({}),
  languages: z.array(z.enum(SUPPORTED_LANGUAGES)).min(1).default(['en']),
  memory: z
    .object({
      dbPath: z.string().default('~/.market-intel/state.sqlite'),
    })
    .default({}),
});

export type MarketIntelConfig = z.infer<typeof ConfigSchema>;
export type FeedConfig = z.infer<typeof FeedSchema>;
export type CategoryRule = z.infer<typeof RuleSchema>;
export type CorrelationHint = z.infer<typeof HintSchema>;

export function defaultConfigPath(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return join(here, '..', '..', 'config', 'default.yaml');
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function applyEnvOverrides(cfg: MarketIntelConfig, env: NodeJS.ProcessEnv): MarketIntelConfig {
  if (env.TELEGRAM_BOT_TOKEN) {
    cfg.telegram.token = env.TELEGRAM_BOT_TOKEN;
  }
  if (env.TELEGRAM_CHAT_ID) {
    cfg.telegram.chatIds = splitList(env.TELEGRAM_CHAT_ID);
  }
  if (env.MARKET_INTEL_DB_PATH) {
    cfg.memory.dbPath = env.MARKET_INTEL_DB_PATH;
  }

  const threshold = Number(env.ALERT_THRESHOLD_BPS);
  if (env.ALERT_THRESHOLD_BPS && Number.isInteger(threshold) && threshold > 0) {
    cfg.alerts.thresholdBps = threshold;
  }
  const interval = Number(env.CHECK_INTERVAL_MINUTES);
  if (env.CHECK_INTERVAL_MINUTES && Number.isFinite(interval) && interval > 0) {
    cfg.scan.intervalMinutes = interval;
  }
  if (env.LANGUAGES) {
    const languages = z.array(z.enum(SUPPORTED_LANGUAGES)).min(1).safeParse(splitList(env.LANGUAGES));
    if (languages.success) {
      cfg.languages = languages.data;
    }
  }
  return cfg;
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): MarketIntelConfig {
  const cfg = applyEnvOverrides(ConfigSchema.parse(raw ?? {}), env);
  cfg.memory.dbPath = expandHome(cfg.memory.dbPath);
  return cfg;
}

export function loadConfig(configPath?: string): MarketIntelConfig {
  const explicit = configPath || process.env.MARKET_INTEL_CONFIG_PATH || undefined;
  const path = explicit ?? defaultConfigPath();

  let parsed: unknown = {};
  if (explicit || existsSync(path)) {
    const raw = readFileSync(path, 'utf-8');
    parsed = yaml.parse(raw) ?? {};
  }

  return parseConfig(parsed, process.env);
}

/** Copy safe to print: the bot token is masked. */
export function redactConfig(config: MarketIntelConfig): MarketIntelConfig {
  return {
    ...config,
    telegram: { ...config.telegram, token: config.telegram.token ? '***' : '' },
  };
}
