#!/usr/bin/env node
import 'dotenv/config';
/**
 * market-intel CLI
 *
 * Scans Polymarket, Kalshi and news feeds and alerts Telegram chats.
 */

import { Command } from 'commander';
import yaml from 'yaml';

import { VERSION } from '../index.js';
import { loadConfig, redactConfig, type MarketIntelConfig } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import { Logger, parseLogLevel } from '../core/logger.js';
import { RssFetcher } from '../intel/rss.js';
import { TelegramAdapter } from '../interface/telegram.js';
import { HttpMarketFetchClient } from '../markets/client.js';
import { StateStore } from '../memory/state_store.js';
import { ScanCycle, type CycleReport } from '../scanner/cycle.js';
import { ScanScheduler } from '../scanner/scheduler.js';

function createLogger(): Logger {
  return new Logger(parseLogLevel(process.env.MARKET_INTEL_LOG_LEVEL));
}

function createCycle(config: MarketIntelConfig, logger: Logger, dryRun = false): ScanCycle {
  return new ScanCycle({
    config,
    store: new StateStore({ dbPath: config.memory.dbPath }),
    markets: new HttpMarketFetchClient(config),
    news: new RssFetcher(config),
    channel: dryRun ? null : new TelegramAdapter(config),
    dryRun,
    logger: logger.child('cycle'),
  });
}

function printReport(report: CycleReport): void {
  console.log('Cycle Report');
  console.log('─'.repeat(40));
  console.log(
    `Signals fired: ${report.signalsFired} (gap ${report.fired.gap}, move ${report.fired.move}, ` +
      `correlation ${report.fired.correlation}, news ${report.fired.news})`
  );
  console.log(`Suppressed: ${report.suppressed}, over the per-cycle cap: ${report.capped}`);
  console.log(`Markets: polymarket ${report.marketsTracked.polymarket}, kalshi ${report.marketsTracked.kalshi}`);
  console.log(`Matched pairs: ${report.pairs}`);
  console.log(`News items: ${report.newsItems}`);
  console.log(`Committed: ${report.committed ? 'yes' : 'no'} (cycle ${report.cycleCount})`);
  if (report.errors.length > 0) {
    console.log('');
    console.log('Errors:');
    for (const error of report.errors) {
      console.log(`  [${error.stage}] ${error.message}`);
    }
  }
}

const program = new Command();

program
  .name('market-intel')
  .description('Prediction market correlation and signal scanner')
  .version(VERSION)
  .option('-c, --config <path>', 'Config file (YAML)');

function resolveConfig(): MarketIntelConfig {
  const opts = program.opts<{ config?: string }>();
  return loadConfig(opts.config);
}

program
  .command('run')
  .description('Scan on a fixed interval until interrupted')
  .option('--no-startup', 'Skip the startup notice')
  .action(async (options: { startup: boolean }) => {
    const config = resolveConfig();
    const logger = createLogger();
    const cycle = createCycle(config, logger);

    if (options.startup && config.scan.startupNotice) {
      await cycle.announceStartup();
    }

    const scheduler = new ScanScheduler({
      cycle,
      intervalMinutes: config.scan.intervalMinutes,
      logger: logger.child('scheduler'),
    });

    let stopping = false;
    const shutdown = (signal: string) => {
      if (stopping) return;
      stopping = true;
      logger.info(`${signal} received; stopping`);
      scheduler
        .stop()
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error('Shutdown failed', err);
          process.exit(1);
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    logger.info(`Scanning every ${config.scan.intervalMinutes} min`);
    scheduler.start();
  });

program
  .command('once')
  .description('Run a single cycle and print its report')
  .option('--dry-run', 'Compute and report only; nothing is sent or saved')
  .option('--json', 'Print the report as JSON')
  .action(async (options: { dryRun?: boolean; json?: boolean }) => {
    const config = resolveConfig();
    const dryRun = options.dryRun ?? false;
    const cycle = createCycle(config, createLogger(), dryRun);

    const ora = await import('ora');
    const spinner = ora.default('Scanning markets and feeds...').start();
    const report = await cycle.runCycle();
    spinner.stop();

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printReport(report);
    }
    if (!dryRun && !report.committed) {
      process.exitCode = 1;
    }
  });

program
  .command('state')
  .description('Show the persisted scanner state')
  .option('--raw', 'Print the stored documents as-is')
  .action((options: { raw?: boolean }) => {
    const config = resolveConfig();
    const store = new StateStore({ dbPath: config.memory.dbPath });

    if (options.raw) {
      console.log(JSON.stringify(store.exportRaw(), null, 2));
      return;
    }

    const { snapshot, alerts, seenItems } = store.load();
    const markets = Object.keys(snapshot.markets);
    console.log('Scanner State');
    console.log('─'.repeat(40));
    console.log(`Database: ${config.memory.dbPath}`);
    console.log(`Cycles committed: ${snapshot.cycleCount}`);
    console.log(`Last saved: ${snapshot.savedAt ?? 'never'}`);
    console.log(
      `Markets: ${markets.length} (polymarket ${markets.filter((key) => key.startsWith('polymarket:')).length}, ` +
        `kalshi ${markets.filter((key) => key.startsWith('kalshi:')).length})`
    );
    console.log(`Pairs: ${Object.keys(snapshot.pairs).length}`);
    console.log(
      `Alert records: ${alerts.length} (gap ${alerts.filter((a) => a.kind === 'gap').length}, ` +
        `move ${alerts.filter((a) => a.kind === 'move').length}, ` +
        `correlation ${alerts.filter((a) => a.kind === 'correlation').length}, ` +
        `news ${alerts.filter((a) => a.kind === 'news').length})`
    );
    console.log(`Seen news items: ${seenItems.length}`);
  });

program
  .command('config')
  .description('Print the resolved configuration (token redacted)')
  .action(() => {
    console.log(yaml.stringify(redactConfig(resolveConfig())));
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
