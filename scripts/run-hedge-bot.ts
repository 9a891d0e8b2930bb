#!/usr/bin/env npx tsx
/**
 * Funding Hedge Bot — Main Entry Point
 *
 * Opens a futures + spot hedge on the highest-yield contract seconds
 * before its funding settlement and unwinds it once the combined PnL is
 * positive. Runs against Bybit (unified account).
 *
 * PM2-compatible: handles SIGTERM/SIGINT for graceful shutdown.
 *
 * Usage:
 *   npx tsx scripts/run-hedge-bot.ts
 *   npx tsx scripts/run-hedge-bot.ts --balance 500 --leverage 2
 *   npx tsx scripts/run-hedge-bot.ts --min-rate 0.5 --blacklist MERLUSDT,FOOUSDT
 *   npx tsx scripts/run-hedge-bot.ts --testnet --verbose
 *   npx tsx scripts/run-hedge-bot.ts --telegram-token BOT_TOKEN --telegram-chat CHAT_ID
 *   npx tsx scripts/run-hedge-bot.ts --no-journal
 *
 * Credentials: BYBIT_API_KEY / BYBIT_API_SECRET (from the environment or .env)
 */

import 'dotenv/config';
import {
  AlertManager,
  ConsoleLogger,
  FundingHedgeBot,
  HedgeJournal,
  createSignalHandler,
  parseRuntimeOptions,
} from '../src/lib/bot';
import { BybitGateway } from '../src/lib/exchange/bybit-gateway';
import { createDatabase } from '../src/lib/data/db';

// ============================================
// Entry Point
// ============================================

async function main(): Promise<void> {
  const opts = parseRuntimeOptions(process.argv.slice(2), process.env);
  const logger = new ConsoleLogger('bot', opts.config.verbose ? 'debug' : 'info');

  if (!opts.apiKey || !opts.apiSecret) {
    throw new Error('BYBIT_API_KEY and BYBIT_API_SECRET are required');
  }

  const gateway = new BybitGateway({
    logger: logger.child('gateway'),
    apiKey: opts.apiKey,
    apiSecret: opts.apiSecret,
    testnet: opts.testnet,
  });

  const alerts = new AlertManager(logger.child('alerts'), opts.telegramToken, opts.telegramChat);
  if (!alerts.isEnabled()) {
    logger.info('Telegram not configured, alerts are logged only');
  }

  const database = opts.journalPath ? createDatabase(opts.journalPath) : null;
  const journal = database
    ? new HedgeJournal(database.db, logger.child('journal'))
    : undefined;

  const bot = new FundingHedgeBot({
    config: opts.config,
    gateway,
    logger,
    alerts,
    journal,
  });

  // Graceful shutdown handlers (PM2 compatible)
  const shutdown = async (signal: string) => {
    logger.info(`received ${signal}, finishing current tick...`);
    await bot.stop(signal);
    if (journal) {
      const stats = journal.getStats();
      logger.info('journal totals', {
        opened: stats.opened,
        closed: stats.closed,
        realizedPnl: stats.realizedPnl.toFixed(4),
      });
    }
    database?.close();
    process.exit(0);
  };

  const onSignal = createSignalHandler(shutdown, logger);
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  logger.info(`connected to Bybit ${opts.testnet ? 'testnet' : 'mainnet'}`, {
    journal: opts.journalPath ?? 'off',
  });

  await bot.start();
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
