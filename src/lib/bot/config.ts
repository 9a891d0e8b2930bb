/**
 * Bot Configuration — Funding Hedge Defaults
 *
 * Defaults follow the live settings the strategy ran with: 200 USDT per
 * leg, 3x leverage, 0.3% minimum funding rate, open within 10s of
 * settlement, 1s tick.
 */

import { z } from 'zod';
import type { CandleInterval, FundingHedgeConfig } from '@/types/funding-hedge';

// ============================================
// Hedge Config Defaults
// ============================================

export const DEFAULT_HEDGE_CONFIG: FundingHedgeConfig = {
  targetBalance: 200,
  balanceReserveMultiplier: 2, // one targetBalance per leg
  leverage: 3,
  minFundingRatePct: 0.3,
  blacklist: ['MERLUSDT'], // illiquid spot book
  settlementBufferSeconds: 10,
  orderSettleWaitMs: 30_000,
  tickIntervalMs: 1_000,
  feeMultiplier: 3, // open + close + spot trade
  spotQuoteBuffer: 1.01,
  validationConcurrency: 5,
  statsEveryTicks: 100,
  verbose: false,
};

/** Candle requested to prove a spot pair is tradable */
export const VALIDATION_CANDLE_INTERVAL: CandleInterval = '1m';

/** Bybit API category for the futures leg */
export const BYBIT_FUTURES_CATEGORY = 'linear' as const;

/** Bybit API category for the spot leg */
export const BYBIT_SPOT_CATEGORY = 'spot' as const;

/** Settlement currency of the contracts the bot trades */
export const SETTLE_COIN = 'USDT';

export const DEFAULT_JOURNAL_PATH = 'data/funding-hedge.db';

// ============================================
// Validation
// ============================================

export const hedgeConfigSchema = z.object({
  targetBalance: z.number().positive(),
  balanceReserveMultiplier: z.number().min(1),
  leverage: z.number().int().min(1).max(100),
  minFundingRatePct: z.number().min(0),
  blacklist: z.array(z.string().min(1)),
  settlementBufferSeconds: z.number().int().min(1),
  orderSettleWaitMs: z.number().int().min(0),
  tickIntervalMs: z.number().int().min(100),
  feeMultiplier: z.number().min(0),
  spotQuoteBuffer: z.number().min(1),
  validationConcurrency: z.number().int().min(1),
  statsEveryTicks: z.number().int().min(1),
  verbose: z.boolean(),
});

export interface RuntimeOptions {
  config: FundingHedgeConfig;
  apiKey?: string;
  apiSecret?: string;
  testnet: boolean;
  telegramToken?: string;
  telegramChat?: string;
  /** null disables the journal */
  journalPath: string | null;
}

export type Env = Record<string, string | undefined>;

function parseNumberFlag(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`${flag} expects a number, got "${value ?? ''}"`);
  }
  return parsed;
}

function parseBoolEnv(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

/**
 * Build runtime options from CLI flags with environment fallbacks.
 * Throws with the offending field when the merged config is invalid.
 */
export function parseRuntimeOptions(argv: string[], env: Env): RuntimeOptions {
  const config: FundingHedgeConfig = {
    ...DEFAULT_HEDGE_CONFIG,
    blacklist: [...DEFAULT_HEDGE_CONFIG.blacklist],
  };
  const opts: RuntimeOptions = {
    config,
    testnet: parseBoolEnv(env.BYBIT_TESTNET),
    journalPath: env.HEDGE_JOURNAL_PATH ?? DEFAULT_JOURNAL_PATH,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--balance':
        config.targetBalance = parseNumberFlag(arg, argv[++i]);
        break;
      case '--leverage':
        config.leverage = parseNumberFlag(arg, argv[++i]);
        break;
      case '--min-rate':
        config.minFundingRatePct = parseNumberFlag(arg, argv[++i]);
        break;
      case '--buffer':
        config.settlementBufferSeconds = parseNumberFlag(arg, argv[++i]);
        break;
      case '--interval':
        config.tickIntervalMs = parseNumberFlag(arg, argv[++i]);
        break;
      case '--settle-wait':
        config.orderSettleWaitMs = parseNumberFlag(arg, argv[++i]);
        break;
      case '--fee-multiplier':
        config.feeMultiplier = parseNumberFlag(arg, argv[++i]);
        break;
      case '--blacklist':
        config.blacklist = (argv[++i] ?? '')
          .split(',')
          .map((s) => s.trim())
          .filter((s) => s.length > 0);
        break;
      case '--testnet':
        opts.testnet = true;
        break;
      case '--telegram-token':
        opts.telegramToken = argv[++i];
        break;
      case '--telegram-chat':
        opts.telegramChat = argv[++i];
        break;
      case '--journal':
        opts.journalPath = argv[++i] ?? DEFAULT_JOURNAL_PATH;
        break;
      case '--no-journal':
        opts.journalPath = null;
        break;
      case '--verbose':
        config.verbose = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  // Env var fallbacks for PM2
  opts.apiKey = env.BYBIT_API_KEY;
  opts.apiSecret = env.BYBIT_API_SECRET;
  if (!opts.telegramToken && env.TELEGRAM_BOT_TOKEN) {
    opts.telegramToken = env.TELEGRAM_BOT_TOKEN;
  }
  if (!opts.telegramChat && env.TELEGRAM_CHAT_ID) {
    opts.telegramChat = env.TELEGRAM_CHAT_ID;
  }

  const parsed = hedgeConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') : 'config';
    throw new Error(`Invalid config ${field}: ${issue?.message ?? 'unknown'}`);
  }
  opts.config = parsed.data;

  return opts;
}
