/**
 * Funding Hedge Types
 *
 * Types for the delta-neutral funding hedge: one futures leg plus one spot
 * leg, opened right before a funding settlement and unwound once the
 * combined position is profitable.
 */

// ============================================
// Market Data
// ============================================

/** Perpetual contract snapshot, refreshed on every scan */
export interface Contract {
  /** Exchange symbol, shared by the futures and spot markets (e.g. BTCUSDT) */
  id: string;
  /** Signed fraction per settlement (0.001 = 0.1%) */
  fundingRate: number;
  fundingIntervalSeconds: number;
  /** Base-currency amount of one contract */
  quantoMultiplier: number;
  markPrice: number;
  indexPrice: number;
  /** Next settlement timestamp in ms, informational only */
  nextFundingTime: number;
}

export interface Ticker {
  contractId: string;
  bid: number;
  ask: number;
  last: number;
  baseVolume: number;
  quoteVolume: number;
  timestamp: number;
}

export interface Balance {
  currency: string;
  available: number;
  total: number;
}

/** Candle intervals the gateway knows how to request */
export type CandleInterval = '1m' | '5m' | '15m' | '1h' | '4h' | '1d';

// ============================================
// Positions & Orders
// ============================================

export interface Position {
  contractId: string;
  /** Signed contract count: positive = long, negative = short, 0 = flat */
  size: number;
  leverage: number;
  unrealizedPnl: number;
  /** Includes funding credited by the exchange */
  realizedPnl: number;
  entryPrice: number;
  markPrice: number;
}

export type OrderSide = 'buy' | 'sell';

export type OrderStatus = 'open' | 'closed' | 'canceled';

export type OrderMarket = 'futures' | 'spot';

/** Unit an order amount is expressed in */
export type AmountUnit = 'base' | 'quote';

export interface SpotOrderAmount {
  value: number;
  unit: AmountUnit;
}

export interface OrderInfo {
  id: string;
  contractId: string;
  market: OrderMarket;
  side: OrderSide;
  /** Quote amount for quote-denominated buys, base amount otherwise */
  amount: number;
  amountUnit: AmountUnit;
  /** Executed base quantity */
  filledAmount: number;
  avgPrice: number;
  status: OrderStatus;
  /** Fee in quote currency */
  fee: number;
  /** Part of the fee withheld from the received base coin (spot buys); 0 otherwise */
  baseFee: number;
  updatedAt: number;
}

// ============================================
// Hedge Lifecycle
// ============================================

/** short_futures when the rate is positive (longs pay shorts), long_futures otherwise */
export type HedgeDirection = 'short_futures' | 'long_futures';

export interface HedgeOrderSizes {
  direction: HedgeDirection;
  referencePrice: number;
  coinAmount: number;
  /** Quote currency to spend (buy) or raise (sell) on the spot leg */
  spotQuoteAmount: number;
  spotSide: OrderSide;
  /** Signed: negative = short futures, positive = long futures */
  futuresContracts: number;
}

export interface HedgeRequest {
  contractId: string;
  spotQuoteAmount: number;
  futuresContracts: number;
}

export type HedgeExecutionState =
  | 'no_position'
  | 'futures_pending'
  | 'futures_open'
  | 'spot_pending'
  | 'hedged'
  | 'rolling_back'
  | 'manual_intervention';

export type HedgeOutcome =
  | {
      status: 'hedged';
      futuresOrder: OrderInfo;
      spotOrder: OrderInfo;
      states: HedgeExecutionState[];
    }
  | {
      status: 'skipped';
      reason: string;
      states: HedgeExecutionState[];
    }
  | {
      status: 'failed';
      stage: 'futures' | 'spot';
      rolledBack: boolean;
      reason: string;
      states: HedgeExecutionState[];
    };

/** Combined PnL of one futures position and its spot leg */
export interface HedgeReport {
  contractId: string;
  futuresSide: 'long' | 'short';
  size: number;
  spotSide: OrderSide;
  /** Base coin held from the spot leg; the unwind order size */
  spotBaseAmount: number;
  futuresPnl: number;
  spotPnl: number;
  totalPnl: number;
  action: 'hold' | 'closed' | 'close_failed';
}

// ============================================
// Configuration
// ============================================

export interface FundingHedgeConfig {
  /** Notional per leg in quote currency */
  targetBalance: number;
  /** Available balance must cover targetBalance times this */
  balanceReserveMultiplier: number;
  leverage: number;
  /** Minimum |funding rate| in percent (0.3 = 0.3%) */
  minFundingRatePct: number;
  blacklist: string[];
  settlementBufferSeconds: number;
  /** Pause after both legs are placed */
  orderSettleWaitMs: number;
  tickIntervalMs: number;
  /** Multiplier applied to the spot order fee to approximate round-trip costs */
  feeMultiplier: number;
  /** Extra quote on the spot leg so it covers the futures notional */
  spotQuoteBuffer: number;
  validationConcurrency: number;
  statsEveryTicks: number;
  verbose: boolean;
}

// ============================================
// Alerts
// ============================================

export type AlertLevel = 'info' | 'warning' | 'error' | 'critical';

export type AlertEvent =
  | 'bot_started'
  | 'bot_stopped'
  | 'hedge_opened'
  | 'hedge_closed'
  | 'rollback_failed'
  | 'unwind_failed'
  | 'orphaned_position'
  | 'error';

export interface HedgeAlert {
  level: AlertLevel;
  event: AlertEvent;
  message: string;
  details?: Record<string, unknown>;
  timestamp: number;
}
