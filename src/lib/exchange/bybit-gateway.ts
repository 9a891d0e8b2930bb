/**
 * Bybit Gateway — ExchangeGateway on Bybit V5 (unified account)
 *
 * Futures leg: `linear` USDT perpetuals. Spot leg: `spot`, same symbol.
 * Every response body is validated with zod before it reaches the bot;
 * nothing here throws.
 */

import { RestClientV5, type KlineIntervalV3 } from 'bybit-api';
import { z } from 'zod';
import type { Candle } from '@/types/candle';
import type {
  Balance,
  CandleInterval,
  Contract,
  OrderInfo,
  OrderMarket,
  OrderSide,
  OrderStatus,
  Position,
  SpotOrderAmount,
  Ticker,
} from '@/types/funding-hedge';
import {
  err,
  gatewayError,
  isTransient,
  ok,
  type GatewayError,
  type GatewayErrorKind,
  type Result,
} from '@/types/result';
import {
  BYBIT_FUTURES_CATEGORY,
  BYBIT_SPOT_CATEGORY,
  SETTLE_COIN,
} from '@/lib/bot/config';
import type { Logger } from '@/lib/bot/logger';
import type { ExchangeGateway } from './gateway';

export type BybitRestClient = Pick<
  RestClientV5,
  | 'getInstrumentsInfo'
  | 'getTickers'
  | 'getKline'
  | 'getWalletBalance'
  | 'getPositionInfo'
  | 'submitOrder'
  | 'getHistoricOrders'
  | 'setLeverage'
  | 'setSpotMarginLeverage'
  | 'switchPositionMode'
>;

export interface BybitGatewayOptions {
  logger: Logger;
  apiKey?: string;
  apiSecret?: string;
  testnet?: boolean;
  /** Extra attempts for read calls on network / rate-limit errors */
  maxReadRetries?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  client?: BybitRestClient;
}

interface BybitResponse {
  retCode: number;
  retMsg: string;
  result: unknown;
}

// ============================================
// Return Codes
// ============================================

const RATE_LIMIT_CODES = new Set([10006, 10018]);
const AUTH_CODES = new Set([10003, 10004, 10005, 33004]);
const NOT_FOUND_CODES = new Set([110001, 170213]);
/** "leverage not modified" / "position mode not modified" */
const ALREADY_SET_CODES = new Set([110043, 110025]);

export function classifyRetCode(retCode: number): GatewayErrorKind {
  if (RATE_LIMIT_CODES.has(retCode)) return 'rate_limited';
  if (AUTH_CODES.has(retCode)) return 'auth';
  if (NOT_FOUND_CODES.has(retCode)) return 'not_found';
  return 'rejected';
}

const KLINE_INTERVALS = {
  '1m': '1',
  '5m': '5',
  '15m': '15',
  '1h': '60',
  '4h': '240',
  '1d': 'D',
} as const satisfies Record<CandleInterval, KlineIntervalV3>;

// ============================================
// Response Schemas
// ============================================

/** Bybit sends numbers as strings; blanks become 0 */
const numeric = z.union([z.string(), z.number()]).transform((value) => {
  const parsed = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
});

const linearInstrumentsSchema = z.object({
  list: z.array(
    z.object({
      symbol: z.string(),
      status: z.string(),
      contractType: z.string().optional(),
      quoteCoin: z.string().optional(),
      fundingInterval: numeric.optional(),
      lotSizeFilter: z.object({ minOrderQty: z.string() }),
    }),
  ),
  nextPageCursor: z.string().optional(),
});

const spotInstrumentsSchema = z.object({
  list: z.array(
    z.object({
      symbol: z.string(),
      lotSizeFilter: z.object({
        basePrecision: z.string(),
        quotePrecision: z.string(),
      }),
    }),
  ),
});

const tickersSchema = z.object({
  list: z.array(
    z.object({
      symbol: z.string(),
      bid1Price: numeric,
      ask1Price: numeric,
      lastPrice: numeric,
      volume24h: numeric,
      turnover24h: numeric,
      fundingRate: numeric.optional(),
      markPrice: numeric.optional(),
      indexPrice: numeric.optional(),
      nextFundingTime: numeric.optional(),
    }),
  ),
});

const klineSchema = z.object({
  list: z.array(z.array(z.string()).min(6)),
});

const walletSchema = z.object({
  list: z
    .array(
      z.object({
        totalAvailableBalance: numeric,
        totalWalletBalance: numeric,
      }),
    )
    .min(1),
});

const positionsSchema = z.object({
  list: z.array(
    z.object({
      symbol: z.string(),
      side: z.string(),
      size: z.string(),
      leverage: numeric.optional(),
      unrealisedPnl: numeric,
      curRealisedPnl: numeric,
      avgPrice: numeric,
      markPrice: numeric,
    }),
  ),
});

const submitOrderSchema = z.object({ orderId: z.string() });

const historicOrdersSchema = z.object({
  list: z.array(
    z.object({
      orderId: z.string(),
      symbol: z.string(),
      side: z.enum(['Buy', 'Sell']),
      orderStatus: z.string(),
      cumExecQty: numeric,
      cumExecValue: numeric,
      avgPrice: numeric,
      cumExecFee: numeric,
      updatedTime: numeric,
    }),
  ),
});

type PositionRow = z.infer<typeof positionsSchema>['list'][number];
type HistoricOrderRow = z.infer<typeof historicOrdersSchema>['list'][number];

// ============================================
// Helpers
// ============================================

/** Number of decimals a step such as "0.001" or 1e-7 carries */
export function stepDecimals(step: number | string): number {
  const text = String(step);
  const exp = /e-(\d+)$/.exec(text);
  if (exp?.[1]) return Number(exp[1]);
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

/** Round down to `decimals` places so an order never exceeds what is held */
export function floorToDecimals(value: number, decimals: number): string {
  const factor = 10 ** decimals;
  return (Math.floor(value * factor + 1e-9) / factor).toFixed(decimals);
}

export function mapSpotOrderStatus(status: string): OrderStatus {
  switch (status) {
    case 'Filled':
      return 'closed';
    case 'Cancelled':
    case 'Rejected':
    case 'PartiallyFilledCanceled':
    case 'Deactivated':
      return 'canceled';
    default:
      return 'open';
  }
}

function toSide(side: OrderSide): 'Buy' | 'Sell' {
  return side === 'buy' ? 'Buy' : 'Sell';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================
// Gateway
// ============================================

export class BybitGateway implements ExchangeGateway {
  private client: BybitRestClient;
  private logger: Logger;
  private maxReadRetries: number;
  private retryDelayMs: number;
  private sleep: (ms: number) => Promise<void>;

  /** contractId → base amount of one contract */
  private multipliers: Map<string, number> = new Map();
  private spotPrecision: Map<string, { base: number; quote: number }> = new Map();

  constructor(options: BybitGatewayOptions) {
    this.logger = options.logger;
    this.client =
      options.client ??
      new RestClientV5({
        key: options.apiKey,
        secret: options.apiSecret,
        testnet: options.testnet ?? false,
      });
    this.maxReadRetries = options.maxReadRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  // ============================================
  // Market Data
  // ============================================

  async listContracts(): Promise<Result<Contract[]>> {
    const instruments = await this.fetchLinearInstruments();
    if (!instruments.ok) return instruments;

    const tickers = await this.read('listContracts', tickersSchema, () =>
      this.client.getTickers({ category: BYBIT_FUTURES_CATEGORY }),
    );
    if (!tickers.ok) return tickers;

    const bySymbol = new Map(tickers.value.list.map((t) => [t.symbol, t]));
    const contracts: Contract[] = [];

    for (const instrument of instruments.value) {
      if (instrument.status !== 'Trading') continue;
      if (instrument.quoteCoin !== undefined && instrument.quoteCoin !== SETTLE_COIN) continue;
      if (instrument.contractType !== undefined && instrument.contractType !== 'LinearPerpetual') {
        continue;
      }

      const ticker = bySymbol.get(instrument.symbol);
      if (!ticker) continue;

      const multiplier = parseFloat(instrument.lotSizeFilter.minOrderQty);
      this.multipliers.set(instrument.symbol, multiplier);

      contracts.push({
        id: instrument.symbol,
        fundingRate: ticker.fundingRate ?? 0,
        // Bybit reports minutes
        fundingIntervalSeconds: (instrument.fundingInterval ?? 0) * 60,
        quantoMultiplier: multiplier,
        markPrice: ticker.markPrice ?? ticker.lastPrice,
        indexPrice: ticker.indexPrice ?? ticker.lastPrice,
        nextFundingTime: ticker.nextFundingTime ?? 0,
      });
    }

    return ok(contracts);
  }

  getFuturesTicker(contractId: string): Promise<Result<Ticker>> {
    return this.fetchTicker('getFuturesTicker', contractId, BYBIT_FUTURES_CATEGORY);
  }

  getSpotTicker(contractId: string): Promise<Result<Ticker>> {
    return this.fetchTicker('getSpotTicker', contractId, BYBIT_SPOT_CATEGORY);
  }

  async getSpotCandles(
    contractId: string,
    interval: CandleInterval,
    limit: number,
  ): Promise<Result<Candle[]>> {
    const result = await this.read('getSpotCandles', klineSchema, () =>
      this.client.getKline({
        category: BYBIT_SPOT_CATEGORY,
        symbol: contractId,
        interval: KLINE_INTERVALS[interval],
        limit,
      }),
    );
    if (!result.ok) return result;

    // Bybit returns newest first, reverse to chronological
    const candles = result.value.list
      .map((row) => ({
        timestamp: Number(row[0]),
        open: Number(row[1]),
        high: Number(row[2]),
        low: Number(row[3]),
        close: Number(row[4]),
        volume: Number(row[5]),
      }))
      .reverse();

    return ok(candles);
  }

  async getWalletBalance(): Promise<Result<Balance>> {
    const result = await this.read('getWalletBalance', walletSchema, () =>
      this.client.getWalletBalance({ accountType: 'UNIFIED' }),
    );
    if (!result.ok) return result;

    const [account] = result.value.list;
    if (!account) {
      return err(gatewayError('invalid_response', 'getWalletBalance', 'no account in response'));
    }
    return ok({
      currency: SETTLE_COIN,
      available: account.totalAvailableBalance,
      total: account.totalWalletBalance,
    });
  }

  // ============================================
  // Positions
  // ============================================

  async getPosition(contractId: string): Promise<Result<Position>> {
    const result = await this.read('getPosition', positionsSchema, () =>
      this.client.getPositionInfo({ category: BYBIT_FUTURES_CATEGORY, symbol: contractId }),
    );
    if (!result.ok) return result;

    const row = result.value.list.find((p) => p.symbol === contractId);
    if (!row || parseFloat(row.size) === 0) {
      return ok({
        contractId,
        size: 0,
        leverage: row?.leverage ?? 0,
        unrealizedPnl: 0,
        realizedPnl: 0,
        entryPrice: 0,
        markPrice: row?.markPrice ?? 0,
      });
    }

    return this.toPosition(row);
  }

  async getAllPositions(): Promise<Result<Position[]>> {
    const result = await this.read('getAllPositions', positionsSchema, () =>
      this.client.getPositionInfo({ category: BYBIT_FUTURES_CATEGORY, settleCoin: SETTLE_COIN }),
    );
    if (!result.ok) return result;

    const positions: Position[] = [];
    for (const row of result.value.list) {
      if (parseFloat(row.size) === 0) continue;
      const position = await this.toPosition(row);
      if (!position.ok) return position;
      positions.push(position.value);
    }
    return ok(positions);
  }

  // ============================================
  // Orders
  // ============================================

  async placeFuturesOrder(
    contractId: string,
    price: number,
    signedSize: number,
  ): Promise<Result<OrderInfo>> {
    if (signedSize === 0) {
      return err(gatewayError('rejected', 'placeFuturesOrder', 'order size is zero'));
    }

    const multiplier = await this.multiplier(contractId);
    if (!multiplier.ok) return multiplier;

    const side: OrderSide = signedSize > 0 ? 'buy' : 'sell';
    const baseQty = Math.abs(signedSize) * multiplier.value;
    const qty = baseQty.toFixed(stepDecimals(multiplier.value));

    const result = await this.write('placeFuturesOrder', submitOrderSchema, () =>
      this.client.submitOrder(
        price > 0
          ? {
              category: BYBIT_FUTURES_CATEGORY,
              symbol: contractId,
              side: toSide(side),
              orderType: 'Limit',
              qty,
              price: String(price),
            }
          : {
              category: BYBIT_FUTURES_CATEGORY,
              symbol: contractId,
              side: toSide(side),
              orderType: 'Market',
              qty,
            },
      ),
    );
    if (!result.ok) return result;

    return ok({
      id: result.value.orderId,
      contractId,
      market: 'futures',
      side,
      amount: baseQty,
      amountUnit: 'base',
      filledAmount: 0,
      avgPrice: price,
      status: 'open',
      fee: 0,
      baseFee: 0,
      updatedAt: Date.now(),
    });
  }

  async closeFuturesPosition(contractId: string, signedSize?: number): Promise<Result<void>> {
    if (signedSize !== undefined) return this.offsetFutures(contractId, signedSize);

    const result = await this.write('closeFuturesPosition', positionsSchema, () =>
      this.client.getPositionInfo({ category: BYBIT_FUTURES_CATEGORY, symbol: contractId }),
    );
    if (!result.ok) return result;

    const row = result.value.list.find((p) => p.symbol === contractId);
    if (!row || parseFloat(row.size) === 0) return ok(undefined);

    const closed = await this.write('closeFuturesPosition', submitOrderSchema, () =>
      this.client.submitOrder({
        category: BYBIT_FUTURES_CATEGORY,
        symbol: contractId,
        side: row.side === 'Buy' ? 'Sell' : 'Buy',
        orderType: 'Market',
        qty: row.size,
        reduceOnly: true,
      }),
    );
    if (!closed.ok) return closed;

    this.logger.info(`close order ${closed.value.orderId} for ${contractId}`, { qty: row.size });
    return ok(undefined);
  }

  /** Reduce-only market order against a just-placed leg that may not show in the position yet */
  private async offsetFutures(contractId: string, signedSize: number): Promise<Result<void>> {
    if (signedSize === 0) return ok(undefined);

    const multiplier = await this.multiplier(contractId);
    if (!multiplier.ok) return multiplier;

    const qty = (Math.abs(signedSize) * multiplier.value).toFixed(stepDecimals(multiplier.value));
    const closed = await this.write('closeFuturesPosition', submitOrderSchema, () =>
      this.client.submitOrder({
        category: BYBIT_FUTURES_CATEGORY,
        symbol: contractId,
        side: signedSize > 0 ? 'Sell' : 'Buy',
        orderType: 'Market',
        qty,
        reduceOnly: true,
      }),
    );
    if (!closed.ok) return closed;

    this.logger.info(`offset order ${closed.value.orderId} for ${contractId}`, { qty });
    return ok(undefined);
  }

  async placeSpotOrder(
    contractId: string,
    side: OrderSide,
    amount: SpotOrderAmount,
  ): Promise<Result<OrderInfo>> {
    const precision = await this.spotPrecisionOf(contractId);
    if (!precision.ok) return precision;

    const qty =
      amount.unit === 'quote'
        ? floorToDecimals(amount.value, precision.value.quote)
        : floorToDecimals(amount.value, precision.value.base);
    if (parseFloat(qty) <= 0) {
      return err(gatewayError('rejected', 'placeSpotOrder', `amount ${amount.value} rounds to zero`));
    }

    const result = await this.write('placeSpotOrder', submitOrderSchema, () =>
      this.client.submitOrder({
        category: BYBIT_SPOT_CATEGORY,
        symbol: contractId,
        side: toSide(side),
        orderType: 'Market',
        qty,
        marketUnit: amount.unit === 'quote' ? 'quoteCoin' : 'baseCoin',
        isLeverage: 1,
      }),
    );
    if (!result.ok) return result;

    return ok({
      id: result.value.orderId,
      contractId,
      market: 'spot',
      side,
      amount: parseFloat(qty),
      amountUnit: amount.unit,
      filledAmount: 0,
      avgPrice: 0,
      status: 'open',
      fee: 0,
      baseFee: 0,
      updatedAt: Date.now(),
    });
  }

  async listClosedSpotOrders(contractId: string): Promise<Result<OrderInfo[]>> {
    const result = await this.read('listClosedSpotOrders', historicOrdersSchema, () =>
      this.client.getHistoricOrders({
        category: BYBIT_SPOT_CATEGORY,
        symbol: contractId,
        limit: 50,
      }),
    );
    if (!result.ok) return result;

    return ok(
      result.value.list
        .filter((o) => o.symbol === contractId)
        .map((o) => this.toSpotOrder(o))
        .filter((o) => o.status !== 'open'),
    );
  }

  // ============================================
  // Account Settings
  // ============================================

  async setLeverage(
    contractId: string,
    leverage: number,
    market: OrderMarket,
  ): Promise<Result<void>> {
    const value = String(leverage);
    const result =
      market === 'futures'
        ? await this.write('setLeverage', z.unknown(), () =>
            this.client.setLeverage({
              category: BYBIT_FUTURES_CATEGORY,
              symbol: contractId,
              buyLeverage: value,
              sellLeverage: value,
            }),
          )
        : // Spot margin leverage is account-wide on Bybit
          await this.write('setLeverage', z.unknown(), () =>
            this.client.setSpotMarginLeverage(value),
          );

    return this.acceptAlreadySet(result);
  }

  async setPositionMode(hedged: boolean): Promise<Result<void>> {
    const result = await this.write('setPositionMode', z.unknown(), () =>
      this.client.switchPositionMode({
        category: BYBIT_FUTURES_CATEGORY,
        coin: SETTLE_COIN,
        mode: hedged ? 3 : 0,
      }),
    );
    return this.acceptAlreadySet(result);
  }

  // ============================================
  // Internals
  // ============================================

  private acceptAlreadySet(result: Result<unknown>): Result<void> {
    if (result.ok) return ok(undefined);
    if (result.error.code !== undefined && ALREADY_SET_CODES.has(result.error.code)) {
      return ok(undefined);
    }
    return result;
  }

  private async fetchTicker(
    operation: string,
    contractId: string,
    category: typeof BYBIT_FUTURES_CATEGORY | typeof BYBIT_SPOT_CATEGORY,
  ): Promise<Result<Ticker>> {
    const result = await this.read(operation, tickersSchema, () =>
      this.client.getTickers({ category, symbol: contractId }),
    );
    if (!result.ok) return result;

    const ticker = result.value.list.find((t) => t.symbol === contractId);
    if (!ticker) {
      return err(gatewayError('not_found', operation, `no ticker for ${contractId}`));
    }

    return ok({
      contractId,
      bid: ticker.bid1Price,
      ask: ticker.ask1Price,
      last: ticker.lastPrice,
      baseVolume: ticker.volume24h,
      quoteVolume: ticker.turnover24h,
      timestamp: Date.now(),
    });
  }

  private async fetchLinearInstruments(): Promise<
    Result<z.infer<typeof linearInstrumentsSchema>['list']>
  > {
    const all: z.infer<typeof linearInstrumentsSchema>['list'] = [];
    let cursor: string | undefined;

    do {
      const page = await this.read('listContracts', linearInstrumentsSchema, () =>
        this.client.getInstrumentsInfo({
          category: BYBIT_FUTURES_CATEGORY,
          limit: 1000,
          cursor,
        }),
      );
      if (!page.ok) return page;

      all.push(...page.value.list);
      cursor = page.value.nextPageCursor || undefined;
    } while (cursor);

    return ok(all);
  }

  private async multiplier(contractId: string): Promise<Result<number>> {
    const cached = this.multipliers.get(contractId);
    if (cached !== undefined) return ok(cached);

    const result = await this.read('getInstrument', linearInstrumentsSchema, () =>
      this.client.getInstrumentsInfo({ category: BYBIT_FUTURES_CATEGORY, symbol: contractId }),
    );
    if (!result.ok) return result;

    const instrument = result.value.list.find((i) => i.symbol === contractId);
    const multiplier = instrument ? parseFloat(instrument.lotSizeFilter.minOrderQty) : NaN;
    if (!Number.isFinite(multiplier) || multiplier <= 0) {
      return err(gatewayError('not_found', 'getInstrument', `no lot size for ${contractId}`));
    }

    this.multipliers.set(contractId, multiplier);
    return ok(multiplier);
  }

  private async spotPrecisionOf(
    contractId: string,
  ): Promise<Result<{ base: number; quote: number }>> {
    const cached = this.spotPrecision.get(contractId);
    if (cached) return ok(cached);

    const result = await this.read('getSpotInstrument', spotInstrumentsSchema, () =>
      this.client.getInstrumentsInfo({ category: BYBIT_SPOT_CATEGORY, symbol: contractId }),
    );
    if (!result.ok) return result;

    const instrument = result.value.list.find((i) => i.symbol === contractId);
    if (!instrument) {
      return err(gatewayError('not_found', 'getSpotInstrument', `no spot market for ${contractId}`));
    }

    const precision = {
      base: stepDecimals(instrument.lotSizeFilter.basePrecision),
      quote: stepDecimals(instrument.lotSizeFilter.quotePrecision),
    };
    this.spotPrecision.set(contractId, precision);
    return ok(precision);
  }

  private async toPosition(row: PositionRow): Promise<Result<Position>> {
    const multiplier = await this.multiplier(row.symbol);
    if (!multiplier.ok) return multiplier;

    const contracts = Math.round(parseFloat(row.size) / multiplier.value);
    return ok({
      contractId: row.symbol,
      size: row.side === 'Sell' ? -contracts : contracts,
      leverage: row.leverage ?? 0,
      unrealizedPnl: row.unrealisedPnl,
      realizedPnl: row.curRealisedPnl,
      entryPrice: row.avgPrice,
      markPrice: row.markPrice,
    });
  }

  private toSpotOrder(row: HistoricOrderRow): OrderInfo {
    const side: OrderSide = row.side === 'Buy' ? 'buy' : 'sell';
    // Buy legs are placed in quote currency, sell legs in base.
    // Spot buys pay the fee in the received coin, sells in quote.
    const baseFee = side === 'buy' ? row.cumExecFee : 0;
    return {
      id: row.orderId,
      contractId: row.symbol,
      market: 'spot',
      side,
      amount: side === 'buy' ? row.cumExecValue : row.cumExecQty,
      amountUnit: side === 'buy' ? 'quote' : 'base',
      filledAmount: row.cumExecQty,
      avgPrice: row.avgPrice,
      status: mapSpotOrderStatus(row.orderStatus),
      fee: side === 'buy' ? row.cumExecFee * row.avgPrice : row.cumExecFee,
      baseFee,
      updatedAt: row.updatedTime,
    };
  }

  /** Read call: retried on transient errors with linear backoff */
  private async read<S extends z.ZodTypeAny>(
    operation: string,
    schema: S,
    request: () => Promise<BybitResponse>,
  ): Promise<Result<z.output<S>>> {
    let attempt = 0;
    for (;;) {
      const result = await this.call(operation, schema, request);
      if (result.ok || !isTransient(result.error) || attempt >= this.maxReadRetries) {
        return result;
      }
      attempt++;
      this.logger.debug(`${operation} retry ${attempt}/${this.maxReadRetries}`, {
        error: result.error.message,
      });
      await this.sleep(this.retryDelayMs * attempt);
    }
  }

  /** Order and configuration calls: a single attempt */
  private write<S extends z.ZodTypeAny>(
    operation: string,
    schema: S,
    request: () => Promise<BybitResponse>,
  ): Promise<Result<z.output<S>>> {
    return this.call(operation, schema, request);
  }

  private async call<S extends z.ZodTypeAny>(
    operation: string,
    schema: S,
    request: () => Promise<BybitResponse>,
  ): Promise<Result<z.output<S>>> {
    let response: BybitResponse;
    try {
      response = await request();
    } catch (error) {
      return err(gatewayError('network', operation, errorMessage(error)));
    }

    if (response.retCode !== 0) {
      const failure: GatewayError = gatewayError(
        classifyRetCode(response.retCode),
        operation,
        response.retMsg,
        response.retCode,
      );
      return err(failure);
    }

    const parsed = schema.safeParse(response.result);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'schema mismatch';
      return err(gatewayError('invalid_response', operation, where));
    }
    return ok(parsed.data);
  }
}
