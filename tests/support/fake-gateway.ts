/**
 * In-memory ExchangeGateway for tests.
 *
 * Holds contracts, tickers, positions and spot order history in plain
 * maps, records every call, and fails any method on demand.
 */

import type { ExchangeGateway } from '@/lib/exchange/gateway';
import type { Candle } from '@/types/candle';
import type {
  Balance,
  CandleInterval,
  Contract,
  OrderInfo,
  OrderMarket,
  OrderSide,
  Position,
  SpotOrderAmount,
  Ticker,
} from '@/types/funding-hedge';
import {
  err,
  gatewayError,
  ok,
  type GatewayErrorKind,
  type Result,
} from '@/types/result';

export type GatewayMethod = keyof ExchangeGateway;

export interface GatewayCall {
  method: GatewayMethod;
  args: unknown[];
}

export function makeContract(overrides: Partial<Contract> & { id: string }): Contract {
  return {
    fundingRate: 0.005,
    fundingIntervalSeconds: 28_800,
    quantoMultiplier: 0.01,
    markPrice: 100,
    indexPrice: 100,
    nextFundingTime: 0,
    ...overrides,
  };
}

export function makeTicker(contractId: string, bid: number, ask: number): Ticker {
  return {
    contractId,
    bid,
    ask,
    last: (bid + ask) / 2,
    baseVolume: 1_000,
    quoteVolume: 100_000,
    timestamp: 0,
  };
}

export function makePosition(overrides: Partial<Position> & { contractId: string }): Position {
  return {
    size: 0,
    leverage: 3,
    unrealizedPnl: 0,
    realizedPnl: 0,
    entryPrice: 100,
    markPrice: 100,
    ...overrides,
  };
}

export function makeSpotOrder(overrides: Partial<OrderInfo> & { contractId: string }): OrderInfo {
  return {
    id: `spot-${overrides.contractId}`,
    market: 'spot',
    side: 'buy',
    amount: 200,
    amountUnit: 'quote',
    filledAmount: 2,
    avgPrice: 100,
    status: 'closed',
    fee: 0,
    baseFee: 0,
    updatedAt: 1_000,
    ...overrides,
  };
}

const CANDLE: Candle = { timestamp: 0, open: 1, high: 1, low: 1, close: 1, volume: 1 };

export class FakeGateway implements ExchangeGateway {
  contracts: Contract[] = [];
  futuresTickers: Map<string, Ticker> = new Map();
  spotTickers: Map<string, Ticker> = new Map();
  /** Contracts with a tradable spot pair; others return no candles */
  spotMarkets: Set<string> = new Set();
  balance: Balance = { currency: 'USDT', available: 1_000, total: 1_000 };
  positions: Map<string, Position> = new Map();
  spotOrders: Map<string, OrderInfo[]> = new Map();

  readonly calls: GatewayCall[] = [];
  private failures: Map<GatewayMethod, GatewayErrorKind> = new Map();
  private orderSeq = 0;

  /** Make every later call of `method` fail with `kind` */
  fail(method: GatewayMethod, kind: GatewayErrorKind = 'rejected'): void {
    this.failures.set(method, kind);
  }

  recover(method: GatewayMethod): void {
    this.failures.delete(method);
  }

  callsOf(method: GatewayMethod): GatewayCall[] {
    return this.calls.filter((c) => c.method === method);
  }

  /** Order placements of either market */
  placements(): GatewayCall[] {
    return this.calls.filter(
      (c) => c.method === 'placeFuturesOrder' || c.method === 'placeSpotOrder',
    );
  }

  // ============================================
  // ExchangeGateway
  // ============================================

  async listContracts(): Promise<Result<Contract[]>> {
    return this.run('listContracts', [], () => ok([...this.contracts]));
  }

  async getFuturesTicker(contractId: string): Promise<Result<Ticker>> {
    return this.run('getFuturesTicker', [contractId], () => this.lookup(this.futuresTickers, contractId));
  }

  async getSpotTicker(contractId: string): Promise<Result<Ticker>> {
    return this.run('getSpotTicker', [contractId], () => this.lookup(this.spotTickers, contractId));
  }

  async getSpotCandles(
    contractId: string,
    interval: CandleInterval,
    limit: number,
  ): Promise<Result<Candle[]>> {
    return this.run('getSpotCandles', [contractId, interval, limit], () =>
      ok(this.spotMarkets.has(contractId) ? [CANDLE] : []),
    );
  }

  async getWalletBalance(): Promise<Result<Balance>> {
    return this.run('getWalletBalance', [], () => ok({ ...this.balance }));
  }

  async getPosition(contractId: string): Promise<Result<Position>> {
    return this.run('getPosition', [contractId], () =>
      ok(this.positions.get(contractId) ?? makePosition({ contractId })),
    );
  }

  async getAllPositions(): Promise<Result<Position[]>> {
    return this.run('getAllPositions', [], () =>
      ok([...this.positions.values()].filter((p) => p.size !== 0)),
    );
  }

  async placeFuturesOrder(
    contractId: string,
    price: number,
    signedSize: number,
  ): Promise<Result<OrderInfo>> {
    return this.run('placeFuturesOrder', [contractId, price, signedSize], () => {
      const current = this.positions.get(contractId) ?? makePosition({ contractId });
      this.positions.set(contractId, { ...current, size: current.size + signedSize });
      return ok(
        this.order(contractId, 'futures', signedSize > 0 ? 'buy' : 'sell', {
          value: Math.abs(signedSize),
          unit: 'base',
        }),
      );
    });
  }

  async closeFuturesPosition(contractId: string, signedSize?: number): Promise<Result<void>> {
    const args = signedSize === undefined ? [contractId] : [contractId, signedSize];
    return this.run('closeFuturesPosition', args, () => {
      const current = this.positions.get(contractId);
      const remaining = signedSize === undefined || !current ? 0 : current.size - signedSize;
      if (current && remaining !== 0) {
        this.positions.set(contractId, { ...current, size: remaining });
      } else {
        this.positions.delete(contractId);
      }
      return ok(undefined);
    });
  }

  async placeSpotOrder(
    contractId: string,
    side: OrderSide,
    amount: SpotOrderAmount,
  ): Promise<Result<OrderInfo>> {
    return this.run('placeSpotOrder', [contractId, side, amount], () => {
      const order = this.order(contractId, 'spot', side, amount);
      const history = this.spotOrders.get(contractId) ?? [];
      history.push({ ...order, status: 'closed' });
      this.spotOrders.set(contractId, history);
      return ok(order);
    });
  }

  async listClosedSpotOrders(contractId: string): Promise<Result<OrderInfo[]>> {
    return this.run('listClosedSpotOrders', [contractId], () =>
      ok([...(this.spotOrders.get(contractId) ?? [])]),
    );
  }

  async setLeverage(
    contractId: string,
    leverage: number,
    market: OrderMarket,
  ): Promise<Result<void>> {
    return this.run('setLeverage', [contractId, leverage, market], () => ok(undefined));
  }

  async setPositionMode(hedged: boolean): Promise<Result<void>> {
    return this.run('setPositionMode', [hedged], () => ok(undefined));
  }

  // ============================================
  // Internals
  // ============================================

  private run<T>(method: GatewayMethod, args: unknown[], fn: () => Result<T>): Result<T> {
    this.calls.push({ method, args });
    const kind = this.failures.get(method);
    if (kind) {
      return err(gatewayError(kind, method, `${method} failed`));
    }
    return fn();
  }

  private lookup<T>(map: Map<string, T>, contractId: string): Result<T> {
    const value = map.get(contractId);
    return value ? ok(value) : err(gatewayError('not_found', 'lookup', `unknown ${contractId}`));
  }

  private order(
    contractId: string,
    market: OrderMarket,
    side: OrderSide,
    amount: SpotOrderAmount,
  ): OrderInfo {
    this.orderSeq++;
    const ticker = this.spotTickers.get(contractId);
    return {
      id: `order-${this.orderSeq}`,
      contractId,
      market,
      side,
      amount: amount.value,
      amountUnit: amount.unit,
      filledAmount: 0,
      avgPrice: ticker ? ticker.ask : 0,
      status: 'open',
      fee: 0,
      baseFee: 0,
      updatedAt: 10_000 + this.orderSeq,
    };
  }
}
