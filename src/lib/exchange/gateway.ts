/**
 * Exchange Gateway Interface
 *
 * Capability interface the hedge controller runs against. Implementations
 * wrap a venue's REST API (see BybitGateway) or simulate one in tests.
 * Every call resolves to a Result and never rejects.
 */

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
import type { Result } from '@/types/result';

export interface ExchangeGateway {
  /** All tradable USDT perpetual contracts with their current funding rate */
  listContracts(): Promise<Result<Contract[]>>;

  getFuturesTicker(contractId: string): Promise<Result<Ticker>>;
  getSpotTicker(contractId: string): Promise<Result<Ticker>>;
  getSpotCandles(
    contractId: string,
    interval: CandleInterval,
    limit: number,
  ): Promise<Result<Candle[]>>;

  getWalletBalance(): Promise<Result<Balance>>;

  /** Current futures position; a flat contract resolves with size 0 */
  getPosition(contractId: string): Promise<Result<Position>>;
  /** Non-zero futures positions only */
  getAllPositions(): Promise<Result<Position[]>>;

  /**
   * Place a futures order. `price` 0 means market; `signedSize` is a
   * contract count, positive to buy and negative to sell.
   */
  placeFuturesOrder(
    contractId: string,
    price: number,
    signedSize: number,
  ): Promise<Result<OrderInfo>>;
  /**
   * Reduce-only close. Without `signedSize` closes the whole position as
   * reported (ok when already flat); with it, offsets exactly that many
   * contracts without reading the position first.
   */
  closeFuturesPosition(contractId: string, signedSize?: number): Promise<Result<void>>;

  placeSpotOrder(
    contractId: string,
    side: OrderSide,
    amount: SpotOrderAmount,
  ): Promise<Result<OrderInfo>>;
  /** Recent spot orders no longer on the book (closed or canceled) */
  listClosedSpotOrders(contractId: string): Promise<Result<OrderInfo[]>>;

  setLeverage(
    contractId: string,
    leverage: number,
    market: OrderMarket,
  ): Promise<Result<void>>;
  /** `hedged` = two-way position mode, false = one-way */
  setPositionMode(hedged: boolean): Promise<Result<void>>;
}
