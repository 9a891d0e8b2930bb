/**
 * Position Monitor — Combined PnL + Unwind
 *
 * Each tick, pairs every open futures position with the latest closed spot
 * order on the same symbol (the spot leg's cost basis), prices the spot leg
 * against the current book and unwinds both legs once
 * futures PnL + spot PnL > 0. There is no other exit.
 */

import type {
  FundingHedgeConfig,
  HedgeReport,
  OrderInfo,
  Position,
  Ticker,
} from '@/types/funding-hedge';
import { describeError } from '@/types/result';
import type { ExchangeGateway } from '@/lib/exchange/gateway';
import type { AlertManager } from './alerts';
import type { Logger } from './logger';

// ============================================
// PnL Math
// ============================================

/** Base quantity of a spot order, converting quote-denominated amounts at the fill price */
export function spotBaseAmount(order: OrderInfo): number {
  if (order.amountUnit === 'base') return order.amount;
  return order.avgPrice > 0 ? order.amount / order.avgPrice : 0;
}

/**
 * Spot leg PnL against the current book.
 * sell leg: (entry - bid) × base − fee × k
 * buy leg:  (ask − entry) × base − fee × k
 */
export function computeSpotPnl(
  order: OrderInfo,
  quote: Pick<Ticker, 'bid' | 'ask'>,
  feeMultiplier: number,
): number {
  const base = spotBaseAmount(order);
  const fees = order.fee * feeMultiplier;

  if (order.side === 'sell') {
    return (order.avgPrice - quote.bid) * base - fees;
  }
  return (quote.ask - order.avgPrice) * base - fees;
}

/** Base coin the spot leg left in the account, net of any fee withheld in base */
export function spotHeldAmount(order: OrderInfo): number {
  return Math.max(0, spotBaseAmount(order) - order.baseFee);
}

export function futuresPnl(position: Position): number {
  return position.unrealizedPnl + position.realizedPnl;
}

/** Strictly positive: a flat 0 keeps the hedge open */
export function shouldUnwind(totalPnl: number): boolean {
  return totalPnl > 0;
}

export function latestOrder(orders: OrderInfo[]): OrderInfo | null {
  let latest: OrderInfo | null = null;
  for (const order of orders) {
    if (!latest || order.updatedAt > latest.updatedAt) latest = order;
  }
  return latest;
}

// ============================================
// Spot Leg Lookup
// ============================================

export type SpotLegLookup =
  | { kind: 'found'; order: OrderInfo }
  | { kind: 'orphaned'; reason: string }
  | { kind: 'unavailable'; reason: string };

export class PositionMonitor {
  private gateway: ExchangeGateway;
  private config: FundingHedgeConfig;
  private logger: Logger;
  private alerts: AlertManager;

  constructor(
    gateway: ExchangeGateway,
    config: FundingHedgeConfig,
    logger: Logger,
    alerts: AlertManager,
  ) {
    this.gateway = gateway;
    this.config = config;
    this.logger = logger;
    this.alerts = alerts;
  }

  /**
   * Latest closed spot order in the hedging direction of the position:
   * sell for a futures long, buy for a futures short.
   */
  async findSpotLeg(position: Position): Promise<SpotLegLookup> {
    const listed = await this.gateway.listClosedSpotOrders(position.contractId);
    if (!listed.ok) {
      return { kind: 'unavailable', reason: describeError(listed.error) };
    }

    const order = latestOrder(listed.value);
    if (!order) {
      return { kind: 'orphaned', reason: 'no spot orders found' };
    }
    if (order.status !== 'closed') {
      return { kind: 'orphaned', reason: `latest spot order ${order.id} is ${order.status}` };
    }

    const expected = position.size > 0 ? 'sell' : 'buy';
    if (order.side !== expected) {
      return {
        kind: 'orphaned',
        reason: `latest spot order ${order.id} is a ${order.side}, expected ${expected}`,
      };
    }

    return { kind: 'found', order };
  }

  /** Startup check: report every open position without a matching spot leg */
  async reconcileAtStartup(): Promise<string[]> {
    const positions = await this.gateway.getAllPositions();
    if (!positions.ok) {
      this.logger.warn('startup reconciliation skipped, positions unavailable', {
        error: describeError(positions.error),
      });
      return [];
    }

    const orphaned: string[] = [];
    for (const position of positions.value) {
      const leg = await this.findSpotLeg(position);
      if (leg.kind === 'orphaned') {
        orphaned.push(position.contractId);
        this.logger.warn(`orphaned position ${position.contractId}, manual intervention required`, {
          size: position.size,
          reason: leg.reason,
        });
        await this.alerts.orphanedPosition(position.contractId, leg.reason);
      } else if (leg.kind === 'unavailable') {
        this.logger.warn(`cannot check spot leg of ${position.contractId}`, { error: leg.reason });
      } else {
        this.logger.info(`resumed hedge ${position.contractId}`, {
          size: position.size,
          spotOrderId: leg.order.id,
        });
      }
    }

    return orphaned;
  }

  async reconcileAndMaybeClose(): Promise<HedgeReport[]> {
    const positions = await this.gateway.getAllPositions();
    if (!positions.ok) {
      this.logger.warn('positions unavailable', { error: describeError(positions.error) });
      return [];
    }

    const reports: HedgeReport[] = [];
    for (const position of positions.value) {
      const report = await this.evaluate(position);
      if (report) reports.push(report);
    }
    return reports;
  }

  private async evaluate(position: Position): Promise<HedgeReport | null> {
    const contractId = position.contractId;

    const leg = await this.findSpotLeg(position);
    if (leg.kind !== 'found') {
      this.logger.warn(`skipping ${contractId}: ${leg.reason}`);
      return null;
    }

    const ticker = await this.gateway.getSpotTicker(contractId);
    if (!ticker.ok) {
      this.logger.warn(`spot ticker unavailable for ${contractId}`, {
        error: describeError(ticker.error),
      });
      return null;
    }

    const order = leg.order;
    const futures = futuresPnl(position);
    const spot = computeSpotPnl(order, ticker.value, this.config.feeMultiplier);
    const total = futures + spot;

    const report: HedgeReport = {
      contractId,
      futuresSide: position.size > 0 ? 'long' : 'short',
      size: position.size,
      spotSide: order.side,
      spotBaseAmount: spotHeldAmount(order),
      futuresPnl: futures,
      spotPnl: spot,
      totalPnl: total,
      action: 'hold',
    };

    this.logger.info(`hedge ${contractId}`, {
      futures: `${report.futuresSide}:${position.size}`,
      spot: `${order.side}:${report.spotBaseAmount.toFixed(6)}`,
      futuresPnl: futures.toFixed(4),
      spotPnl: spot.toFixed(4),
      totalPnl: total.toFixed(4),
    });

    if (!shouldUnwind(total)) return report;

    report.action = await this.unwind(report);
    return report;
  }

  private async unwind(report: HedgeReport): Promise<HedgeReport['action']> {
    const { contractId } = report;
    this.logger.info(`closing hedge ${contractId}`, { totalPnl: report.totalPnl.toFixed(4) });

    const closed = await this.gateway.closeFuturesPosition(contractId);
    if (!closed.ok) {
      // Spot leg stays in place so the account is still hedged
      const reason = describeError(closed.error);
      this.logger.error(`MANUAL INTERVENTION REQUIRED: futures close failed for ${contractId}`, {
        error: reason,
      });
      await this.alerts.unwindFailed(contractId, reason);
      return 'close_failed';
    }

    const side = report.spotSide === 'sell' ? 'buy' : 'sell';
    const spotOrder = await this.gateway.placeSpotOrder(contractId, side, {
      value: report.spotBaseAmount,
      unit: 'base',
    });
    if (!spotOrder.ok) {
      const reason = describeError(spotOrder.error);
      this.logger.error(`MANUAL INTERVENTION REQUIRED: spot ${side} unwind failed for ${contractId}`, {
        error: reason,
      });
      await this.alerts.unwindFailed(contractId, reason);
      return 'close_failed';
    }

    this.logger.info(`hedge closed ${contractId}`, {
      spotOrderId: spotOrder.value.id,
      totalPnl: report.totalPnl.toFixed(4),
    });
    await this.alerts.hedgeClosed(report);
    return 'closed';
  }
}
