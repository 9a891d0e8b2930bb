/**
 * Hedge Executor — Paired Order Placement with Rollback
 *
 * State machine per call:
 *   NO_POSITION → FUTURES_PENDING → FUTURES_OPEN → SPOT_PENDING → HEDGED
 *   FUTURES_OPEN ──spot leg fails──→ ROLLING_BACK → NO_POSITION
 *   ROLLING_BACK ──close fails──→ MANUAL_INTERVENTION
 *
 * Places 0 orders when a position already exists, 1 (closed again) when
 * the spot leg fails, 2 on success.
 */

import type {
  FundingHedgeConfig,
  HedgeExecutionState,
  HedgeOutcome,
  HedgeRequest,
  OrderMarket,
  OrderSide,
} from '@/types/funding-hedge';
import { describeError } from '@/types/result';
import type { ExchangeGateway } from '@/lib/exchange/gateway';
import type { AlertManager } from './alerts';
import type { Logger } from './logger';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** Spot side that hedges a signed futures size */
export function hedgingSpotSide(futuresContracts: number): OrderSide {
  return futuresContracts < 0 ? 'buy' : 'sell';
}

export class HedgeExecutor {
  private gateway: ExchangeGateway;
  private config: FundingHedgeConfig;
  private logger: Logger;
  private alerts: AlertManager;
  private sleep: Sleep;

  constructor(
    gateway: ExchangeGateway,
    config: FundingHedgeConfig,
    logger: Logger,
    alerts: AlertManager,
    sleep: Sleep = defaultSleep,
  ) {
    this.gateway = gateway;
    this.config = config;
    this.logger = logger;
    this.alerts = alerts;
    this.sleep = sleep;
  }

  async openHedge(request: HedgeRequest): Promise<HedgeOutcome> {
    const { contractId, spotQuoteAmount, futuresContracts } = request;
    const states: HedgeExecutionState[] = ['no_position'];

    if (futuresContracts === 0 || !Number.isInteger(futuresContracts)) {
      return { status: 'skipped', reason: `invalid futures size ${futuresContracts}`, states };
    }

    // Never stack hedges: the loop re-enters every tick
    const existing = await this.gateway.getPosition(contractId);
    if (!existing.ok) {
      this.logger.warn(`cannot verify position for ${contractId}, skipping`, {
        error: describeError(existing.error),
      });
      return { status: 'skipped', reason: 'position check failed', states };
    }
    if (existing.value.size !== 0) {
      this.logger.warn(`${contractId} already has a position, skipping`, {
        size: existing.value.size,
      });
      return { status: 'skipped', reason: 'position already open', states };
    }

    await this.configureLeverage(contractId, 'futures');
    await this.configureLeverage(contractId, 'spot');

    const spotSide = hedgingSpotSide(futuresContracts);
    this.logger.info(`opening hedge ${contractId}`, {
      futures: futuresContracts,
      spotSide,
      spotQuote: spotQuoteAmount.toFixed(2),
    });

    states.push('futures_pending');
    const futuresOrder = await this.gateway.placeFuturesOrder(contractId, 0, futuresContracts);
    if (!futuresOrder.ok) {
      this.logger.error(`futures order failed for ${contractId}`, {
        error: describeError(futuresOrder.error),
      });
      states.push('no_position');
      return {
        status: 'failed',
        stage: 'futures',
        rolledBack: false,
        reason: describeError(futuresOrder.error),
        states,
      };
    }
    states.push('futures_open');
    this.logger.info(`futures leg placed ${contractId}`, { orderId: futuresOrder.value.id });

    states.push('spot_pending');
    const spotOrder = await this.gateway.placeSpotOrder(contractId, spotSide, {
      value: spotQuoteAmount,
      unit: 'quote',
    });
    if (!spotOrder.ok) {
      const reason = describeError(spotOrder.error);
      this.logger.error(`spot ${spotSide} failed for ${contractId}, rolling back futures leg`, {
        error: reason,
      });
      return this.rollback(contractId, futuresContracts, reason, states);
    }

    states.push('hedged');
    this.logger.info(`hedge complete ${contractId}`, {
      futuresOrderId: futuresOrder.value.id,
      spotOrderId: spotOrder.value.id,
      waitMs: this.config.orderSettleWaitMs,
    });

    if (this.config.orderSettleWaitMs > 0) {
      await this.sleep(this.config.orderSettleWaitMs);
    }

    return {
      status: 'hedged',
      futuresOrder: futuresOrder.value,
      spotOrder: spotOrder.value,
      states,
    };
  }

  /**
   * One close attempt, no retry: the account state is already unknown.
   * Sized from the order just placed, not from a position read that may lag it.
   */
  private async rollback(
    contractId: string,
    futuresContracts: number,
    reason: string,
    states: HedgeExecutionState[],
  ): Promise<HedgeOutcome> {
    states.push('rolling_back');
    const closed = await this.gateway.closeFuturesPosition(contractId, futuresContracts);

    if (!closed.ok) {
      states.push('manual_intervention');
      const closeReason = describeError(closed.error);
      this.logger.error(`MANUAL INTERVENTION REQUIRED: rollback of ${contractId} failed`, {
        error: closeReason,
      });
      await this.alerts.rollbackFailed(contractId, closeReason);
      return { status: 'failed', stage: 'spot', rolledBack: false, reason, states };
    }

    states.push('no_position');
    this.logger.warn(`futures leg of ${contractId} rolled back`);
    return { status: 'failed', stage: 'spot', rolledBack: true, reason, states };
  }

  /** Best effort: default leverage may already be acceptable */
  private async configureLeverage(contractId: string, market: OrderMarket): Promise<void> {
    const result = await this.gateway.setLeverage(contractId, this.config.leverage, market);
    if (!result.ok) {
      this.logger.warn(`set ${market} leverage failed for ${contractId}`, {
        leverage: this.config.leverage,
        error: describeError(result.error),
      });
    }
  }
}
