/**
 * Funding Hedge Bot — Orchestrator
 *
 * Wires OpportunityRanker + HedgeExecutor + PositionMonitor + AlertManager
 * (+ optional HedgeJournal) around an ExchangeGateway.
 *
 * Tick loop (sequential, one tick at a time):
 *   1. Open phase: skip while any position is open, otherwise
 *      rank → settlement gate → market data → wallet → size → execute
 *   2. Monitor phase: combined PnL per hedge, unwind when profitable
 *   3. Sleep tickIntervalMs
 */

import type { Contract, FundingHedgeConfig } from '@/types/funding-hedge';
import { describeError } from '@/types/result';
import type { ExchangeGateway } from '@/lib/exchange/gateway';
import type { AlertManager } from './alerts';
import type { HedgeJournal } from './hedge-journal';
import type { Logger } from './logger';
import { computeOrderSizes } from './hedge-sizer';
import { HedgeExecutor, defaultSleep, type Sleep } from './hedge-executor';
import {
  OpportunityRanker,
  RankerSession,
  fundingRatePct,
  priorityScore,
} from './opportunity-ranker';
import { PositionMonitor } from './position-monitor';
import { isNearSettlement, secondsUntilSettlement } from './settlement-gate';
import { SETTLE_COIN } from './config';

/** Phases slower than this are logged at debug level */
const SLOW_PHASE_MS = 500;

export interface FundingHedgeBotDeps {
  config: FundingHedgeConfig;
  gateway: ExchangeGateway;
  logger: Logger;
  alerts: AlertManager;
  journal?: HedgeJournal;
  sleep?: Sleep;
  /** Wall clock in ms */
  now?: () => number;
}

export interface FundingHedgeBotStats {
  ticks: number;
  runtimeMs: number;
  avgTickMs: number;
  hedgesOpened: number;
  hedgesClosed: number;
  openFailures: number;
  scans: number;
  validatedContracts: number;
}

export class FundingHedgeBot {
  private config: FundingHedgeConfig;
  private gateway: ExchangeGateway;
  private logger: Logger;
  private alerts: AlertManager;
  private journal: HedgeJournal | undefined;
  private sleep: Sleep;
  private now: () => number;

  private session = new RankerSession();
  private ranker: OpportunityRanker;
  private executor: HedgeExecutor;
  private monitor: PositionMonitor;

  private running = false;
  private loop: Promise<void> | null = null;
  private startedAt = 0;
  private ticks = 0;
  private tickTimeMs = 0;
  private hedgesOpened = 0;
  private hedgesClosed = 0;
  private openFailures = 0;

  constructor(deps: FundingHedgeBotDeps) {
    this.config = deps.config;
    this.gateway = deps.gateway;
    this.logger = deps.logger;
    this.alerts = deps.alerts;
    this.journal = deps.journal;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;

    this.ranker = new OpportunityRanker(this.gateway, this.config, this.logger.child('ranker'));
    this.executor = new HedgeExecutor(
      this.gateway,
      this.config,
      this.logger.child('executor'),
      this.alerts,
      this.sleep,
    );
    this.monitor = new PositionMonitor(
      this.gateway,
      this.config,
      this.logger.child('monitor'),
      this.alerts,
    );
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Prepare the account, then run the loop until stop() or an unexpected
   * error. Resolves when the loop has ended; rejects with that error.
   */
  async start(): Promise<void> {
    if (this.running) return;

    this.logger.info('--- Funding Hedge Bot ---', {
      balance: this.config.targetBalance,
      leverage: this.config.leverage,
      minRatePct: this.config.minFundingRatePct,
      bufferSec: this.config.settlementBufferSeconds,
      blacklist: this.config.blacklist.join(',') || 'none',
    });

    const mode = await this.gateway.setPositionMode(false);
    if (!mode.ok) {
      this.logger.warn('could not set one-way position mode', {
        error: describeError(mode.error),
      });
    }

    const orphaned = await this.monitor.reconcileAtStartup();
    for (const contractId of orphaned) {
      this.journal?.recordOrphaned(contractId, 'no matching spot leg at startup');
    }

    await this.alerts.botStarted();

    this.running = true;
    this.startedAt = this.now();
    this.loop = this.runLoop();
    return this.loop;
  }

  /** Stop scheduling ticks and wait for the in-flight one to finish */
  async stop(reason = 'shutdown'): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.loop) {
      // A crash was already logged and alerted by the loop itself
      await this.loop.catch((err: unknown) => {
        this.logger.debug('loop ended with error', {
          error: err instanceof Error ? err.message : String(err),
        });
      });
    }

    this.logStats();
    await this.alerts.botStopped(reason);
  }

  private async runLoop(): Promise<void> {
    try {
      while (this.running) {
        await this.tick();
        if (!this.running) break;
        await this.sleep(this.config.tickIntervalMs);
      }
    } catch (err) {
      // Left as-is on the exchange: the next start reconciles it
      this.running = false;
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error('unexpected error, stopping', { error: message });
      await this.alerts.error(`Funding hedge loop crashed: ${message}`);
      throw err;
    }
  }

  // ============================================
  // Core Tick
  // ============================================

  async tick(): Promise<void> {
    const tickStart = this.now();
    this.ticks++;

    await this.timed('open phase', () => this.openPhase());

    const reports = await this.timed('monitor phase', () =>
      this.monitor.reconcileAndMaybeClose(),
    );
    for (const report of reports) {
      if (report.action === 'closed') this.hedgesClosed++;
      this.journal?.recordUnwind(report);
    }

    this.tickTimeMs += this.now() - tickStart;
    if (this.ticks % this.config.statsEveryTicks === 0) {
      this.logStats();
    }
  }

  private async openPhase(): Promise<void> {
    const positions = await this.gateway.getAllPositions();
    if (!positions.ok) {
      this.logger.warn('positions unavailable, skipping open', {
        error: describeError(positions.error),
      });
      return;
    }
    if (positions.value.length > 0) {
      if (this.config.verbose) {
        this.logger.debug(`${positions.value.length} position(s) open, skipping open`);
      }
      return;
    }

    const best = await this.timed('ranking', () => this.ranker.selectBestCandidate(this.session));
    if (!best) return;

    const nowSeconds = Math.floor(this.now() / 1000);
    if (!isNearSettlement(best.fundingIntervalSeconds, this.config.settlementBufferSeconds, nowSeconds)) {
      return;
    }

    const remaining = secondsUntilSettlement(best.fundingIntervalSeconds, nowSeconds);
    this.logger.info(`settlement gate open for ${best.id}`, {
      remainingSec: remaining,
      settlesAt: new Date((nowSeconds + remaining) * 1000).toISOString(),
      ratePct: fundingRatePct(best).toFixed(4),
    });
    this.journal?.recordCandidate(best, priorityScore(best));

    await this.openCandidate(best);
  }

  private async openCandidate(contract: Contract): Promise<void> {
    const [futuresTicker, spotTicker] = await Promise.all([
      this.gateway.getFuturesTicker(contract.id),
      this.gateway.getSpotTicker(contract.id),
    ]);
    if (!futuresTicker.ok) {
      this.logger.warn(`futures ticker unavailable for ${contract.id}`, {
        error: describeError(futuresTicker.error),
      });
      return;
    }
    if (!spotTicker.ok) {
      this.logger.warn(`spot ticker unavailable for ${contract.id}`, {
        error: describeError(spotTicker.error),
      });
      return;
    }

    const wallet = await this.gateway.getWalletBalance();
    if (!wallet.ok) {
      this.logger.warn('wallet balance unavailable', { error: describeError(wallet.error) });
      return;
    }
    const required = this.config.targetBalance * this.config.balanceReserveMultiplier;
    if (wallet.value.available < required) {
      this.logger.warn('insufficient balance', {
        available: `${wallet.value.available.toFixed(2)} ${SETTLE_COIN}`,
        required: `${required.toFixed(2)} ${SETTLE_COIN}`,
      });
      return;
    }

    const ratePct = fundingRatePct(contract);
    const sizes = computeOrderSizes(
      {
        fundingRatePct: ratePct,
        futuresBid: futuresTicker.value.bid,
        futuresAsk: futuresTicker.value.ask,
        spotAsk: spotTicker.value.ask,
        quantoMultiplier: contract.quantoMultiplier,
        targetBalance: this.config.targetBalance,
      },
      this.config.spotQuoteBuffer,
    );
    if (!sizes) {
      this.logger.warn(`balance too small for one contract of ${contract.id}`, {
        balance: this.config.targetBalance,
        multiplier: contract.quantoMultiplier,
      });
      return;
    }

    const outcome = await this.executor.openHedge({
      contractId: contract.id,
      spotQuoteAmount: sizes.spotQuoteAmount,
      futuresContracts: sizes.futuresContracts,
    });

    switch (outcome.status) {
      case 'hedged':
        this.hedgesOpened++;
        this.journal?.recordOpened(contract, sizes);
        await this.alerts.hedgeOpened(
          contract.id,
          sizes.direction,
          sizes.futuresContracts,
          sizes.spotQuoteAmount,
          ratePct,
        );
        break;
      case 'failed':
        this.openFailures++;
        if (outcome.stage === 'spot' && !outcome.rolledBack) {
          this.journal?.recordRollbackFailed(contract, sizes, outcome.reason);
        } else {
          this.journal?.recordOpenFailed(contract, sizes, outcome.reason);
        }
        break;
      case 'skipped':
        break;
    }
  }

  // ============================================
  // Stats
  // ============================================

  private async timed<T>(phase: string, fn: () => Promise<T>): Promise<T> {
    const started = this.now();
    const result = await fn();
    const elapsed = this.now() - started;
    if (elapsed > SLOW_PHASE_MS) {
      this.logger.debug(`${phase} took ${elapsed}ms`);
    }
    return result;
  }

  private logStats(): void {
    const stats = this.getStats();
    this.logger.info('loop stats', {
      ticks: stats.ticks,
      runtimeHours: (stats.runtimeMs / 3_600_000).toFixed(2),
      avgTickMs: stats.avgTickMs.toFixed(1),
      opened: stats.hedgesOpened,
      closed: stats.hedgesClosed,
      failed: stats.openFailures,
    });
  }

  getStats(): FundingHedgeBotStats {
    return {
      ticks: this.ticks,
      runtimeMs: this.startedAt > 0 ? this.now() - this.startedAt : 0,
      avgTickMs: this.ticks > 0 ? this.tickTimeMs / this.ticks : 0,
      hedgesOpened: this.hedgesOpened,
      hedgesClosed: this.hedgesClosed,
      openFailures: this.openFailures,
      scans: this.session.getScanCount(),
      validatedContracts: this.session.getValidatedCount(),
    };
  }
}
