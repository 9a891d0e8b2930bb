/**
 * Opportunity Ranker — Pick the Best Funding Contract
 *
 * Filters contracts by blacklist and funding-rate threshold, proves the
 * spot pair is tradable with one recent candle, then ranks by the
 * daily-equivalent yield: |rate%| × settlements per day.
 */

import type { Contract, FundingHedgeConfig } from '@/types/funding-hedge';
import { describeError } from '@/types/result';
import type { ExchangeGateway } from '@/lib/exchange/gateway';
import type { Logger } from './logger';
import { VALIDATION_CANDLE_INTERVAL } from './config';

const SECONDS_PER_DAY = 86_400;

/**
 * Per-run ranker state, owned by the bot for its lifetime.
 * Remembers contracts whose spot pair already passed validation.
 */
export class RankerSession {
  private validated: Set<string> = new Set();
  private scans = 0;

  isValidated(contractId: string): boolean {
    return this.validated.has(contractId);
  }

  markValidated(contractId: string): void {
    this.validated.add(contractId);
  }

  recordScan(): void {
    this.scans++;
  }

  getScanCount(): number {
    return this.scans;
  }

  getValidatedCount(): number {
    return this.validated.size;
  }
}

/** Funding rate in percent: 0.001 → 0.1 */
export function fundingRatePct(contract: Contract): number {
  return contract.fundingRate * 100;
}

export function priorityScore(contract: Contract): number {
  return (
    Math.abs(fundingRatePct(contract)) *
    (SECONDS_PER_DAY / contract.fundingIntervalSeconds)
  );
}

export function passesThreshold(
  contract: Contract,
  minFundingRatePct: number,
): boolean {
  return Math.abs(fundingRatePct(contract)) >= minFundingRatePct;
}

/** Stable descending sort by priority; equal scores keep listing order */
export function rankContracts(contracts: Contract[]): Contract[] {
  return contracts
    .filter((c) => c.fundingIntervalSeconds > 0)
    .map((contract, index) => ({ contract, index, score: priorityScore(contract) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map((entry) => entry.contract);
}

export class OpportunityRanker {
  private gateway: ExchangeGateway;
  private config: FundingHedgeConfig;
  private logger: Logger;

  constructor(gateway: ExchangeGateway, config: FundingHedgeConfig, logger: Logger) {
    this.gateway = gateway;
    this.config = config;
    this.logger = logger;
  }

  async selectBestCandidate(session: RankerSession): Promise<Contract | null> {
    session.recordScan();

    const listed = await this.gateway.listContracts();
    if (!listed.ok) {
      this.logger.warn('contract list unavailable', { error: describeError(listed.error) });
      return null;
    }

    const blacklist = new Set(this.config.blacklist);
    const candidates = listed.value.filter(
      (c) =>
        !blacklist.has(c.id) &&
        passesThreshold(c, this.config.minFundingRatePct),
    );
    if (candidates.length === 0) return null;

    const tradable = await this.validateCandidates(candidates, session);
    if (tradable.length === 0) {
      if (this.config.verbose) {
        this.logger.info('no tradable candidates', { candidates: candidates.length });
      }
      return null;
    }

    const best = rankContracts(tradable)[0] ?? null;
    if (best && this.config.verbose) {
      this.logger.info(`best candidate ${best.id}`, {
        ratePct: fundingRatePct(best).toFixed(4),
        intervalHours: best.fundingIntervalSeconds / 3600,
        score: priorityScore(best).toFixed(4),
      });
    }
    return best;
  }

  /**
   * Validate uncached candidates in bounded parallel batches.
   * The returned list keeps the listing order.
   */
  private async validateCandidates(
    candidates: Contract[],
    session: RankerSession,
  ): Promise<Contract[]> {
    const pending = candidates.filter((c) => !session.isValidated(c.id));
    const batchSize = this.config.validationConcurrency;

    for (let i = 0; i < pending.length; i += batchSize) {
      const batch = pending.slice(i, i + batchSize);
      await Promise.all(batch.map((c) => this.validate(c, session)));
    }

    return candidates.filter((c) => session.isValidated(c.id));
  }

  private async validate(contract: Contract, session: RankerSession): Promise<void> {
    const candles = await this.gateway.getSpotCandles(
      contract.id,
      VALIDATION_CANDLE_INTERVAL,
      1,
    );

    if (!candles.ok) {
      this.logger.debug(`spot validation failed for ${contract.id}`, {
        error: describeError(candles.error),
      });
      return;
    }
    if (candles.value.length === 0) {
      this.logger.debug(`no spot candles for ${contract.id}`);
      return;
    }

    session.markValidated(contract.id);
    this.logger.info(`new tradable contract ${contract.id}`, {
      ratePct: fundingRatePct(contract).toFixed(4),
    });
  }
}
