/**
 * Hedge Journal — SQLite Audit Trail
 *
 * Append-only record of selected candidates and hedge lifecycle events.
 * Never read back for trading decisions: the exchange stays the source of
 * truth for positions.
 */

import { eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { JournalDatabase } from '@/lib/data/db';
import {
  candidateSnapshots,
  hedgeEvents,
  type HedgeEventRow,
  type NewHedgeEvent,
} from '@/lib/data/schema';
import type {
  Contract,
  HedgeOrderSizes,
  HedgeReport,
} from '@/types/funding-hedge';
import type { Logger } from './logger';

export type HedgeEventType =
  | 'opened'
  | 'open_failed'
  | 'rollback_failed'
  | 'closed'
  | 'close_failed'
  | 'orphaned';

export interface JournalStats {
  candidates: number;
  opened: number;
  openFailed: number;
  closed: number;
  closeFailed: number;
  orphaned: number;
  /** Sum of totalPnl over closed hedges */
  realizedPnl: number;
}

export class HedgeJournal {
  private db: JournalDatabase;
  private logger: Logger;

  constructor(db: JournalDatabase, logger: Logger) {
    this.db = db;
    this.logger = logger;
  }

  // ============================================
  // Writes
  // ============================================

  recordCandidate(contract: Contract, priorityScore: number): void {
    this.write('candidate', () =>
      this.db
        .insert(candidateSnapshots)
        .values({
          contractId: contract.id,
          fundingRate: contract.fundingRate,
          fundingIntervalSeconds: contract.fundingIntervalSeconds,
          priorityScore,
          markPrice: contract.markPrice,
          recordedAt: Date.now(),
        })
        .run(),
    );
  }

  recordOpened(contract: Contract, sizes: HedgeOrderSizes): void {
    this.insertEvent({
      contractId: contract.id,
      event: 'opened',
      direction: sizes.direction,
      futuresContracts: sizes.futuresContracts,
      spotQuoteAmount: sizes.spotQuoteAmount,
      fundingRate: contract.fundingRate,
    });
  }

  /** Open attempt that ended flat (futures rejected, or spot failed and was rolled back) */
  recordOpenFailed(contract: Contract, sizes: HedgeOrderSizes, reason: string): void {
    this.insertEvent({
      contractId: contract.id,
      event: 'open_failed',
      direction: sizes.direction,
      futuresContracts: sizes.futuresContracts,
      spotQuoteAmount: sizes.spotQuoteAmount,
      fundingRate: contract.fundingRate,
      detail: reason,
    });
  }

  recordRollbackFailed(contract: Contract, sizes: HedgeOrderSizes, reason: string): void {
    this.insertEvent({
      contractId: contract.id,
      event: 'rollback_failed',
      direction: sizes.direction,
      futuresContracts: sizes.futuresContracts,
      spotQuoteAmount: sizes.spotQuoteAmount,
      fundingRate: contract.fundingRate,
      detail: reason,
    });
  }

  /** Closed or close_failed; held reports are not journaled */
  recordUnwind(report: HedgeReport): void {
    if (report.action === 'hold') return;

    this.insertEvent({
      contractId: report.contractId,
      event: report.action,
      futuresContracts: report.size,
      futuresPnl: report.futuresPnl,
      spotPnl: report.spotPnl,
      totalPnl: report.totalPnl,
    });
  }

  recordOrphaned(contractId: string, reason: string): void {
    this.insertEvent({ contractId, event: 'orphaned', detail: reason });
  }

  // ============================================
  // Queries
  // ============================================

  getEvents(contractId?: string): HedgeEventRow[] {
    const query = this.db.select().from(hedgeEvents);
    const rows = contractId
      ? query.where(eq(hedgeEvents.contractId, contractId)).all()
      : query.all();
    return rows.sort((a, b) => a.createdAt - b.createdAt);
  }

  getStats(): JournalStats {
    const candidates = this.db.select().from(candidateSnapshots).all().length;
    const events = this.db.select().from(hedgeEvents).all();

    const count = (type: HedgeEventType) => events.filter((e) => e.event === type).length;
    const realizedPnl = events
      .filter((e) => e.event === 'closed')
      .reduce((sum, e) => sum + (e.totalPnl ?? 0), 0);

    return {
      candidates,
      opened: count('opened'),
      openFailed: count('open_failed'),
      closed: count('closed'),
      closeFailed: count('close_failed'),
      orphaned: count('orphaned'),
      realizedPnl,
    };
  }

  // ============================================
  // Internals
  // ============================================

  private insertEvent(event: Omit<NewHedgeEvent, 'id' | 'createdAt'> & { event: HedgeEventType }): void {
    this.write(event.event, () =>
      this.db
        .insert(hedgeEvents)
        .values({ ...event, id: uuidv4(), createdAt: Date.now() })
        .run(),
    );
  }

  /** A failed journal write is logged; trading carries on */
  private write(what: string, fn: () => unknown): void {
    try {
      fn();
    } catch (err) {
      this.logger.warn(`journal write failed (${what})`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
