import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { HedgeJournal } from '@/lib/bot/hedge-journal';
import { createDatabase } from '@/lib/data/db';
import type { HedgeOrderSizes, HedgeReport } from '@/types/funding-hedge';
import { makeContract } from './support/fake-gateway';
import { MemoryLogger } from './support/memory-logger';

const contract = makeContract({ id: 'BTCUSDT', fundingRate: 0.005, markPrice: 100 });

const sizes: HedgeOrderSizes = {
  direction: 'short_futures',
  referencePrice: 100,
  coinAmount: 2,
  spotQuoteAmount: 202,
  spotSide: 'buy',
  futuresContracts: -200,
};

function report(action: HedgeReport['action'], totalPnl: number): HedgeReport {
  return {
    contractId: 'BTCUSDT',
    futuresSide: 'short',
    size: -200,
    spotSide: 'buy',
    spotBaseAmount: 2,
    futuresPnl: totalPnl,
    spotPnl: 0,
    totalPnl,
    action,
  };
}

describe('HedgeJournal', () => {
  let database: ReturnType<typeof createDatabase>;
  let logger: MemoryLogger;
  let journal: HedgeJournal;

  beforeEach(() => {
    database = createDatabase(':memory:');
    logger = new MemoryLogger();
    journal = new HedgeJournal(database.db, logger);
  });

  afterEach(() => {
    database.close();
  });

  it('records an opened hedge with its sizing', () => {
    journal.recordOpened(contract, sizes);

    const [event] = journal.getEvents('BTCUSDT');
    expect(event).toMatchObject({
      contractId: 'BTCUSDT',
      event: 'opened',
      direction: 'short_futures',
      futuresContracts: -200,
      spotQuoteAmount: 202,
      fundingRate: 0.005,
      totalPnl: null,
    });
    expect(event?.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('ignores held reports', () => {
    journal.recordUnwind(report('hold', -1));
    expect(journal.getEvents()).toEqual([]);
  });

  it('aggregates counts and realized PnL', () => {
    journal.recordCandidate(contract, 1.5);
    journal.recordCandidate(contract, 1.5);
    journal.recordOpened(contract, sizes);
    journal.recordOpenFailed(contract, sizes, 'placeSpotOrder rejected: no liquidity');
    journal.recordRollbackFailed(contract, sizes, 'closeFuturesPosition network: timeout');
    journal.recordUnwind(report('closed', 1.25));
    journal.recordUnwind(report('closed', 0.5));
    journal.recordUnwind(report('close_failed', 3));
    journal.recordOrphaned('SOLUSDT', 'no spot orders found');

    expect(journal.getStats()).toEqual({
      candidates: 2,
      opened: 1,
      openFailed: 1,
      closed: 2,
      closeFailed: 1,
      orphaned: 1,
      realizedPnl: 1.75,
    });
  });

  it('filters events by contract', () => {
    journal.recordOpened(contract, sizes);
    journal.recordOrphaned('SOLUSDT', 'no spot orders found');

    expect(journal.getEvents('SOLUSDT').map((e) => e.detail)).toEqual(['no spot orders found']);
    expect(journal.getEvents()).toHaveLength(2);
  });

  it('logs and survives a failed write', () => {
    database.close();

    expect(() => journal.recordOrphaned('SOLUSDT', 'gone')).not.toThrow();
    expect(logger.messages('warn')).toEqual(['journal write failed (orphaned)']);

    database = createDatabase(':memory:');
  });
});
