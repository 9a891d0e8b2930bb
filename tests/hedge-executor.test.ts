import { describe, it, expect, beforeEach, vi } from 'vitest';
import { HedgeExecutor, hedgingSpotSide } from '@/lib/bot/hedge-executor';
import { AlertManager } from '@/lib/bot/alerts';
import { DEFAULT_HEDGE_CONFIG } from '@/lib/bot/config';
import type { FundingHedgeConfig } from '@/types/funding-hedge';
import { FakeGateway, makePosition, makeTicker } from './support/fake-gateway';
import { MemoryLogger } from './support/memory-logger';

describe('hedgingSpotSide', () => {
  it('buys spot against a futures short and sells against a long', () => {
    expect(hedgingSpotSide(-5)).toBe('buy');
    expect(hedgingSpotSide(5)).toBe('sell');
  });
});

describe('HedgeExecutor.openHedge', () => {
  let gateway: FakeGateway;
  let logger: MemoryLogger;
  let alerts: AlertManager;
  let config: FundingHedgeConfig;
  const sleep = vi.fn(async (_ms: number): Promise<void> => {});

  beforeEach(() => {
    gateway = new FakeGateway();
    gateway.spotTickers.set('BTCUSDT', makeTicker('BTCUSDT', 99, 100));
    logger = new MemoryLogger();
    alerts = new AlertManager(logger.child('alerts'));
    config = { ...DEFAULT_HEDGE_CONFIG };
    sleep.mockClear();
  });

  const executor = () => new HedgeExecutor(gateway, config, logger, alerts, sleep);

  it('places futures then spot and waits for settlement', async () => {
    const outcome = await executor().openHedge({
      contractId: 'BTCUSDT',
      spotQuoteAmount: 202,
      futuresContracts: -200,
    });

    expect(outcome.status).toBe('hedged');
    expect(outcome.states).toEqual([
      'no_position',
      'futures_pending',
      'futures_open',
      'spot_pending',
      'hedged',
    ]);
    expect(gateway.placements().map((c) => [c.method, ...c.args])).toEqual([
      ['placeFuturesOrder', 'BTCUSDT', 0, -200],
      ['placeSpotOrder', 'BTCUSDT', 'buy', { value: 202, unit: 'quote' }],
    ]);
    expect(sleep).toHaveBeenCalledWith(30_000);
  });

  it('sells spot against a futures long', async () => {
    await executor().openHedge({ contractId: 'BTCUSDT', spotQuoteAmount: 150, futuresContracts: 3 });

    expect(gateway.callsOf('placeSpotOrder')[0]?.args).toEqual([
      'BTCUSDT',
      'sell',
      { value: 150, unit: 'quote' },
    ]);
  });

  it('sets leverage on both markets before ordering', async () => {
    await executor().openHedge({ contractId: 'BTCUSDT', spotQuoteAmount: 202, futuresContracts: -2 });

    expect(gateway.callsOf('setLeverage').map((c) => c.args)).toEqual([
      ['BTCUSDT', 3, 'futures'],
      ['BTCUSDT', 3, 'spot'],
    ]);
  });

  it('keeps going when leverage cannot be set', async () => {
    gateway.fail('setLeverage');

    const outcome = await executor().openHedge({
      contractId: 'BTCUSDT',
      spotQuoteAmount: 202,
      futuresContracts: -2,
    });

    expect(outcome.status).toBe('hedged');
    expect(logger.messages('warn')).toEqual([
      'set futures leverage failed for BTCUSDT',
      'set spot leverage failed for BTCUSDT',
    ]);
  });

  it('skips the pause when orderSettleWaitMs is 0', async () => {
    config = { ...config, orderSettleWaitMs: 0 };
    await executor().openHedge({ contractId: 'BTCUSDT', spotQuoteAmount: 202, futuresContracts: -2 });

    expect(sleep).not.toHaveBeenCalled();
  });

  it('never stacks a hedge on an existing position', async () => {
    gateway.positions.set('BTCUSDT', makePosition({ contractId: 'BTCUSDT', size: -200 }));

    const outcome = await executor().openHedge({
      contractId: 'BTCUSDT',
      spotQuoteAmount: 202,
      futuresContracts: -200,
    });

    expect(outcome).toEqual({
      status: 'skipped',
      reason: 'position already open',
      states: ['no_position'],
    });
    expect(gateway.placements()).toHaveLength(0);
  });

  it('skips when the position cannot be verified', async () => {
    gateway.fail('getPosition', 'network');

    const outcome = await executor().openHedge({
      contractId: 'BTCUSDT',
      spotQuoteAmount: 202,
      futuresContracts: -200,
    });

    expect(outcome.status).toBe('skipped');
    expect(gateway.placements()).toHaveLength(0);
  });

  it('rejects a zero size before calling the exchange', async () => {
    const outcome = await executor().openHedge({
      contractId: 'BTCUSDT',
      spotQuoteAmount: 202,
      futuresContracts: 0,
    });

    expect(outcome.status).toBe('skipped');
    expect(gateway.calls).toHaveLength(0);
  });

  it('stops after a rejected futures leg with nothing to roll back', async () => {
    gateway.fail('placeFuturesOrder');

    const outcome = await executor().openHedge({
      contractId: 'BTCUSDT',
      spotQuoteAmount: 202,
      futuresContracts: -200,
    });

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.stage).toBe('futures');
    expect(outcome.rolledBack).toBe(false);
    expect(gateway.callsOf('placeSpotOrder')).toHaveLength(0);
    expect(gateway.callsOf('closeFuturesPosition')).toHaveLength(0);
  });

  it('rolls back the futures leg exactly once when the spot leg fails', async () => {
    gateway.fail('placeSpotOrder');

    const outcome = await executor().openHedge({
      contractId: 'BTCUSDT',
      spotQuoteAmount: 202,
      futuresContracts: -200,
    });

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.stage).toBe('spot');
    expect(outcome.rolledBack).toBe(true);
    expect(outcome.states).toEqual([
      'no_position',
      'futures_pending',
      'futures_open',
      'spot_pending',
      'rolling_back',
      'no_position',
    ]);
    expect(gateway.callsOf('closeFuturesPosition')).toHaveLength(1);
    expect(gateway.positions.has('BTCUSDT')).toBe(false);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sizes the rollback from the futures order it just placed', async () => {
    gateway.fail('placeSpotOrder');

    await executor().openHedge({
      contractId: 'BTCUSDT',
      spotQuoteAmount: 202,
      futuresContracts: -200,
    });

    expect(gateway.callsOf('closeFuturesPosition').map((c) => c.args)).toEqual([['BTCUSDT', -200]]);
  });

  it('flags manual intervention when the rollback fails', async () => {
    gateway.fail('placeSpotOrder');
    gateway.fail('closeFuturesPosition', 'network');

    const outcome = await executor().openHedge({
      contractId: 'BTCUSDT',
      spotQuoteAmount: 202,
      futuresContracts: -200,
    });

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.rolledBack).toBe(false);
    expect(outcome.states.at(-1)).toBe('manual_intervention');
    expect(gateway.callsOf('closeFuturesPosition')).toHaveLength(1);

    const errors = logger.messages('error');
    expect(errors).toContain('MANUAL INTERVENTION REQUIRED: rollback of BTCUSDT failed');
    expect(errors).toContain(
      '[rollback_failed] MANUAL INTERVENTION: BTCUSDT futures leg open without spot hedge | closeFuturesPosition network: closeFuturesPosition failed',
    );
  });
});
