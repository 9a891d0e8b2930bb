import { describe, it, expect, afterEach, vi } from 'vitest';
import { ConsoleLogger, formatFields, formatLine } from '@/lib/bot/logger';

describe('formatFields', () => {
  it('renders key=value pairs and skips undefined values', () => {
    expect(formatFields({ size: -200, ok: true, missing: undefined, id: 'BTCUSDT' })).toBe(
      ' size=-200 ok=true id=BTCUSDT',
    );
  });

  it('quotes strings containing whitespace', () => {
    expect(formatFields({ error: 'getSpotTicker network: timed out' })).toBe(
      ' error="getSpotTicker network: timed out"',
    );
  });

  it('renders nothing without fields', () => {
    expect(formatFields()).toBe('');
    expect(formatFields({})).toBe('');
  });
});

describe('formatLine', () => {
  it('prefixes time, level and scope', () => {
    const line = formatLine('warn', 'monitor', 'skipping BTCUSDT', { n: 1 }, new Date(0));
    expect(line).toBe('1970-01-01T00:00:00.000Z [WARN] [monitor] skipping BTCUSDT n=1');
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('routes levels to the matching console method', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger('bot');

    logger.info('hello');
    logger.warn('careful');
    logger.error('broken');

    expect(log).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0]?.[0])).toMatch(/ \[ERROR\] \[bot\] broken$/);
  });

  it('drops lines below the minimum level and keeps it in children', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new ConsoleLogger('bot', 'info');

    logger.debug('hidden');
    logger.child('ranker').debug('hidden too');
    logger.child('ranker').info('shown');

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0]?.[0])).toMatch(/ \[INFO\] \[ranker\] shown$/);
  });
});
