import { describe, it, expect } from 'vitest';
import { generateFilename } from '../src/index.js';
import type { FilenameParts } from '../src/index.js';

describe('generateFilename', () => {
  it('should build a stock filename', () => {
    expect(
      generateFilename({ symbol: 'spy', securityType: 'STK', duration: '1 Y', timeframe: '1 day', extendedHours: false })
    ).toBe('SPY_STK_1Y_1d_OHLCV.csv');
  });

  it('should add the contract month for futures and the ETH marker', () => {
    expect(
      generateFilename({
        symbol: 'ES',
        securityType: 'FUT',
        futureMonth: '202503',
        duration: '30 D',
        timeframe: '5 mins',
        extendedHours: true,
      })
    ).toBe('ES_FUT_202503_30D_5m_ETH_OHLCV.csv');
  });

  it('should drop the contract month for other security types', () => {
    expect(
      generateFilename({
        symbol: 'EURUSD',
        securityType: 'CASH',
        futureMonth: '202503',
        duration: '6 M',
        timeframe: '1 hour',
        extendedHours: false,
      })
    ).toBe('EURUSD_CASH_6M_1h_OHLCV.csv');
  });

  it.each([
    ['1 secs', '1s'],
    ['30 secs', '30s'],
    ['1 min', '1m'],
    ['15 mins', '15m'],
    ['2 hours', '2hs'],
    ['1 week', '1w'],
    ['1 month', '1M'],
  ])('should abbreviate %s as %s', (timeframe, token) => {
    expect(
      generateFilename({ symbol: 'AAPL', securityType: 'STK', duration: '2 D', timeframe, extendedHours: false })
    ).toBe(`AAPL_STK_2D_${token}_OHLCV.csv`);
  });

  it('should be deterministic', () => {
    const parts = { symbol: 'QQQ', securityType: 'STK' as const, duration: '17 D', timeframe: '1 min', extendedHours: true };
    expect(generateFilename(parts)).toBe(generateFilename(parts));
  });

  describe('when a single part changes', () => {
    const base: FilenameParts = {
      symbol: 'ES',
      securityType: 'FUT',
      futureMonth: '202503',
      duration: '30 D',
      timeframe: '5 mins',
      extendedHours: false,
    };

    it.each<[string, Partial<FilenameParts>, string]>([
      ['symbol', { symbol: 'NQ' }, 'NQ_FUT_202503_30D_5m_OHLCV.csv'],
      ['securityType', { securityType: 'STK' }, 'ES_STK_30D_5m_OHLCV.csv'],
      ['duration', { duration: '1 Y' }, 'ES_FUT_202503_1Y_5m_OHLCV.csv'],
      ['timeframe', { timeframe: '1 hour' }, 'ES_FUT_202503_30D_1h_OHLCV.csv'],
      ['futureMonth', { futureMonth: '202506' }, 'ES_FUT_202506_30D_5m_OHLCV.csv'],
      ['extendedHours', { extendedHours: true }, 'ES_FUT_202503_30D_5m_ETH_OHLCV.csv'],
    ])('should change the name when %s changes', (_part, change, expected) => {
      const name = generateFilename({ ...base, ...change });

      expect(name).toBe(expected);
      expect(name).not.toBe(generateFilename(base));
    });
  });
});
