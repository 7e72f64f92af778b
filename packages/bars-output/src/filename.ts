/**
 * @fileoverview Descriptive output filenames
 */

import type { SecurityType } from '@ibhist/contracts';

export interface FilenameParts {
  symbol: string;
  securityType: SecurityType;
  /** Provider duration string, e.g. `"1 Y"` */
  duration: string;
  /** Bar-size label, e.g. `"5 mins"` */
  timeframe: string;
  /** Futures only; ignored for other security types. */
  futureMonth?: string;
  extendedHours: boolean;
}

/**
 * Ordered unit rewrites; `mins` must be handled before `min`.
 */
const UNIT_ABBREVIATIONS: ReadonlyArray<readonly [string, string]> = [
  ['secs', 's'],
  ['mins', 'm'],
  ['min', 'm'],
  ['hour', 'h'],
  ['day', 'd'],
  ['week', 'w'],
  ['month', 'M'],
];

function despace(value: string): string {
  return value.replace(/\s+/g, '');
}

function abbreviateTimeframe(timeframe: string): string {
  return UNIT_ABBREVIATIONS.reduce((token, [unit, short]) => token.replaceAll(unit, short), despace(timeframe));
}

/**
 * Builds `SYMBOL_SECTYPE[_FUTUREMONTH]_DURATION_TIMEFRAME[_ETH]_OHLCV.csv`.
 *
 * No collision handling; see FileConflictResolver.
 *
 * @example
 * ```typescript
 * generateFilename({ symbol: 'spy', securityType: 'STK', duration: '1 Y', timeframe: '1 day', extendedHours: false })
 * // 'SPY_STK_1Y_1d_OHLCV.csv'
 * generateFilename({ symbol: 'ES', securityType: 'FUT', futureMonth: '202503', duration: '30 D',
 *   timeframe: '5 mins', extendedHours: true })
 * // 'ES_FUT_202503_30D_5m_ETH_OHLCV.csv'
 * ```
 */
export function generateFilename(parts: FilenameParts): string {
  const segments = [parts.symbol.toUpperCase(), parts.securityType];

  if (parts.securityType === 'FUT' && parts.futureMonth) {
    segments.push(parts.futureMonth);
  }

  segments.push(despace(parts.duration), abbreviateTimeframe(parts.timeframe));

  if (parts.extendedHours) {
    segments.push('ETH');
  }

  segments.push('OHLCV');
  return `${segments.join('_')}.csv`;
}
