/**
 * @fileoverview Bar-size catalog and utilities.
 *
 * Defines the 21 bar sizes accepted by the IBKR historical-data API. Labels are
 * the exact strings the API expects in `barSizeSetting`, so they double as the
 * CLI's `--timeframe` choices.
 *
 * @module @ibhist/contracts/timeframes
 */

import { InvalidTimeframeError } from './errors.js';

/**
 * Every supported bar size, ordered from smallest to largest duration.
 *
 * @invariant Order is ascending by bar length
 */
export const TIMEFRAMES = [
  '1 secs',
  '5 secs',
  '10 secs',
  '15 secs',
  '30 secs',
  '1 min',
  '2 mins',
  '3 mins',
  '5 mins',
  '10 mins',
  '15 mins',
  '20 mins',
  '30 mins',
  '1 hour',
  '2 hours',
  '3 hours',
  '4 hours',
  '8 hours',
  '1 day',
  '1 week',
  '1 month',
] as const;

/**
 * A bar-size label from the catalog.
 */
export type Timeframe = (typeof TIMEFRAMES)[number];

/**
 * Coarse granularity bucket of a timeframe.
 *
 * - SubMinute: 30 seconds or less (subject to the provider's 6-month limit)
 * - Minute: 1 to 30 minutes
 * - Hour: 1 to 8 hours
 * - DayPlus: daily, weekly and monthly bars
 */
export enum TimeframeCategory {
  SubMinute = 'SubMinute',
  Minute = 'Minute',
  Hour = 'Hour',
  DayPlus = 'DayPlus',
}

const DAY_SECONDS = 24 * 60 * 60;

/**
 * Nominal bar length in seconds. Months are counted as 30 days; the value is
 * only used for ordering and coarse comparisons.
 *
 * @internal
 */
const TIMEFRAME_SECONDS: Record<Timeframe, number> = {
  '1 secs': 1,
  '5 secs': 5,
  '10 secs': 10,
  '15 secs': 15,
  '30 secs': 30,
  '1 min': 60,
  '2 mins': 2 * 60,
  '3 mins': 3 * 60,
  '5 mins': 5 * 60,
  '10 mins': 10 * 60,
  '15 mins': 15 * 60,
  '20 mins': 20 * 60,
  '30 mins': 30 * 60,
  '1 hour': 60 * 60,
  '2 hours': 2 * 60 * 60,
  '3 hours': 3 * 60 * 60,
  '4 hours': 4 * 60 * 60,
  '8 hours': 8 * 60 * 60,
  '1 day': DAY_SECONDS,
  '1 week': 7 * DAY_SECONDS,
  '1 month': 30 * DAY_SECONDS,
};

/**
 * Validates whether a string is a catalog timeframe.
 *
 * @example
 * ```typescript
 * isValidTimeframe('5 mins')  // true
 * isValidTimeframe('5 min')   // false
 * ```
 */
export function isValidTimeframe(value: string): value is Timeframe {
  return (TIMEFRAMES as readonly string[]).includes(value);
}

/**
 * Parses a string into a Timeframe, throwing if it is not in the catalog.
 *
 * @throws {InvalidTimeframeError} If value is not a catalog label
 *
 * @example
 * ```typescript
 * parseTimeframe('1 hour')  // '1 hour'
 * parseTimeframe('1h')      // throws InvalidTimeframeError
 * ```
 */
export function parseTimeframe(value: string): Timeframe {
  if (!isValidTimeframe(value)) {
    throw new InvalidTimeframeError(
      `Invalid timeframe: ${value}. Must be one of: ${TIMEFRAMES.join(', ')}`,
      { input: value }
    );
  }
  return value;
}

/**
 * Buckets a timeframe into its granularity category.
 *
 * @example
 * ```typescript
 * getTimeframeCategory('30 secs')  // TimeframeCategory.SubMinute
 * getTimeframeCategory('1 week')   // TimeframeCategory.DayPlus
 * ```
 */
export function getTimeframeCategory(timeframe: Timeframe): TimeframeCategory {
  const seconds = TIMEFRAME_SECONDS[timeframe];
  if (seconds <= 30) return TimeframeCategory.SubMinute;
  if (seconds < 60 * 60) return TimeframeCategory.Minute;
  if (seconds < DAY_SECONDS) return TimeframeCategory.Hour;
  return TimeframeCategory.DayPlus;
}

/**
 * True for every bar size shorter than one day.
 */
export function isIntradayTimeframe(timeframe: Timeframe): boolean {
  return getTimeframeCategory(timeframe) !== TimeframeCategory.DayPlus;
}

/**
 * Returns all catalog timeframes in ascending order.
 */
export function getAllTimeframes(): Timeframe[] {
  return [...TIMEFRAMES];
}
