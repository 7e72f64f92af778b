/**
 * @fileoverview End-of-request anchoring per session mode
 */

import type { SessionMode } from '@ibhist/contracts';
import type { DateInput } from './date-input.js';

/** Provider layout for `endDateTime`. */
export const END_TIMESTAMP_FORMAT = 'YYYYMMDD HH:mm:ss';

/** Regular session close. */
const REGULAR_CLOSE_HOUR = 16;

/** Post-market data runs until 02:00 the following day. */
const EXTENDED_CLOSE_HOUR = 2;

/**
 * Turns a date into the request's end timestamp.
 *
 * A date with an explicit time of day is used as written. A bare date is
 * anchored at 16:00 the same day for regular hours, or 02:00 the next day when
 * extended hours are included.
 *
 * @example
 * ```typescript
 * anchorEndTimestamp(parseDateInput('2024-01-31'), 'regular')   // '20240131 16:00:00'
 * anchorEndTimestamp(parseDateInput('2024-01-31'), 'extended')  // '20240201 02:00:00'
 * ```
 */
export function anchorEndTimestamp(date: DateInput, sessionMode: SessionMode): string {
  if (date.hasTime) {
    return date.value.format(END_TIMESTAMP_FORMAT);
  }

  const anchored = date.value.clone().startOf('day');
  if (sessionMode === 'extended') {
    anchored.add(1, 'day').hour(EXTENDED_CLOSE_HOUR);
  } else {
    anchored.hour(REGULAR_CLOSE_HOUR);
  }
  return anchored.format(END_TIMESTAMP_FORMAT);
}
