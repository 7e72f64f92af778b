/**
 * @fileoverview Strict parsing of user-supplied dates
 *
 * Dates are wall-clock values with no zone attached. They are held as UTC
 * moments so arithmetic never crosses a DST boundary.
 */

import moment from 'moment-timezone';
import { InvalidDateFormatError } from '@ibhist/contracts';

const DATE_ONLY = 'YYYY-MM-DD';
const DATE_MINUTES = 'YYYY-MM-DD HH:mm';
const DATE_SECONDS = 'YYYY-MM-DD HH:mm:ss';

/**
 * A parsed date and whether the user wrote a time of day.
 */
export interface DateInput {
  readonly value: moment.Moment;
  readonly hasTime: boolean;
}

/**
 * Parses `YYYY-MM-DD`, `YYYY-MM-DD HH:MM` or `YYYY-MM-DD HH:MM:SS`.
 *
 * Calendar-invalid dates (`2024-02-30`) and any other layout are rejected.
 *
 * @throws {InvalidDateFormatError}
 *
 * @example
 * ```typescript
 * parseDateInput('2024-01-15').hasTime        // false
 * parseDateInput('2024-01-15 09:30').hasTime  // true
 * ```
 */
export function parseDateInput(input: string): DateInput {
  const trimmed = input.trim();

  const dateOnly = moment.utc(trimmed, DATE_ONLY, true);
  if (dateOnly.isValid()) {
    return { value: dateOnly, hasTime: false };
  }

  for (const format of [DATE_SECONDS, DATE_MINUTES]) {
    const withTime = moment.utc(trimmed, format, true);
    // strict HH still takes 24:00 and rolls it into the next day
    if (withTime.isValid() && withTime.format(format) === trimmed) {
      return { value: withTime, hasTime: true };
    }
  }

  throw new InvalidDateFormatError(input);
}

/**
 * The local calendar date of an instant, as a date-only input.
 */
export function localCalendarDate(now: Date): DateInput {
  return { value: moment.utc(moment(now).format(DATE_ONLY), DATE_ONLY, true), hasTime: false };
}
