/**
 * @fileoverview Date-range resolution
 *
 * Maps the four combinations of optional start and end dates onto an end
 * anchor plus a backward-looking duration, the only shape the historical-data
 * API accepts.
 */

import { createDuration, formatDuration, InvalidRangeError } from '@ibhist/contracts';
import type { Duration, ResolvedRequest, ResolutionMode, SessionMode } from '@ibhist/contracts';
import { parseDateInput, localCalendarDate } from './date-input.js';
import type { DateInput } from './date-input.js';
import { anchorEndTimestamp } from './session-anchor.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Above this many inclusive days a range is requested in whole years. */
const MAX_DAY_DURATION = 365;

export interface ResolveWindowInput {
  startDate?: string;
  endDate?: string;
  defaultDuration: Duration;
  sessionMode: SessionMode;
  /** Reference instant for requests with no dates. Defaults to the current time. */
  now?: Date;
}

/**
 * Resolves the user's dates into a complete request.
 *
 * | start | end | mode | duration |
 * |---|---|---|---|
 * | yes | yes | date_range | inclusive days, or whole years past 365 days |
 * | yes | no | single_day | 1 D |
 * | no | yes | duration_with_end | default |
 * | no | no | duration_only | default, ending on today's date |
 *
 * @throws {InvalidDateFormatError} If a date matches none of the accepted layouts
 * @throws {InvalidRangeError} If start lies after end
 *
 * @example
 * ```typescript
 * const resolved = resolveRequestWindow({
 *   startDate: '2024-01-15',
 *   endDate: '2024-01-31',
 *   defaultDuration: parseDuration('1 Y'),
 *   sessionMode: 'regular',
 * });
 * // { mode: 'date_range', durationString: '17 D', endTimestamp: '20240131 16:00:00', ... }
 * ```
 */
export function resolveRequestWindow(input: ResolveWindowInput): ResolvedRequest {
  const { startDate, endDate, defaultDuration, sessionMode } = input;

  const start = startDate !== undefined ? parseDateInput(startDate) : undefined;
  const end = endDate !== undefined ? parseDateInput(endDate) : undefined;

  if (start && end) {
    if (start.value.isAfter(end.value)) {
      throw new InvalidRangeError(startDate ?? '', endDate ?? '');
    }
    return build('date_range', rangeDuration(start, end), anchorEndTimestamp(end, sessionMode), startDate, endDate);
  }

  if (start) {
    return build('single_day', createDuration(1, 'D'), anchorEndTimestamp(start, sessionMode), startDate, undefined);
  }

  if (end) {
    return build('duration_with_end', defaultDuration, anchorEndTimestamp(end, sessionMode), undefined, endDate);
  }

  const today = localCalendarDate(input.now ?? new Date());
  return build('duration_only', defaultDuration, anchorEndTimestamp(today, sessionMode), undefined, undefined);
}

/**
 * Inclusive day count between two dates, floored on the wall-clock difference.
 *
 * @example
 * ```typescript
 * inclusiveDays(parseDateInput('2024-01-15'), parseDateInput('2024-01-31'))  // 17
 * ```
 */
export function inclusiveDays(start: DateInput, end: DateInput): number {
  return Math.floor(end.value.diff(start.value) / MS_PER_DAY) + 1;
}

function rangeDuration(start: DateInput, end: DateInput): Duration {
  const days = inclusiveDays(start, end);
  if (days <= MAX_DAY_DURATION) {
    return createDuration(days, 'D');
  }
  return createDuration(Math.floor(days / MAX_DAY_DURATION), 'Y');
}

function build(
  mode: ResolutionMode,
  duration: Duration,
  endTimestamp: string,
  startDate: string | undefined,
  endDate: string | undefined
): ResolvedRequest {
  return Object.freeze({
    mode,
    duration,
    durationString: formatDuration(duration),
    endTimestamp,
    ...(startDate !== undefined ? { startDate } : {}),
    ...(endDate !== undefined ? { endDate } : {}),
  });
}
