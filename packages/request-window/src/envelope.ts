/**
 * @fileoverview Historical-data request envelope
 */

import type { RequestEnvelope, ResolvedRequest, SessionMode, Timeframe, WhatToShow } from '@ibhist/contracts';

/**
 * Assembles the provider call parameters for a resolved window.
 *
 * `useRTH` is true only for regular sessions. `formatDate` is always 2 so bar
 * times come back as UTC epoch seconds.
 *
 * @example
 * ```typescript
 * buildRequestEnvelope(resolved, '1 hour', 'extended', 'TRADES')
 * // { endDateTime: '20240201 02:00:00', durationStr: '17 D', barSizeSetting: '1 hour',
 * //   whatToShow: 'TRADES', useRTH: false, formatDate: 2 }
 * ```
 */
export function buildRequestEnvelope(
  resolved: ResolvedRequest,
  timeframe: Timeframe,
  sessionMode: SessionMode,
  whatToShow: WhatToShow
): RequestEnvelope {
  return Object.freeze({
    endDateTime: resolved.endTimestamp,
    durationStr: resolved.durationString,
    barSizeSetting: timeframe,
    whatToShow,
    useRTH: sessionMode === 'regular',
    formatDate: 2,
  });
}
