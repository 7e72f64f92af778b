/**
 * @fileoverview Timeframe classification and request advisories
 */

import { getTimeframeCategory, isIntradayTimeframe, parseTimeframe, TimeframeCategory } from '@ibhist/contracts';
import type { Duration, Timeframe } from '@ibhist/contracts';

export interface TimeframeClassification {
  readonly label: Timeframe;
  readonly category: TimeframeCategory;
  /** Shorter than one day; drives the date column layout. */
  readonly intraday: boolean;
  /** 30 seconds or less; subject to pacing limits and the 6-month history cap. */
  readonly subMinuteRisk: boolean;
}

/**
 * Classifies a bar-size label.
 *
 * @throws {InvalidTimeframeError} If the label is not in the catalog
 *
 * @example
 * ```typescript
 * classifyTimeframe('5 secs')
 * // { label: '5 secs', category: 'SubMinute', intraday: true, subMinuteRisk: true }
 * ```
 */
export function classifyTimeframe(label: string): TimeframeClassification {
  const timeframe = parseTimeframe(label);
  const category = getTimeframeCategory(timeframe);
  return {
    label: timeframe,
    category,
    intraday: isIntradayTimeframe(timeframe),
    subMinuteRisk: category === TimeframeCategory.SubMinute,
  };
}

/**
 * Advisory warnings for a timeframe and duration. Never blocks a request.
 */
export function availabilityWarnings(label: Timeframe, duration: Duration): string[] {
  const { subMinuteRisk } = classifyTimeframe(label);
  if (!subMinuteRisk) {
    return [];
  }

  const warnings = [
    `Timeframe '${label}' with duration '${duration.magnitude} ${duration.unit}' may hit IBKR pacing limits`,
    'Bars 30 seconds or smaller older than 6 months are not available from IBKR',
  ];
  if (duration.unit === 'Y') {
    warnings.push('Small timeframes with yearly durations may result in very large datasets');
  }
  return warnings;
}

/**
 * Likely reasons for an empty result, shown to the operator.
 */
export function noDataDiagnostics(label: Timeframe): string[] {
  const reasons = [
    'No data available for the requested contract or period.',
    'Market data subscriptions might be required for this specific data.',
    'Incorrect contract details or parameters.',
    `${label} data may not be available if the duration is too short or data restrictions apply.`,
  ];
  if (classifyTimeframe(label).subMinuteRisk) {
    reasons.push('Remember: Bars 30 seconds or smaller older than 6 months are not available from IBKR.');
  }
  return reasons;
}
