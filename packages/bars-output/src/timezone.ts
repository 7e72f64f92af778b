/**
 * @fileoverview Timezone conversion for provider bars
 *
 * Provider timestamps arrive as UTC epoch seconds, ISO strings or the
 * provider's own date text. They are rendered in the selected zone; calendar
 * dates (daily and larger bars) carry no time and are never shifted.
 */

import moment from 'moment-timezone';
import { UnparseableTimestampError } from '@ibhist/contracts';
import type { OutputRow, ProviderBar, RawTimestamp } from '@ibhist/contracts';

/**
 * Output zone selector.
 * - UTC: Coordinated Universal Time
 * - market: exchange time (US Eastern for every symbol)
 * - local: the machine's zone
 */
export type TimezoneSelector = 'UTC' | 'market' | 'local';

export const TIMEZONE_SELECTORS: readonly TimezoneSelector[] = ['UTC', 'market', 'local'];

const MARKET_ZONE = 'America/New_York';

const INTRADAY_FORMAT = 'YYYY-MM-DD HH:mm:ss';
const DAILY_FORMAT = 'YYYY-MM-DD';
const PROVIDER_DATETIME_FORMAT = 'YYYYMMDD HH:mm:ss';

const PROVIDER_DATETIME = /^(\d{8} \d{2}:\d{2}:\d{2})(?:\s+(\S+))?$/;
const ISO_WITH_OFFSET = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

/**
 * A provider timestamp read either as an instant or as a bare calendar date.
 */
export type ParsedTimestamp =
  | { readonly kind: 'instant'; readonly value: moment.Moment }
  | { readonly kind: 'date'; readonly value: string };

/**
 * Resolves a selector to an IANA zone name.
 *
 * The symbol is accepted for future per-exchange zones; today every symbol
 * maps to US Eastern.
 *
 * @example
 * ```typescript
 * targetZone('market', 'EURUSD')  // 'America/New_York'
 * targetZone('UTC', 'SPY')        // 'UTC'
 * ```
 */
export function targetZone(selector: TimezoneSelector, _symbol: string): string {
  switch (selector) {
    case 'UTC':
      return 'UTC';
    case 'local':
      return moment.tz.guess();
    case 'market':
      return MARKET_ZONE;
  }
}

/**
 * Zone abbreviation for the output header, taken at instant `at`.
 *
 * @example
 * ```typescript
 * zoneAbbreviation('America/New_York', 'market', new Date('2024-01-15T12:00:00Z'))  // 'EST'
 * zoneAbbreviation('America/New_York', 'market', new Date('2024-07-15T12:00:00Z'))  // 'EDT'
 * ```
 */
export function zoneAbbreviation(zone: string, selector: TimezoneSelector, at: Date): string {
  if (selector === 'UTC') {
    return 'UTC';
  }
  return moment.tz(at, zone).zoneAbbr();
}

/**
 * Header of the date column: `DateTime_<abbrev>` for intraday bars, `Date` otherwise.
 */
export function dateColumnName(intraday: boolean, abbreviation: string): string {
  return intraday ? `DateTime_${abbreviation}` : 'Date';
}

/** Null for epochs outside the representable range. */
function epochInstant(seconds: number): ParsedTimestamp | null {
  const instant = moment.unix(seconds).utc();
  return instant.isValid() ? { kind: 'instant', value: instant } : null;
}

/**
 * Reads a provider timestamp. Returns null when no layout matches.
 *
 * Accepted:
 * - epoch seconds, as a number or a digit string
 * - ISO 8601 with `Z` or an explicit offset
 * - `YYYYMMDD HH:mm:ss`, read as UTC unless followed by an IANA zone name
 * - `YYYYMMDD` or `YYYY-MM-DD` calendar dates
 */
export function parseProviderTimestamp(raw: RawTimestamp): ParsedTimestamp | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? epochInstant(raw) : null;
  }

  const text = raw.trim();

  if (/^\d{8}$/.test(text)) {
    const date = moment.utc(text, 'YYYYMMDD', true);
    return date.isValid() ? { kind: 'date', value: date.format(DAILY_FORMAT) } : null;
  }

  if (/^\d+$/.test(text)) {
    return epochInstant(Number(text));
  }

  if (/^\d{4}-\d{2}-\d{2}$/.test(text)) {
    return moment.utc(text, DAILY_FORMAT, true).isValid() ? { kind: 'date', value: text } : null;
  }

  if (ISO_WITH_OFFSET.test(text)) {
    const instant = moment.utc(text, moment.ISO_8601, true);
    return instant.isValid() ? { kind: 'instant', value: instant } : null;
  }

  const providerMatch = PROVIDER_DATETIME.exec(text);
  if (providerMatch?.[1] !== undefined) {
    const zone = providerMatch[2];
    if (zone !== undefined && moment.tz.zone(zone) === null) {
      return null;
    }
    const instant =
      zone !== undefined
        ? moment.tz(providerMatch[1], PROVIDER_DATETIME_FORMAT, true, zone)
        : moment.utc(providerMatch[1], PROVIDER_DATETIME_FORMAT, true);
    return instant.isValid() ? { kind: 'instant', value: instant.utc() } : null;
  }

  return null;
}

export interface FormattedRows {
  rows: OutputRow[];
  /** One per row whose timestamp kept its original text. */
  warnings: UnparseableTimestampError[];
}

/**
 * Converts every bar's timestamp into `zone`.
 *
 * Intraday rows render as `YYYY-MM-DD HH:mm:ss`, others as `YYYY-MM-DD`. A
 * timestamp that cannot be read keeps its original text and yields a warning.
 * Row count and order match the input.
 *
 * @example
 * ```typescript
 * const { rows } = formatRows([{ time: 1705329000, open: 1, high: 2, low: 0.5, close: 1.5, volume: 10 }],
 *   'America/New_York', true);
 * rows[0].timestamp  // '2024-01-15 09:30:00'
 * ```
 */
export function formatRows(bars: readonly ProviderBar[], zone: string, intraday: boolean): FormattedRows {
  const warnings: UnparseableTimestampError[] = [];

  const rows = bars.map((bar, index): OutputRow => {
    const parsed = parseProviderTimestamp(bar.time);
    let timestamp: string;

    if (parsed === null) {
      timestamp = String(bar.time);
      warnings.push(new UnparseableTimestampError(timestamp, index));
    } else if (parsed.kind === 'date') {
      timestamp = intraday ? `${parsed.value} 00:00:00` : parsed.value;
    } else {
      timestamp = parsed.value.clone().tz(zone).format(intraday ? INTRADAY_FORMAT : DAILY_FORMAT);
    }

    return {
      timestamp,
      open: bar.open,
      high: bar.high,
      low: bar.low,
      close: bar.close,
      volume: bar.volume,
    };
  });

  return { rows, warnings };
}
