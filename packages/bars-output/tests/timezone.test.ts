import { describe, it, expect } from 'vitest';
import moment from 'moment-timezone';
import { UnparseableTimestampError } from '@ibhist/contracts';
import type { ProviderBar, RawTimestamp } from '@ibhist/contracts';
import {
  dateColumnName,
  formatRows,
  parseProviderTimestamp,
  targetZone,
  zoneAbbreviation,
} from '../src/index.js';

function bar(time: RawTimestamp): ProviderBar {
  return { time, open: 100, high: 101, low: 99.5, close: 100.5, volume: 1200 };
}

function instantIso(raw: RawTimestamp): string | null {
  const parsed = parseProviderTimestamp(raw);
  return parsed?.kind === 'instant' ? parsed.value.toISOString() : null;
}

function calendarDate(raw: RawTimestamp): string | null {
  const parsed = parseProviderTimestamp(raw);
  return parsed?.kind === 'date' ? parsed.value : null;
}

describe('targetZone', () => {
  it('should map UTC and market selectors', () => {
    expect(targetZone('UTC', 'SPY')).toBe('UTC');
    expect(targetZone('market', 'SPY')).toBe('America/New_York');
  });

  it('should ignore the symbol for the market zone', () => {
    expect(targetZone('market', 'EURUSD')).toBe('America/New_York');
    expect(targetZone('market', 'ES')).toBe('America/New_York');
  });

  it('should use the system zone for local', () => {
    expect(targetZone('local', 'SPY')).toBe(moment.tz.guess());
  });
});

describe('zoneAbbreviation', () => {
  it('should follow daylight saving at the given instant', () => {
    expect(zoneAbbreviation('America/New_York', 'market', new Date('2024-01-15T12:00:00Z'))).toBe('EST');
    expect(zoneAbbreviation('America/New_York', 'market', new Date('2024-07-15T12:00:00Z'))).toBe('EDT');
  });

  it('should always be UTC for the UTC selector', () => {
    expect(zoneAbbreviation('UTC', 'UTC', new Date('2024-07-15T12:00:00Z'))).toBe('UTC');
  });
});

describe('dateColumnName', () => {
  it('should name intraday columns after the zone', () => {
    expect(dateColumnName(true, 'EST')).toBe('DateTime_EST');
    expect(dateColumnName(false, 'EST')).toBe('Date');
  });
});

describe('parseProviderTimestamp', () => {
  it('should read epoch seconds', () => {
    expect(instantIso(1705329000)).toBe('2024-01-15T14:30:00.000Z');
    expect(instantIso('1705329000')).toBe('2024-01-15T14:30:00.000Z');
  });

  it('should read ISO strings with an offset', () => {
    expect(instantIso('2024-01-15T14:30:00Z')).toBe('2024-01-15T14:30:00.000Z');
    expect(instantIso('2024-01-15T09:30:00-05:00')).toBe('2024-01-15T14:30:00.000Z');
  });

  it('should read provider date-time text as UTC', () => {
    expect(instantIso('20240115 14:30:00')).toBe('2024-01-15T14:30:00.000Z');
  });

  it('should honour a trailing zone name', () => {
    expect(instantIso('20240115 09:30:00 US/Eastern')).toBe('2024-01-15T14:30:00.000Z');
    expect(instantIso('20240715 09:30:00 America/New_York')).toBe('2024-07-15T13:30:00.000Z');
  });

  it('should keep calendar dates as dates', () => {
    expect(calendarDate('20240115')).toBe('2024-01-15');
    expect(calendarDate('2024-01-15')).toBe('2024-01-15');
  });

  it.each([
    'n/a',
    '',
    '20241345',
    '2024-02-30',
    '20240115 09:30:00 Nowhere/City',
    '2024-01-15T09:30:00',
    Number.NaN,
    '99999999999999999999',
    1e20,
  ])(
    'should return null for %j',
    (raw) => {
      expect(parseProviderTimestamp(raw)).toBeNull();
    }
  );
});

describe('formatRows', () => {
  it('should render intraday bars in market time', () => {
    const { rows, warnings } = formatRows(
      [bar(1705329000), bar(1705329300)],
      'America/New_York',
      true
    );

    expect(warnings).toEqual([]);
    expect(rows.map((row) => row.timestamp)).toEqual(['2024-01-15 09:30:00', '2024-01-15 09:35:00']);
    expect(rows[0]).toEqual({
      timestamp: '2024-01-15 09:30:00',
      open: 100,
      high: 101,
      low: 99.5,
      close: 100.5,
      volume: 1200,
    });
  });

  it('should render intraday bars in UTC', () => {
    const { rows } = formatRows([bar(1705329000)], 'UTC', true);
    expect(rows[0]?.timestamp).toBe('2024-01-15 14:30:00');
  });

  it('should not shift daily calendar dates', () => {
    const { rows } = formatRows([bar('20240115'), bar('20240116')], 'America/New_York', false);
    expect(rows.map((row) => row.timestamp)).toEqual(['2024-01-15', '2024-01-16']);
  });

  it('should render instants as dates for daily bars', () => {
    const { rows } = formatRows([bar('2024-01-15T21:00:00Z')], 'America/New_York', false);
    expect(rows[0]?.timestamp).toBe('2024-01-15');
  });

  it('should keep unparseable values and continue', () => {
    const { rows, warnings } = formatRows(
      [bar(1705329000), bar('n/a'), bar(1705329600)],
      'America/New_York',
      true
    );

    expect(rows.map((row) => row.timestamp)).toEqual(['2024-01-15 09:30:00', 'n/a', '2024-01-15 09:40:00']);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toBeInstanceOf(UnparseableTimestampError);
    expect(warnings[0]?.message).toBe('Timestamp "n/a" in row 1 could not be parsed; leaving it as is');
  });

  it('should keep an out-of-range epoch as text', () => {
    const { rows, warnings } = formatRows([bar('99999999999999999999')], 'UTC', true);

    expect(rows[0]?.timestamp).toBe('99999999999999999999');
    expect(warnings.map((warning) => warning.message)).toEqual([
      'Timestamp "99999999999999999999" in row 0 could not be parsed; leaving it as is',
    ]);
  });

  it('should return nothing for no bars', () => {
    expect(formatRows([], 'UTC', true)).toEqual({ rows: [], warnings: [] });
  });
});
