/**
 * @fileoverview Duration value type for historical-data requests.
 *
 * The provider expects durations as `"<integer> <unit>"` strings. Internally a
 * duration is a tagged value; the string grammar is only produced or consumed
 * at the provider and CLI boundaries.
 *
 * @module @ibhist/contracts/duration
 */

import { InvalidDurationError } from './errors.js';

/**
 * Duration units understood by the provider.
 * S = seconds, D = days, W = weeks, M = months, Y = years.
 */
export type DurationUnit = 'S' | 'D' | 'W' | 'M' | 'Y';

/**
 * A backward-looking span measured from an end timestamp.
 *
 * @invariant magnitude is a positive integer
 */
export interface Duration {
  readonly magnitude: number;
  readonly unit: DurationUnit;
}

const DURATION_PATTERN = /^(\d+) ([SDWMY])$/;

/**
 * Creates a duration, rejecting non-positive or fractional magnitudes.
 *
 * @throws {InvalidDurationError} If magnitude is not a positive integer
 */
export function createDuration(magnitude: number, unit: DurationUnit): Duration {
  if (!Number.isInteger(magnitude) || magnitude <= 0) {
    throw new InvalidDurationError(`Duration magnitude must be a positive integer, got ${magnitude}`, {
      input: `${magnitude} ${unit}`,
    });
  }
  return Object.freeze({ magnitude, unit });
}

/**
 * Parses a provider duration string such as `"30 D"` or `"1 Y"`.
 *
 * Surrounding whitespace is ignored; the unit must be upper-case.
 *
 * @throws {InvalidDurationError} If the string does not match `<int> <S|D|W|M|Y>`
 *
 * @example
 * ```typescript
 * parseDuration('6 M')  // { magnitude: 6, unit: 'M' }
 * parseDuration('6M')   // throws InvalidDurationError
 * ```
 */
export function parseDuration(value: string): Duration {
  const match = DURATION_PATTERN.exec(value.trim());
  const magnitude = match?.[1];
  const unit = match?.[2];
  if (magnitude === undefined || unit === undefined || !isDurationUnit(unit)) {
    throw new InvalidDurationError(
      `Invalid duration: "${value}". Use "<integer> <unit>" with unit S, D, W, M or Y (e.g. "30 D", "1 Y")`,
      { input: value }
    );
  }
  return createDuration(Number(magnitude), unit);
}

/**
 * Serializes a duration into the provider grammar.
 *
 * @example
 * ```typescript
 * formatDuration({ magnitude: 17, unit: 'D' })  // '17 D'
 * ```
 */
export function formatDuration(duration: Duration): string {
  return `${duration.magnitude} ${duration.unit}`;
}

/**
 * Type guard for duration units.
 */
export function isDurationUnit(value: string): value is DurationUnit {
  return value === 'S' || value === 'D' || value === 'W' || value === 'M' || value === 'Y';
}
