/**
 * @fileoverview Tests for the duration value type.
 */

import { describe, it, expect } from 'vitest';
import { createDuration, parseDuration, formatDuration, isDurationUnit } from '../src/duration.js';
import { InvalidDurationError } from '../src/errors.js';

describe('parseDuration', () => {
  it('should parse each unit', () => {
    expect(parseDuration('3600 S')).toEqual({ magnitude: 3600, unit: 'S' });
    expect(parseDuration('30 D')).toEqual({ magnitude: 30, unit: 'D' });
    expect(parseDuration('2 W')).toEqual({ magnitude: 2, unit: 'W' });
    expect(parseDuration('6 M')).toEqual({ magnitude: 6, unit: 'M' });
    expect(parseDuration('1 Y')).toEqual({ magnitude: 1, unit: 'Y' });
  });

  it('should ignore surrounding whitespace', () => {
    expect(parseDuration('  30 D ')).toEqual({ magnitude: 30, unit: 'D' });
  });

  it('should reject malformed strings', () => {
    for (const input of ['30D', '30 d', '30 days', 'D 30', '1.5 Y', '', '-1 D']) {
      expect(() => parseDuration(input), input).toThrow(InvalidDurationError);
    }
  });

  it('should reject a zero magnitude', () => {
    expect(() => parseDuration('0 D')).toThrow(/positive integer/);
  });

  it('should carry the original input on the error', () => {
    try {
      parseDuration('one year');
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof InvalidDurationError)) throw error;
      expect(error.data).toEqual({ input: 'one year' });
    }
  });
});

describe('formatDuration', () => {
  it('should serialize to the provider grammar', () => {
    expect(formatDuration(createDuration(17, 'D'))).toBe('17 D');
    expect(formatDuration(parseDuration('6 M'))).toBe('6 M');
  });
});

describe('createDuration', () => {
  it('should return a frozen value', () => {
    expect(Object.isFrozen(createDuration(1, 'Y'))).toBe(true);
  });

  it('should reject fractional magnitudes', () => {
    expect(() => createDuration(2.5, 'D')).toThrow(InvalidDurationError);
  });
});

describe('isDurationUnit', () => {
  it('should accept only the five provider units', () => {
    expect(['S', 'D', 'W', 'M', 'Y'].every(isDurationUnit)).toBe(true);
    expect(isDurationUnit('H')).toBe(false);
    expect(isDurationUnit('d')).toBe(false);
  });
});
