/**
 * @fileoverview Tests for the performance timer
 */

import { describe, it, expect } from 'vitest';
import { startTimer } from '../src/perf-timer.js';

describe('startTimer', () => {
  it('should report non-negative whole milliseconds', () => {
    const timer = startTimer();
    const elapsed = timer.elapsed();

    expect(Number.isInteger(elapsed)).toBe(true);
    expect(elapsed).toBeGreaterThanOrEqual(0);
    expect(timer.isRunning()).toBe(true);
  });

  it('should freeze once stopped', async () => {
    const timer = startTimer();
    const stopped = timer.stop();
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(timer.isRunning()).toBe(false);
    expect(timer.stop()).toBe(stopped);
    expect(timer.elapsed()).toBe(stopped);
  });
});
