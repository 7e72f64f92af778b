/**
 * @fileoverview Elapsed-time measurement for logged operations
 */

/**
 * Running timer. Durations are whole milliseconds.
 */
export interface PerfTimer {
  readonly startTime: number;
  elapsed(): number;
  /** Freezes the timer; later calls return the same value. */
  stop(): number;
  isRunning(): boolean;
}

/**
 * Starts a timer on performance.now().
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const bars = await provider.fetchBars(instrument, envelope);
 * logger.info('Bars received', { count: bars.length, duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}
