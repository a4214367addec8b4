/**
 * @fileoverview Timing helpers for `duration_ms` log fields.
 */

export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Milliseconds since start, or until stop() if stopped */
  elapsed(): number;

  /** Stops the timer (first call wins) and returns the final duration */
  stop(): number;

  isRunning(): boolean;
}

/**
 * Starts a high-resolution timer.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const bars = await history.requestBarsInPeriod('AAPL', open, close, 60);
 * logger.info('Got bars', { count: bars.length, duration_ms: timer.stop() });
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

/**
 * Awaits `fn` and reports how long it took.
 */
export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
