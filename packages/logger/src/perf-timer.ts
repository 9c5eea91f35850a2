/**
 * @fileoverview Performance timing utilities for measuring operation durations
 * Uses high-resolution timers (performance.now()) for accurate measurements
 */

import { performance } from 'node:perf_hooks';

/**
 * Performance timer for measuring operation durations
 */
export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Elapsed milliseconds since the timer started, or until it stopped */
  elapsed(): number;

  /** Stop the timer and return the final duration in milliseconds */
  stop(): number;

  isRunning(): boolean;
}

interface TimerState {
  startTime: number;
  endTime: number | null;
}

/**
 * Durations are reported with microsecond resolution; indicator passes over a
 * few thousand bars finish well under a millisecond.
 */
function roundDuration(ms: number): number {
  return Math.round(ms * 1000) / 1000;
}

/**
 * Create a new performance timer
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const result = pipeline.compute(requests);
 * logger.info('Pipeline computed', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const state: TimerState = {
    startTime: performance.now(),
    endTime: null,
  };

  return {
    get startTime() {
      return state.startTime;
    },

    elapsed(): number {
      const endTime = state.endTime ?? performance.now();
      return roundDuration(endTime - state.startTime);
    },

    stop(): number {
      if (state.endTime === null) {
        state.endTime = performance.now();
      }
      return roundDuration(state.endTime - state.startTime);
    },

    isRunning(): boolean {
      return state.endTime === null;
    },
  };
}

/**
 * Measure the duration of a synchronous function
 *
 * @returns The function result and its duration in milliseconds
 *
 * @example
 * ```typescript
 * const { result, duration_ms } = measureSync(() => computeBands(bars, params));
 * logger.debug('Bands computed', { duration_ms });
 * ```
 */
export function measureSync<T>(fn: () => T): { result: T; duration_ms: number } {
  const timer = startTimer();
  const result = fn();
  const duration_ms = timer.stop();
  return { result, duration_ms };
}
