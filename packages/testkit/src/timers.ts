/**
 * Timing utilities for workload measurements
 */

import { performance } from "node:perf_hooks";

/**
 * High-resolution clock using performance.now()
 */
export const clock = {
  /**
   * Current time in milliseconds (high resolution)
   */
  now(): number {
    return performance.now();
  },

  /**
   * Run a synchronous function and return its result with the elapsed milliseconds
   */
  measure<T>(fn: () => T): [T, number] {
    const start = performance.now();
    const result = fn();
    return [result, performance.now() - start];
  },
};
