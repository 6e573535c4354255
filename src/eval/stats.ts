/**
 * Accuracy statistics across evaluation runs.
 */

import type { AccuracyStats } from './types.js';

/**
 * Middle value of the sorted input; the mean of the two middle values for
 * an even count. 0 for no values.
 *
 * @example
 * ```typescript
 * median([0.9, 0.92, 0.1]); // 0.9
 * ```
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? 0) + upper) / 2;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function accuracyStats(values: readonly number[]): AccuracyStats {
  if (values.length === 0) {
    return { median: 0, mean: 0, min: 0, max: 0 };
  }
  return {
    median: median(values),
    mean: mean(values),
    min: Math.min(...values),
    max: Math.max(...values),
  };
}
