/**
 * Accuracy Statistics Tests
 */

import { describe, it, expect } from 'vitest';

import { median, mean, accuracyStats } from '../stats.js';

describe('median', () => {
  it('takes the middle of an odd count', () => {
    expect(median([0.9, 0.92, 0.1])).toBe(0.9);
  });

  it('averages the two middle values of an even count', () => {
    expect(median([0.2, 0.8, 0.4, 0.6])).toBe(0.5);
  });

  it('does not reorder the input', () => {
    const values = [3, 1, 2];
    median(values);
    expect(values).toEqual([3, 1, 2]);
  });

  it('is 0 for no values', () => {
    expect(median([])).toBe(0);
  });
});

describe('mean', () => {
  it('averages the values', () => {
    expect(mean([0.5, 1, 0])).toBe(0.5);
  });

  it('is 0 for no values', () => {
    expect(mean([])).toBe(0);
  });
});

describe('accuracyStats', () => {
  it('summarises run accuracies', () => {
    expect(accuracyStats([0.9, 0.92, 0.1])).toEqual({
      median: 0.9,
      mean: (0.9 + 0.92 + 0.1) / 3,
      min: 0.1,
      max: 0.92,
    });
  });

  it('is all zeros for no runs', () => {
    expect(accuracyStats([])).toEqual({ median: 0, mean: 0, min: 0, max: 0 });
  });
});
