/**
 * Choice Label Tests
 */

import { describe, it, expect } from 'vitest';

import { CHOICE_LABELS, MAX_CHOICES, labelForIndex, indexForLabel, labelsFor } from '../labels.js';

describe('choice labels', () => {
  it('has 26 frozen uppercase letters', () => {
    expect(MAX_CHOICES).toBe(26);
    expect(CHOICE_LABELS[0]).toBe('A');
    expect(CHOICE_LABELS[25]).toBe('Z');
    expect(Object.isFrozen(CHOICE_LABELS)).toBe(true);
  });

  it('maps indices to labels and back', () => {
    for (let i = 0; i < MAX_CHOICES; i++) {
      expect(indexForLabel(labelForIndex(i), MAX_CHOICES)).toBe(i);
    }
  });

  it('throws RangeError for an index without a label', () => {
    expect(() => labelForIndex(-1)).toThrow(RangeError);
    expect(() => labelForIndex(26)).toThrow(RangeError);
    expect(() => labelForIndex(1.5)).toThrow(RangeError);
  });

  it('rejects labels beyond the choice count', () => {
    expect(indexForLabel('C', 3)).toBe(2);
    expect(indexForLabel('D', 3)).toBeUndefined();
  });

  it('is case-sensitive', () => {
    expect(indexForLabel('b', 4)).toBeUndefined();
  });

  it('lists labels for a count', () => {
    expect(labelsFor(4)).toEqual(['A', 'B', 'C', 'D']);
    expect(labelsFor(0)).toEqual([]);
  });
});
