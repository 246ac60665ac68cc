/**
 * Unit tests for frequency distribution utilities
 */

import { describe, it, expect } from 'vitest';
import {
  calculateFrequencies,
  compareRankedValues,
  rankTopValues,
  updateFrequencies,
} from '../../src/utils/frequency-map.js';

describe('Frequency Map Utilities', () => {
  describe('calculateFrequencies', () => {
    it('should count occurrences', () => {
      const distribution = calculateFrequencies(['a', 'b', 'b']);

      expect([...distribution.entries()]).toEqual([
        ['a', 1],
        ['b', 2],
      ]);
    });

    it('should return an empty map for no values', () => {
      expect(calculateFrequencies([]).size).toBe(0);
    });
  });

  describe('updateFrequencies', () => {
    it('should increment an existing entry', () => {
      const distribution = calculateFrequencies(['x']);
      updateFrequencies(distribution, 'x');
      updateFrequencies(distribution, 'y');

      expect(distribution.get('x')).toBe(2);
      expect(distribution.get('y')).toBe(1);
    });
  });

  describe('compareRankedValues', () => {
    it('should put higher counts first', () => {
      expect(compareRankedValues({ value: 'a', count: 1 }, { value: 'b', count: 3 })).toBe(2);
    });

    it('should order equal counts by code unit, not locale', () => {
      expect(compareRankedValues({ value: 'Zebra', count: 2 }, { value: 'apple', count: 2 })).toBe(-1);
      expect(compareRankedValues({ value: 'same', count: 2 }, { value: 'same', count: 2 })).toBe(0);
    });
  });

  describe('rankTopValues', () => {
    it('should return the most frequent values up to the limit', () => {
      const distribution = calculateFrequencies(['c', 'a', 'b', 'a', 'c', 'd']);

      expect(rankTopValues(distribution, 3)).toEqual([
        { value: 'a', count: 2 },
        { value: 'c', count: 2 },
        { value: 'b', count: 1 },
      ]);
    });

    it('should return nothing for a zero limit', () => {
      expect(rankTopValues(calculateFrequencies(['a']), 0)).toEqual([]);
    });
  });
});
