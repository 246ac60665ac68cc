/**
 * Unit tests for numeric statistics
 */

import { describe, it, expect } from 'vitest';
import {
  calculateMean,
  calculateMedian,
  calculateNumericalStats,
  calculateQuantile,
  calculateStdDev,
  extractNumericValues,
} from '../../src/lib/profiler/numeric-stats.js';
import { range } from '../helpers/columns.js';

describe('Numeric Statistics', () => {
  describe('calculateQuantile', () => {
    it('should interpolate between neighbouring values', () => {
      expect(calculateQuantile([1, 2, 3, 4], 0.25)).toBe(1.75);
      expect(calculateQuantile([1, 2, 3, 4], 0.5)).toBe(2.5);
      expect(calculateQuantile([1, 2, 3, 4], 1)).toBe(4);
    });

    it('should return the only value of a single-element array', () => {
      expect(calculateQuantile([7], 0.75)).toBe(7);
    });

    it('should throw on an empty array', () => {
      expect(() => calculateQuantile([], 0.5)).toThrow(
        'Cannot calculate quantile of empty array',
      );
    });
  });

  describe('calculateMedian', () => {
    it('should average the two middle values for even counts', () => {
      expect(calculateMedian([1, 3, 5, 9])).toBe(4);
    });

    it('should take the middle value for odd counts', () => {
      expect(calculateMedian([1, 3, 5])).toBe(3);
    });
  });

  describe('calculateStdDev', () => {
    it('should use the sample divisor', () => {
      expect(calculateStdDev([2, 4, 4, 4, 5, 5, 7, 9], 5)).toBeCloseTo(2.13809, 5);
    });

    it('should return null for fewer than two values', () => {
      expect(calculateStdDev([3], 3)).toBeNull();
    });
  });

  describe('extractNumericValues', () => {
    it('should parse numeric strings and skip everything else', () => {
      expect(extractNumericValues(['1', ' 2.5 ', 'abc', null, true, 3, '1e3'])).toEqual([
        1, 2.5, 3, 1000,
      ]);
    });
  });

  describe('calculateNumericalStats', () => {
    it('should describe the integers 1 to 50', () => {
      const stats = calculateNumericalStats(range(1, 50));

      expect(stats.minValue).toBe(1);
      expect(stats.maxValue).toBe(50);
      expect(stats.mean).toBe(25.5);
      expect(stats.median).toBe(25.5);
      expect(stats.stdDev).toBeCloseTo(14.5774, 4);
      expect(stats.quartiles).toEqual({ q25: 13.25, q50: 25.5, q75: 37.75 });
      expect(stats.missingCount).toBe(0);
      expect(stats.missingPercentage).toBe(0);
    });

    it('should count absent and unparseable cells as missing', () => {
      const stats = calculateNumericalStats(['1', '2', 'abc', null]);

      expect(stats.mean).toBe(1.5);
      expect(stats.median).toBe(1.5);
      expect(stats.stdDev).toBeCloseTo(Math.SQRT1_2, 10);
      expect(stats.quartiles).toEqual({ q25: 1.25, q50: 1.5, q75: 1.75 });
      expect(stats.missingCount).toBe(2);
      expect(stats.missingPercentage).toBe(50);
    });

    it('should leave the deviation null for a single value', () => {
      const stats = calculateNumericalStats([5]);

      expect(stats.median).toBe(5);
      expect(stats.stdDev).toBeNull();
      expect(stats.quartiles).toEqual({ q25: 5, q50: 5, q75: 5 });
    });

    it('should return null aggregates when nothing parses', () => {
      expect(calculateNumericalStats([null, 'n/a'])).toEqual({
        kind: 'numerical',
        minValue: null,
        maxValue: null,
        mean: null,
        median: null,
        stdDev: null,
        quartiles: null,
        missingCount: 2,
        missingPercentage: 100,
      });
    });

    it('should report zero missingness for zero rows', () => {
      const stats = calculateNumericalStats([]);

      expect(stats.missingCount).toBe(0);
      expect(stats.missingPercentage).toBe(0);
    });
  });

  describe('calculateMean', () => {
    it('should return 0 for an empty array', () => {
      expect(calculateMean([])).toBe(0);
    });

    it('should stay finite near the top of the double range', () => {
      expect(calculateMean([1e308, 1e308, 1e308])).toBe(1e308);
      expect(calculateMean([-1e308, 1e308])).toBe(0);
    });
  });

  describe('large magnitudes', () => {
    it('should keep every aggregate finite for repeated huge values', () => {
      expect(calculateNumericalStats([1e308, 1e308, 1e308])).toMatchObject({
        minValue: 1e308,
        maxValue: 1e308,
        mean: 1e308,
        median: 1e308,
        stdDev: 0,
        quartiles: { q25: 1e308, q50: 1e308, q75: 1e308 },
      });
    });

    it('should keep the spread finite across opposite extremes', () => {
      const stats = calculateNumericalStats([-1e308, 1e308]);

      expect(stats.mean).toBe(0);
      expect(stats.median).toBe(0);
      expect(stats.stdDev).toBe(1e308 * Math.SQRT2);
    });
  });
});
