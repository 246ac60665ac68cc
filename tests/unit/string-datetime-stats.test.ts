/**
 * Unit tests for string and datetime statistics
 */

import { describe, it, expect } from 'vitest';
import { calculateStringStats } from '../../src/lib/profiler/string-stats.js';
import {
  calculateDatetimeStats,
  extractInstants,
} from '../../src/lib/profiler/datetime-stats.js';
import { compileRules } from '../../src/lib/inferencer/rules.js';
import { createProfilerConfig } from '../../src/utils/config-loader.js';
import { repeat } from '../helpers/columns.js';

describe('String Statistics', () => {
  it('should measure lengths in code points', () => {
    const stats = calculateStringStats(['a', 'bbb', null, 'bbb', '😀x']);

    expect(stats).toEqual({
      kind: 'string',
      minLength: 1,
      maxLength: 3,
      avgLength: 2.25,
      uniqueCount: 3,
      missingCount: 1,
      missingPercentage: 20,
    });
  });

  it('should return null lengths for an all-absent column', () => {
    const stats = calculateStringStats(repeat(null, 50));

    expect(stats.minLength).toBeNull();
    expect(stats.maxLength).toBeNull();
    expect(stats.avgLength).toBeNull();
    expect(stats.uniqueCount).toBe(0);
    expect(stats.missingPercentage).toBe(100);
  });
});

describe('Datetime Statistics', () => {
  const rules = compileRules(createProfilerConfig());

  it('should find the range and distinct instants', () => {
    const stats = calculateDatetimeStats(
      ['2024-01-05', '2023-12-31T23:30:00Z', '2024-01-05', 'bad', null],
      rules,
    );

    expect(stats.minDate?.toISOString()).toBe('2023-12-31T23:30:00.000Z');
    expect(stats.maxDate?.toISOString()).toBe('2024-01-05T00:00:00.000Z');
    expect(stats.uniqueCount).toBe(2);
    expect(stats.missingCount).toBe(2);
    expect(stats.missingPercentage).toBe(40);
  });

  it('should count instants that differ below a millisecond as distinct', () => {
    const stats = calculateDatetimeStats(
      ['2024-01-01T00:00:00.0001', '2024-01-01T00:00:00.0002', '2024-01-01T00:00:00.0001'],
      rules,
    );

    expect(stats.uniqueCount).toBe(2);
    expect(stats.minDate?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(stats.maxDate?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('should normalize offsets to UTC', () => {
    expect(extractInstants(['2024-01-01T10:00:00+02:00'], rules)).toEqual([
      Date.UTC(2024, 0, 1, 8, 0, 0),
    ]);
  });

  it('should ignore native numbers', () => {
    expect(extractInstants([1704067200000, '2024-01-01'], rules)).toEqual([
      Date.UTC(2024, 0, 1),
    ]);
  });

  it('should return null dates when nothing parses', () => {
    expect(calculateDatetimeStats(['never'], rules)).toEqual({
      kind: 'datetime',
      minDate: null,
      maxDate: null,
      uniqueCount: 0,
      missingCount: 1,
      missingPercentage: 100,
    });
  });
});
