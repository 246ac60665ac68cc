/**
 * Unit tests for report roll-ups
 */

import { describe, it, expect } from 'vitest';
import {
  analyzeDataset,
  calculateCompleteness,
  groupFieldsByType,
  roundTo,
  summarizeReport,
} from '../../../src/lib/reporter/index.js';
import { createDataset } from '../../../src/lib/dataset/index.js';
import { createMixedDataset, createScenarioDataset, fixedClock } from '../../helpers/datasets.js';

describe('Report Summary', () => {
  describe('summarizeReport', () => {
    it('should count types and missing cells', () => {
      const summary = summarizeReport(analyzeDataset(createScenarioDataset(), undefined, { now: fixedClock }));

      expect(summary).toEqual({
        totalFields: 5,
        totalMissing: 50,
        typeCounts: {
          integer: 1,
          categorical: 1,
          boolean: 1,
          string: 1,
          identifier: 1,
        },
        completenessPercentage: 80,
      });
    });

    it('should report 0% for an empty dataset', () => {
      const summary = summarizeReport(analyzeDataset(createDataset({ columns: [] })));

      expect(summary).toEqual({
        totalFields: 0,
        totalMissing: 0,
        typeCounts: {},
        completenessPercentage: 0,
      });
    });
  });

  describe('groupFieldsByType', () => {
    it('should group fields in source order', () => {
      const report = analyzeDataset(createMixedDataset(), undefined, { now: fixedClock });
      const groups = groupFieldsByType(report);

      expect([...groups.keys()]).toEqual([
        'float',
        'string',
        'datetime',
        'boolean',
        'identifier',
        'categorical',
      ]);
      expect(groups.get('string')?.map((field) => field.name)).toEqual(['note', 'empty']);
    });
  });

  describe('calculateCompleteness', () => {
    it('should return 0 without fields', () => {
      expect(calculateCompleteness([])).toBe(0);
    });

    it('should round to two decimals', () => {
      expect(roundTo(100 - 100 / 3, 2)).toBe(66.67);
    });
  });
});
