import { describe, it, expect } from 'vitest';
import {
  compileDatetimeFormats,
  formatTimestamp,
  parseDatetime,
  parseDatetimeParts,
  parseTimestamp,
  utcInstant,
} from '../../../src/utils/datetime.js';
import { DEFAULT_PROFILER_CONFIG } from '../../../src/types/config.js';

describe('Datetime Utilities', () => {
  const formats = compileDatetimeFormats(DEFAULT_PROFILER_CONFIG.datetimeFormats);

  describe('parseDatetime', () => {
    it('should parse ISO dates as UTC midnight', () => {
      expect(parseDatetime('2024-03-07', formats)?.toISOString()).toBe(
        '2024-03-07T00:00:00.000Z',
      );
    });

    it('should parse ISO datetimes with fractions and offsets', () => {
      expect(parseDatetime('2024-03-07T14:05:09.1234-05:30', formats)?.toISOString()).toBe(
        '2024-03-07T19:35:09.123Z',
      );
    });

    it('should keep the sub-millisecond digits of the fraction', () => {
      const parsed = parseDatetimeParts('2024-03-07T14:05:09.123456Z', formats);

      expect(parsed?.instant.toISOString()).toBe('2024-03-07T14:05:09.123Z');
      expect(parsed?.microsecond).toBe(456);
      expect(parseDatetimeParts('2024-03-07', formats)?.microsecond).toBe(0);
    });

    it('should parse slash-separated year-first dates with time', () => {
      expect(parseDatetime('2024/3/7 14:05', formats)?.toISOString()).toBe(
        '2024-03-07T14:05:00.000Z',
      );
    });

    it('should parse month-first dates', () => {
      expect(parseDatetime('02/29/2024', formats)?.toISOString()).toBe(
        '2024-02-29T00:00:00.000Z',
      );
    });

    it('should reject dates that do not exist', () => {
      expect(parseDatetime('02/29/2023', formats)).toBeNull();
      expect(parseDatetime('2024-04-31', formats)).toBeNull();
      expect(parseDatetime('2024-01-01 24:00', formats)).toBeNull();
    });

    it('should reject text in no known format', () => {
      expect(parseDatetime('next tuesday', formats)).toBeNull();
      expect(parseDatetime('20240105', formats)).toBeNull();
    });
  });

  describe('utcInstant', () => {
    it('should keep two-digit years literal', () => {
      expect(utcInstant(99, 1, 1)?.getUTCFullYear()).toBe(99);
    });

    it('should reject non-integer components', () => {
      expect(utcInstant(NaN, 1, 1)).toBeNull();
      expect(utcInstant(2024, 1.5, 1)).toBeNull();
    });
  });

  describe('formatTimestamp', () => {
    const withMillis = new Date(Date.UTC(2024, 0, 5, 3, 4, 5, 67));
    const whole = new Date(Date.UTC(2024, 0, 5, 3, 4, 5));

    it('should write microsecond precision when asked', () => {
      expect(formatTimestamp(withMillis, true)).toBe('2024-01-05 03:04:05.067000');
      expect(formatTimestamp(whole, true)).toBe('2024-01-05 03:04:05.000000');
    });

    it('should omit a zero fraction by default', () => {
      expect(formatTimestamp(whole)).toBe('2024-01-05 03:04:05');
      expect(formatTimestamp(withMillis)).toBe('2024-01-05 03:04:05.067000');
    });
  });

  describe('parseTimestamp', () => {
    it('should invert formatTimestamp', () => {
      const date = new Date(Date.UTC(2023, 11, 31, 23, 59, 58, 125));
      expect(parseTimestamp(formatTimestamp(date, true))?.getTime()).toBe(date.getTime());
    });

    it('should accept timestamps without a fraction', () => {
      expect(parseTimestamp('2024-06-01 12:00:00')?.toISOString()).toBe(
        '2024-06-01T12:00:00.000Z',
      );
    });

    it('should reject other layouts', () => {
      expect(parseTimestamp('2024-06-01T12:00:00Z')).toBeNull();
      expect(parseTimestamp('yesterday')).toBeNull();
    });
  });
});
