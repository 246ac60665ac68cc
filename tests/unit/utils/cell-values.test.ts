import { describe, it, expect } from 'vitest';
import {
  collectPresent,
  isAbsent,
  isPresent,
  textLength,
  toText,
} from '../../../src/utils/cell-values.js';

describe('Cell Values', () => {
  it('should treat null-like cells as absent', () => {
    for (const value of [null, undefined, '', '   ', NaN, Infinity, -Infinity]) {
      expect(isAbsent(value)).toBe(true);
    }
  });

  it('should treat falsy but real values as present', () => {
    for (const value of [0, false, '0', 'false']) {
      expect(isPresent(value)).toBe(true);
    }
  });

  it('should collect present values in row order', () => {
    expect(collectPresent(['b', null, 0, '', false, 'a'])).toEqual(['b', 0, false, 'a']);
  });

  it('should render values as text', () => {
    expect(toText(1.5)).toBe('1.5');
    expect(toText(true)).toBe('true');
    expect(toText(' padded ')).toBe(' padded ');
  });

  it('should count surrogate pairs as one character', () => {
    expect(textLength('😀')).toBe(1);
    expect(textLength('héllo')).toBe(5);
  });
});
