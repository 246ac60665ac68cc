/**
 * Helpers for telling absent cells from present ones
 */

import type { CellValue, PresentValue } from "../types/data-model.js";

/**
 * null, undefined, blank strings, NaN and infinities count as absent
 */
export function isAbsent(value: CellValue): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value === "number") {
    return !Number.isFinite(value);
  }
  if (typeof value === "string") {
    return value.trim().length === 0;
  }
  return false;
}

export function isPresent(value: CellValue): value is PresentValue {
  return !isAbsent(value);
}

/**
 * Present values of a column, in row order
 */
export function collectPresent(values: readonly CellValue[]): PresentValue[] {
  const present: PresentValue[] = [];
  for (const value of values) {
    if (isPresent(value)) {
      present.push(value);
    }
  }
  return present;
}

/**
 * Textual representation used for uniqueness, frequencies and lengths
 */
export function toText(value: PresentValue): string {
  return typeof value === "string" ? value : String(value);
}

/**
 * Character count (code points, so surrogate pairs count once)
 */
export function textLength(text: string): number {
  return Array.from(text).length;
}
