import type { ColumnProfile } from "../../types/data-model.js";

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * 100 minus the mean per-column missing percentage, to 2 decimals.
 * A report without columns is 0% complete.
 */
export function calculateCompleteness(fields: readonly ColumnProfile[]): number {
  if (fields.length === 0) {
    return 0;
  }

  let totalMissing = 0;
  for (const field of fields) {
    totalMissing += field.stats.missingPercentage;
  }
  return roundTo(100 - totalMissing / fields.length, 2);
}
