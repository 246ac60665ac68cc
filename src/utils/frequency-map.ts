/**
 * Frequency distribution utilities for categorical value counting
 */

export type FrequencyDistribution = Map<string, number>;

export interface RankedValue {
  value: string;
  count: number;
}

/**
 * Calculate frequency distribution from an array of values
 *
 * @example
 * calculateFrequencies(["a", "b", "b"])
 * // Returns: Map { "a" => 1, "b" => 2 }
 */
export function calculateFrequencies(
  values: Iterable<string>,
): FrequencyDistribution {
  const distribution: FrequencyDistribution = new Map();

  for (const value of values) {
    updateFrequencies(distribution, value);
  }

  return distribution;
}

/**
 * Update a frequency distribution with a new value
 */
export function updateFrequencies(
  distribution: FrequencyDistribution,
  value: string,
): void {
  distribution.set(value, (distribution.get(value) ?? 0) + 1);
}

/**
 * Order entries by count descending, equal counts by value ascending
 * (plain code-unit comparison, independent of locale)
 */
export function compareRankedValues(a: RankedValue, b: RankedValue): number {
  if (a.count !== b.count) {
    return b.count - a.count;
  }
  if (a.value === b.value) {
    return 0;
  }
  return a.value < b.value ? -1 : 1;
}

/**
 * Return the `limit` most frequent values of a distribution
 */
export function rankTopValues(
  distribution: FrequencyDistribution,
  limit: number,
): RankedValue[] {
  const entries: RankedValue[] = [];
  for (const [value, count] of distribution) {
    entries.push({ value, count });
  }

  entries.sort(compareRankedValues);
  return entries.slice(0, Math.max(0, limit));
}
