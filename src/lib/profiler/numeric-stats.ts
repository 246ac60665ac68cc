/**
 * Numeric statistics for integer and float columns
 */

import type {
  CellValue,
  NumericalStats,
  Quartiles,
} from "../../types/data-model.js";
import { collectPresent } from "../../utils/cell-values.js";
import { parseNumeric } from "../inferencer/value-detectors.js";
import { calculateMissingness } from "./missingness.js";

/**
 * Point `fraction` of the way from lower to upper. Opposite-sign bounds are
 * blended as a weighted sum, since their difference can overflow.
 */
export function interpolate(lower: number, upper: number, fraction: number): number {
  if (Math.sign(lower) === Math.sign(upper)) {
    return lower + (upper - lower) * fraction;
  }
  return lower * (1 - fraction) + upper * fraction;
}

/**
 * Quantile by linear interpolation at position p * (n - 1) over sorted values
 *
 * @example
 * calculateQuantile([1, 2, 3, 4], 0.25)
 * // Returns: 1.75
 */
export function calculateQuantile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new Error("Cannot calculate quantile of empty array");
  }

  const position = p * (sorted.length - 1);
  const lowerIndex = Math.floor(position);
  const upperIndex = Math.ceil(position);
  const lower = sorted[lowerIndex] ?? 0;
  const upper = sorted[upperIndex] ?? lower;

  return interpolate(lower, upper, position - lowerIndex);
}

/**
 * Middle value, or mean of the two middle values for an even count
 */
export function calculateMedian(sorted: readonly number[]): number {
  if (sorted.length === 0) {
    throw new Error("Cannot calculate median of empty array");
  }

  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  const lower = sorted[middle - 1] ?? upper;
  return interpolate(lower, upper, 0.5);
}

/**
 * Running mean; stays finite for any finite input, unlike sum / n
 */
export function calculateMean(values: readonly number[]): number {
  let mean = 0;
  let count = 0;
  for (const value of values) {
    count++;
    mean += value / count - mean / count;
  }
  return mean;
}

/**
 * Sample standard deviation (divisor n - 1); null below two values
 */
export function calculateStdDev(
  values: readonly number[],
  mean: number,
): number | null {
  if (values.length < 2) {
    return null;
  }

  // Halved deviations, scaled to at most 1, so neither differences nor squares overflow
  const deviations = values.map((value) => value / 2 - mean / 2);
  let scale = 0;
  for (const deviation of deviations) {
    scale = Math.max(scale, Math.abs(deviation));
  }
  if (scale === 0) {
    return 0;
  }

  let sumSquaredDiff = 0;
  for (const deviation of deviations) {
    sumSquaredDiff += Math.pow(deviation / scale, 2);
  }
  return 2 * scale * Math.sqrt(sumSquaredDiff / (values.length - 1));
}

/**
 * Extract the values of a column that parse as finite numbers
 */
export function extractNumericValues(rawValues: readonly CellValue[]): number[] {
  const numbers: number[] = [];
  for (const value of collectPresent(rawValues)) {
    const parsed = parseNumeric(value);
    if (parsed !== null) {
      numbers.push(parsed);
    }
  }
  return numbers;
}

/**
 * Calculate numerical statistics for a column
 */
export function calculateNumericalStats(
  rawValues: readonly CellValue[],
): NumericalStats {
  const values = extractNumericValues(rawValues);
  const missingness = calculateMissingness(rawValues.length, values.length);

  if (values.length === 0) {
    return {
      kind: "numerical",
      minValue: null,
      maxValue: null,
      mean: null,
      median: null,
      stdDev: null,
      quartiles: null,
      ...missingness,
    };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const mean = calculateMean(sorted);
  const quartiles: Quartiles = {
    q25: calculateQuantile(sorted, 0.25),
    q50: calculateQuantile(sorted, 0.5),
    q75: calculateQuantile(sorted, 0.75),
  };

  return {
    kind: "numerical",
    minValue: sorted[0] ?? null,
    maxValue: sorted[sorted.length - 1] ?? null,
    mean,
    median: calculateMedian(sorted),
    stdDev: calculateStdDev(sorted, mean),
    quartiles,
    ...missingness,
  };
}
