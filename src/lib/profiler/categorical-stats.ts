/**
 * Frequency statistics for categorical, boolean and identifier columns
 */

import type {
  CategoricalStats,
  CellValue,
  FieldType,
  TopValue,
} from "../../types/data-model.js";
import { collectPresent, toText } from "../../utils/cell-values.js";
import {
  calculateFrequencies,
  rankTopValues,
} from "../../utils/frequency-map.js";
import type { CompiledRules } from "../inferencer/types.js";
import { toBooleanLabel } from "../inferencer/value-detectors.js";
import { calculateMissingness } from "./missingness.js";

/**
 * Keys counted for each present value. Boolean columns use their display
 * label ("True"/"False"); values that are not boolean literals are dropped.
 */
export function extractCategoryKeys(
  rawValues: readonly CellValue[],
  fieldType: FieldType,
  rules: CompiledRules,
): string[] {
  const keys: string[] = [];

  for (const value of collectPresent(rawValues)) {
    if (fieldType === "boolean") {
      const label = toBooleanLabel(value, rules);
      if (label !== null) {
        keys.push(label);
      }
    } else {
      keys.push(toText(value));
    }
  }

  return keys;
}

/**
 * Calculate categorical statistics for a column
 *
 * Top values are ordered by count descending, ties by value ascending.
 * Percentages are relative to all rows, missing ones included.
 */
export function calculateCategoricalStats(
  rawValues: readonly CellValue[],
  fieldType: FieldType,
  rules: CompiledRules,
): CategoricalStats {
  const totalRows = rawValues.length;
  const keys = extractCategoryKeys(rawValues, fieldType, rules);
  const distribution = calculateFrequencies(keys);

  const topValues: TopValue[] = rankTopValues(
    distribution,
    rules.config.topValuesLimit,
  ).map(({ value, count }) => ({
    value,
    count,
    percentage: totalRows > 0 ? (count * 100) / totalRows : 0,
  }));

  return {
    kind: "categorical",
    uniqueCount: distribution.size,
    topValues,
    ...calculateMissingness(totalRows, keys.length),
  };
}
