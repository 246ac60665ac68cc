/**
 * Profiler module - computes type-appropriate statistics for one column
 */

import type { ProfilerConfig } from "../../types/config.js";
import type {
  CellValue,
  FieldStats,
  FieldType,
} from "../../types/data-model.js";
import { compileRules } from "../inferencer/rules.js";
import type { CompiledRules } from "../inferencer/types.js";
import { calculateCategoricalStats } from "./categorical-stats.js";
import { calculateDatetimeStats } from "./datetime-stats.js";
import { calculateNumericalStats } from "./numeric-stats.js";
import { calculateStringStats } from "./string-stats.js";

export * from "./types.js";
export * from "./missingness.js";
export * from "./numeric-stats.js";
export * from "./categorical-stats.js";
export * from "./string-stats.js";
export * from "./datetime-stats.js";

/**
 * Dispatch to the stats variant selected by the field type
 */
export function computeStatsWithRules(
  fieldType: FieldType,
  rawValues: readonly CellValue[],
  rules: CompiledRules,
): FieldStats {
  switch (fieldType) {
    case "integer":
    case "float":
      return calculateNumericalStats(rawValues);
    case "boolean":
    case "categorical":
    case "identifier":
      return calculateCategoricalStats(rawValues, fieldType, rules);
    case "string":
      return calculateStringStats(rawValues);
    case "datetime":
      return calculateDatetimeStats(rawValues, rules);
    default: {
      const unhandled: never = fieldType;
      throw new Error(`Unhandled field type: ${String(unhandled)}`);
    }
  }
}

/**
 * Compute statistics for a column of the given type
 *
 * @example
 * computeFieldStats("integer", [1, 2, null], config)
 * // Returns: { kind: "numerical", mean: 1.5, missingCount: 1, ... }
 */
export function computeFieldStats(
  fieldType: FieldType,
  rawValues: readonly CellValue[],
  config: ProfilerConfig,
): FieldStats {
  return computeStatsWithRules(fieldType, rawValues, compileRules(config));
}

/**
 * Main statistics class. Compiles the config once and reuses it per column.
 */
export class StatisticsComputer {
  private rules: CompiledRules;

  constructor(config: ProfilerConfig | CompiledRules) {
    this.rules = "identifierPatterns" in config ? config : compileRules(config);
  }

  compute(fieldType: FieldType, rawValues: readonly CellValue[]): FieldStats {
    return computeStatsWithRules(fieldType, rawValues, this.rules);
  }
}
