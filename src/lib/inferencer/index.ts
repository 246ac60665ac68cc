/**
 * Inferencer module - classifies a column into one FieldType
 *
 * Rules are evaluated in priority order and the first match wins:
 * identifier, boolean, datetime, integer/float, categorical, string.
 */

import type { ProfilerConfig } from "../../types/config.js";
import type { CellValue, FieldType } from "../../types/data-model.js";
import { collectPresent, toText } from "../../utils/cell-values.js";
import { parseDatetime } from "../../utils/datetime.js";
import { logger } from "../../utils/logger.js";
import {
  isUuid,
  matchesIdentifierName,
} from "./identifier-patterns.js";
import { compileRules } from "./rules.js";
import type {
  ColumnValueAnalysis,
  CompiledRules,
  InferenceResult,
} from "./types.js";
import { isBooleanColumn, parseNumeric } from "./value-detectors.js";

export * from "./types.js";
export * from "./rules.js";
export * from "./identifier-patterns.js";
export * from "./value-detectors.js";

function ratio(count: number, total: number): number {
  return total > 0 ? count / total : 0;
}

/**
 * Measure everything the cascade needs in one pass over the present values
 */
export function analyzeColumnValues(
  columnName: string,
  rawValues: readonly CellValue[],
  rules: CompiledRules,
): ColumnValueAnalysis {
  const present = collectPresent(rawValues);
  const presentCount = present.length;

  const distinct = new Set<string>();
  let uuidCount = 0;
  let datetimeCount = 0;
  let numericCount = 0;
  let allIntegers = true;

  for (const value of present) {
    const text = toText(value);
    distinct.add(text);

    if (typeof value === "string") {
      if (isUuid(text)) {
        uuidCount++;
      }
      if (parseDatetime(text, rules.datetimeFormats) !== null) {
        datetimeCount++;
      }
    }

    const numeric = parseNumeric(value);
    if (numeric !== null) {
      numericCount++;
      if (!Number.isInteger(numeric)) {
        allIntegers = false;
      }
    }
  }

  return {
    columnName,
    presentCount,
    uniqueCount: distinct.size,
    uniquenessRatio: ratio(distinct.size, presentCount),
    nameMatchesIdentifier: matchesIdentifierName(
      columnName,
      rules.identifierPatterns,
    ),
    uuidRatio: ratio(uuidCount, presentCount),
    booleanLike: isBooleanColumn(present, rules),
    datetimeRatio: ratio(datetimeCount, presentCount),
    numericRatio: ratio(numericCount, presentCount),
    allIntegers: numericCount > 0 && allIntegers,
  };
}

function isIdentifier(
  analysis: ColumnValueAnalysis,
  config: ProfilerConfig,
): boolean {
  if (analysis.presentCount === 0) {
    return false;
  }

  // UUID-shaped values are keys whatever the column is called
  if (analysis.uuidRatio >= config.idUniquenessThreshold) {
    return true;
  }

  // Key-like name plus near-unique values, whatever the values look like
  return (
    analysis.nameMatchesIdentifier &&
    analysis.uniquenessRatio > config.idUniquenessThreshold
  );
}

/**
 * Apply the ordered cascade to a measured column
 */
export function classifyColumn(
  analysis: ColumnValueAnalysis,
  config: ProfilerConfig,
): FieldType {
  if (isIdentifier(analysis, config)) {
    return "identifier";
  }

  if (analysis.booleanLike) {
    return "boolean";
  }

  if (
    analysis.datetimeRatio > 0 &&
    analysis.datetimeRatio >= config.datetimeParseThreshold
  ) {
    return "datetime";
  }

  if (
    analysis.numericRatio > 0 &&
    analysis.numericRatio >= config.numericParseThreshold
  ) {
    return analysis.allIntegers ? "integer" : "float";
  }

  if (
    analysis.presentCount > 0 &&
    (analysis.uniqueCount <= config.categoricalMaxUniqueCount ||
      analysis.uniquenessRatio < config.categoricalRatioThreshold)
  ) {
    return "categorical";
  }

  return "string";
}

/**
 * Infer the field type of a single column
 *
 * @example
 * inferFieldType("department", ["Sales", "Marketing", "Sales"], config)
 * // Returns: "categorical"
 */
export function inferFieldType(
  columnName: string,
  rawValues: readonly CellValue[],
  config: ProfilerConfig,
): FieldType {
  return new TypeInferencer(config).infer(columnName, rawValues);
}

/**
 * Main inferencer class. Compiles the config once and reuses it per column.
 */
export class TypeInferencer {
  private rules: CompiledRules;

  constructor(config: ProfilerConfig) {
    this.rules = compileRules(config);
  }

  getRules(): CompiledRules {
    return this.rules;
  }

  /**
   * Classify a column, returning the measurements alongside the type
   */
  inferWithAnalysis(
    columnName: string,
    rawValues: readonly CellValue[],
  ): InferenceResult {
    const analysis = analyzeColumnValues(columnName, rawValues, this.rules);
    const fieldType = classifyColumn(analysis, this.rules.config);

    logger.debug("Field type inferred", { fieldType, ...analysis });

    return { fieldType, analysis };
  }

  infer(columnName: string, rawValues: readonly CellValue[]): FieldType {
    return this.inferWithAnalysis(columnName, rawValues).fieldType;
  }
}
