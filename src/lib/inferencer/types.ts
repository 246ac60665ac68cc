/**
 * Inferencer module types
 */

import type { ProfilerConfig } from "../../types/config.js";
import type { FieldType } from "../../types/data-model.js";

/**
 * Config with its patterns compiled once per run
 */
export interface CompiledRules {
  config: ProfilerConfig;
  identifierPatterns: RegExp[];
  datetimeFormats: RegExp[];
  truthyLiterals: Set<string>;
  falsyLiterals: Set<string>;
}

/**
 * Per-column measurements the classification cascade reads
 */
export interface ColumnValueAnalysis {
  columnName: string;
  presentCount: number;
  uniqueCount: number;
  uniquenessRatio: number;
  nameMatchesIdentifier: boolean;
  uuidRatio: number;
  booleanLike: boolean;
  datetimeRatio: number;
  numericRatio: number;
  allIntegers: boolean;
}

export interface InferenceResult {
  fieldType: FieldType;
  analysis: ColumnValueAnalysis;
}
