/**
 * Core data model types for tabscope
 * These structures flow through the pipeline: dataset → inference → statistics → report
 */

/**
 * CellValue - Raw scalar as produced by a reader. null, undefined, blank
 * strings and non-finite numbers are treated as absent.
 */
export type CellValue = string | number | boolean | null | undefined;

/**
 * PresentValue - A cell value that is not absent
 */
export type PresentValue = string | number | boolean;

/**
 * DataSource - Where a dataset came from (informational only)
 */
export interface DataSource {
  path: string;
  format: string; // "csv", "json", "xlsx", ...
}

/**
 * Column - One named column of raw values, in row order
 */
export interface Column {
  name: string;
  values: readonly CellValue[];
}

/**
 * Dataset - Columnar in-memory table. Every column holds exactly rowCount values.
 */
export interface Dataset {
  columns: readonly Column[];
  rowCount: number;
  source: DataSource;
  createdAt: Date;
}

export const FIELD_TYPES = [
  "integer",
  "float",
  "boolean",
  "datetime",
  "categorical",
  "identifier",
  "string",
] as const;

/**
 * FieldType - Closed taxonomy of inferred column types
 */
export type FieldType = (typeof FIELD_TYPES)[number];

export interface Quartiles {
  q25: number;
  q50: number;
  q75: number;
}

/**
 * Missingness shared by every stats variant. missingCount covers source-absent
 * cells and present cells that failed to parse under the inferred type.
 */
export interface MissingnessStats {
  missingCount: number;
  missingPercentage: number;
}

export interface NumericalStats extends MissingnessStats {
  kind: "numerical";
  minValue: number | null;
  maxValue: number | null;
  mean: number | null;
  median: number | null;
  stdDev: number | null; // null with fewer than 2 values
  quartiles: Quartiles | null;
}

export interface TopValue {
  value: string;
  count: number;
  percentage: number;
}

export interface CategoricalStats extends MissingnessStats {
  kind: "categorical";
  uniqueCount: number;
  topValues: TopValue[];
}

export interface StringStats extends MissingnessStats {
  kind: "string";
  minLength: number | null;
  maxLength: number | null;
  avgLength: number | null;
  uniqueCount: number;
}

export interface DatetimeStats extends MissingnessStats {
  kind: "datetime";
  minDate: Date | null;
  maxDate: Date | null;
  uniqueCount: number;
}

/**
 * FieldStats - Exactly one variant per column, selected by FieldType
 */
export type FieldStats =
  | NumericalStats
  | CategoricalStats
  | StringStats
  | DatetimeStats;

export type FieldStatsKind = FieldStats["kind"];

/**
 * ColumnProfile - Inferred type, statistics and a few example values for one column
 */
export interface ColumnProfile {
  name: string;
  fieldType: FieldType;
  totalCount: number; // present (non-absent) raw cells
  stats: FieldStats;
  sampleValues: PresentValue[];
}

/**
 * AnalysisReport - Dataset-level result of one analysis run
 */
export interface AnalysisReport {
  source: DataSource;
  totalRows: number;
  totalColumns: number;
  fields: ColumnProfile[];
  analysisTimestamp: Date;
  processingTimeSeconds: number;
  completenessPercentage: number;
}
