/**
 * Reporter module types, including the snake_case wire format shared with
 * downstream report renderers
 */

import type { FieldType, PresentValue } from "../../types/data-model.js";

export interface ReporterOptions {
  /** Overrides the timestamp recorded on the report */
  now?: () => Date;
}

export interface TopValueDocument {
  value: string;
  count: number;
  percentage: number;
}

export interface CategoricalStatsDocument {
  unique_count: number;
  top_values: TopValueDocument[];
  missing_count: number;
  missing_percentage: number;
}

export interface NumericalStatsDocument {
  min_value: number | null;
  max_value: number | null;
  mean: number | null;
  median: number | null;
  std_dev: number | null;
  quartiles: { q25: number; q50: number; q75: number } | null;
  missing_count: number;
  missing_percentage: number;
}

export interface StringStatsDocument {
  min_length: number | null;
  max_length: number | null;
  avg_length: number | null;
  unique_count: number;
  missing_count: number;
  missing_percentage: number;
}

export interface DatetimeStatsDocument {
  min_date: string | null;
  max_date: string | null;
  unique_count: number;
  missing_count: number;
  missing_percentage: number;
}

/**
 * FieldProfile on the wire: exactly one *_stats block is non-null
 */
export interface FieldProfileDocument {
  name: string;
  field_type: FieldType;
  total_count: number;
  categorical_stats: CategoricalStatsDocument | null;
  numerical_stats: NumericalStatsDocument | null;
  string_stats: StringStatsDocument | null;
  datetime_stats: DatetimeStatsDocument | null;
  sample_values: PresentValue[];
}

export interface AnalysisReportDocument {
  file_path: string;
  file_type: string;
  total_rows: number;
  total_columns: number;
  fields: FieldProfileDocument[];
  analysis_timestamp: string;
  processing_time_seconds: number;
}

/**
 * Dataset-level roll-up for report headers
 */
export interface ReportSummary {
  totalFields: number;
  totalMissing: number;
  typeCounts: Partial<Record<FieldType, number>>;
  completenessPercentage: number;
}
