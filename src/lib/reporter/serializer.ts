/**
 * Report serialization to and from the snake_case wire format
 */

import type { ValidateFunction } from "ajv";
import type {
  AnalysisReport,
  ColumnProfile,
  FieldStats,
} from "../../types/data-model.js";
import { formatTimestamp, parseTimestamp } from "../../utils/datetime.js";
import { ReportFormatError } from "../../utils/errors.js";
import {
  compileSchema,
  formatSchemaErrors,
} from "../../utils/schema-registry.js";
import { STATS_KIND_BY_FIELD_TYPE } from "../profiler/types.js";
import { calculateCompleteness } from "./completeness.js";
import type {
  AnalysisReportDocument,
  FieldProfileDocument,
} from "./types.js";

let reportValidator: ValidateFunction<AnalysisReportDocument> | undefined;

function getReportValidator(): ValidateFunction<AnalysisReportDocument> {
  reportValidator ??= compileSchema<AnalysisReportDocument>("analysis-report");
  return reportValidator;
}

function serializeDate(date: Date | null): string | null {
  return date === null ? null : formatTimestamp(date);
}

function serializeField(field: ColumnProfile): FieldProfileDocument {
  const document: FieldProfileDocument = {
    name: field.name,
    field_type: field.fieldType,
    total_count: field.totalCount,
    categorical_stats: null,
    numerical_stats: null,
    string_stats: null,
    datetime_stats: null,
    sample_values: [...field.sampleValues],
  };

  const { stats } = field;
  switch (stats.kind) {
    case "categorical":
      document.categorical_stats = {
        unique_count: stats.uniqueCount,
        top_values: stats.topValues.map((top) => ({ ...top })),
        missing_count: stats.missingCount,
        missing_percentage: stats.missingPercentage,
      };
      break;
    case "numerical":
      document.numerical_stats = {
        min_value: stats.minValue,
        max_value: stats.maxValue,
        mean: stats.mean,
        median: stats.median,
        std_dev: stats.stdDev,
        quartiles: stats.quartiles ? { ...stats.quartiles } : null,
        missing_count: stats.missingCount,
        missing_percentage: stats.missingPercentage,
      };
      break;
    case "string":
      document.string_stats = {
        min_length: stats.minLength,
        max_length: stats.maxLength,
        avg_length: stats.avgLength,
        unique_count: stats.uniqueCount,
        missing_count: stats.missingCount,
        missing_percentage: stats.missingPercentage,
      };
      break;
    case "datetime":
      document.datetime_stats = {
        min_date: serializeDate(stats.minDate),
        max_date: serializeDate(stats.maxDate),
        unique_count: stats.uniqueCount,
        missing_count: stats.missingCount,
        missing_percentage: stats.missingPercentage,
      };
      break;
  }

  return document;
}

/**
 * Convert a report to its wire document
 */
export function serializeReport(report: AnalysisReport): AnalysisReportDocument {
  return {
    file_path: report.source.path,
    file_type: report.source.format,
    total_rows: report.totalRows,
    total_columns: report.totalColumns,
    fields: report.fields.map(serializeField),
    analysis_timestamp: formatTimestamp(report.analysisTimestamp, true),
    processing_time_seconds: report.processingTimeSeconds,
  };
}

export function reportToJson(report: AnalysisReport, indent = 2): string {
  return JSON.stringify(serializeReport(report), null, indent);
}

function deserializeDate(
  value: string | null,
  fieldName: string,
  property: string,
): Date | null {
  if (value === null) {
    return null;
  }
  const parsed = parseTimestamp(value);
  if (!parsed) {
    throw new ReportFormatError(`Invalid ${property} on field "${fieldName}": ${value}`, {
      field: fieldName,
      property,
      value,
    });
  }
  return parsed;
}

function deserializeStats(document: FieldProfileDocument): FieldStats {
  const expected = STATS_KIND_BY_FIELD_TYPE[document.field_type];
  const populated = [
    document.categorical_stats && "categorical",
    document.numerical_stats && "numerical",
    document.string_stats && "string",
    document.datetime_stats && "datetime",
  ].filter((kind) => typeof kind === "string");

  if (populated.length !== 1 || populated[0] !== expected) {
    throw new ReportFormatError(
      `Field "${document.name}" of type ${document.field_type} must carry only ${expected} stats`,
      { field: document.name, populated },
    );
  }

  const {
    categorical_stats: categorical,
    numerical_stats: numerical,
    string_stats: text,
    datetime_stats: datetime,
  } = document;

  if (categorical) {
    return {
      kind: "categorical",
      uniqueCount: categorical.unique_count,
      topValues: categorical.top_values.map((top) => ({ ...top })),
      missingCount: categorical.missing_count,
      missingPercentage: categorical.missing_percentage,
    };
  }
  if (numerical) {
    return {
      kind: "numerical",
      minValue: numerical.min_value,
      maxValue: numerical.max_value,
      mean: numerical.mean,
      median: numerical.median,
      stdDev: numerical.std_dev,
      quartiles: numerical.quartiles ? { ...numerical.quartiles } : null,
      missingCount: numerical.missing_count,
      missingPercentage: numerical.missing_percentage,
    };
  }
  if (text) {
    return {
      kind: "string",
      minLength: text.min_length,
      maxLength: text.max_length,
      avgLength: text.avg_length,
      uniqueCount: text.unique_count,
      missingCount: text.missing_count,
      missingPercentage: text.missing_percentage,
    };
  }
  if (datetime) {
    return {
      kind: "datetime",
      minDate: deserializeDate(datetime.min_date, document.name, "min_date"),
      maxDate: deserializeDate(datetime.max_date, document.name, "max_date"),
      uniqueCount: datetime.unique_count,
      missingCount: datetime.missing_count,
      missingPercentage: datetime.missing_percentage,
    };
  }

  throw new ReportFormatError(`Field "${document.name}" has no stats block`);
}

function deserializeField(document: FieldProfileDocument): ColumnProfile {
  return {
    name: document.name,
    fieldType: document.field_type,
    totalCount: document.total_count,
    stats: deserializeStats(document),
    sampleValues: [...document.sample_values],
  };
}

/**
 * Rebuild a report from its wire document (or JSON text).
 * completenessPercentage is not on the wire and is recomputed.
 *
 * @throws ReportFormatError if the input does not match the report schema
 */
export function deserializeReport(input: unknown): AnalysisReport {
  let data = input;
  if (typeof input === "string") {
    try {
      data = JSON.parse(input);
    } catch (error) {
      throw new ReportFormatError("Report is not valid JSON", undefined, {
        cause: error,
      });
    }
  }

  const validate = getReportValidator();
  if (!validate(data)) {
    throw new ReportFormatError("Report does not match the analysis report schema", {
      issues: formatSchemaErrors(validate.errors),
    });
  }

  if (data.fields.length !== data.total_columns) {
    throw new ReportFormatError(
      `total_columns is ${data.total_columns} but ${data.fields.length} fields are present`,
    );
  }

  const analysisTimestamp = parseTimestamp(data.analysis_timestamp);
  if (!analysisTimestamp) {
    throw new ReportFormatError(
      `Invalid analysis_timestamp: ${data.analysis_timestamp}`,
    );
  }

  const fields = data.fields.map(deserializeField);

  return {
    source: { path: data.file_path, format: data.file_type },
    totalRows: data.total_rows,
    totalColumns: data.total_columns,
    fields,
    analysisTimestamp,
    processingTimeSeconds: data.processing_time_seconds,
    completenessPercentage: calculateCompleteness(fields),
  };
}

export function reportFromJson(json: string): AnalysisReport {
  return deserializeReport(json);
}
