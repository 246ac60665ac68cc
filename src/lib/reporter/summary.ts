/**
 * Dataset-level roll-ups used by report headers
 */

import type {
  AnalysisReport,
  ColumnProfile,
  FieldType,
} from "../../types/data-model.js";
import { roundTo } from "./completeness.js";
import type { ReportSummary } from "./types.js";

/**
 * Group field profiles by type, keeping source order inside each group
 */
export function groupFieldsByType(
  report: AnalysisReport,
): Map<FieldType, ColumnProfile[]> {
  const groups = new Map<FieldType, ColumnProfile[]>();
  for (const field of report.fields) {
    const group = groups.get(field.fieldType);
    if (group) {
      group.push(field);
    } else {
      groups.set(field.fieldType, [field]);
    }
  }
  return groups;
}

/**
 * Count fields per type and the share of non-missing cells across the table
 */
export function summarizeReport(report: AnalysisReport): ReportSummary {
  const typeCounts: Partial<Record<FieldType, number>> = {};
  let totalMissing = 0;

  for (const field of report.fields) {
    typeCounts[field.fieldType] = (typeCounts[field.fieldType] ?? 0) + 1;
    totalMissing += field.stats.missingCount;
  }

  const totalCells = report.totalRows * report.fields.length;

  return {
    totalFields: report.fields.length,
    totalMissing,
    typeCounts,
    completenessPercentage:
      totalCells > 0 ? roundTo(((totalCells - totalMissing) / totalCells) * 100, 2) : 0,
  };
}
