/**
 * Range statistics for datetime columns
 */

import type { CellValue, DatetimeStats } from "../../types/data-model.js";
import { collectPresent } from "../../utils/cell-values.js";
import {
  parseDatetimeParts,
  type ParsedDatetime,
} from "../../utils/datetime.js";
import type { CompiledRules } from "../inferencer/types.js";
import { calculateMissingness } from "./missingness.js";

/**
 * Parse the string cells of a column against the configured formats.
 * Non-string and unparseable cells are skipped.
 */
export function extractDatetimes(
  rawValues: readonly CellValue[],
  rules: CompiledRules,
): ParsedDatetime[] {
  const parsed: ParsedDatetime[] = [];
  for (const value of collectPresent(rawValues)) {
    if (typeof value !== "string") continue;
    const datetime = parseDatetimeParts(value, rules.datetimeFormats);
    if (datetime !== null) {
      parsed.push(datetime);
    }
  }
  return parsed;
}

/**
 * UTC instants (epoch milliseconds) of the parseable cells
 */
export function extractInstants(
  rawValues: readonly CellValue[],
  rules: CompiledRules,
): number[] {
  return extractDatetimes(rawValues, rules).map((datetime) => datetime.instant.getTime());
}

// Microsecond-exact key; ms * 1000 would exceed the safe integer range
function instantKey(datetime: ParsedDatetime): string {
  return `${datetime.instant.getTime()}.${datetime.microsecond}`;
}

export function calculateDatetimeStats(
  rawValues: readonly CellValue[],
  rules: CompiledRules,
): DatetimeStats {
  const datetimes = extractDatetimes(rawValues, rules);
  const missingness = calculateMissingness(rawValues.length, datetimes.length);

  if (datetimes.length === 0) {
    return {
      kind: "datetime",
      minDate: null,
      maxDate: null,
      uniqueCount: 0,
      ...missingness,
    };
  }

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const datetime of datetimes) {
    const instant = datetime.instant.getTime();
    min = Math.min(min, instant);
    max = Math.max(max, instant);
  }

  return {
    kind: "datetime",
    minDate: new Date(min),
    maxDate: new Date(max),
    uniqueCount: new Set(datetimes.map(instantKey)).size,
    ...missingness,
  };
}
