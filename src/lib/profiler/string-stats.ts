/**
 * Length and cardinality statistics for free-text columns
 */

import type { CellValue, StringStats } from "../../types/data-model.js";
import { collectPresent, textLength, toText } from "../../utils/cell-values.js";
import { calculateMissingness } from "./missingness.js";

export function calculateStringStats(
  rawValues: readonly CellValue[],
): StringStats {
  const texts = collectPresent(rawValues).map(toText);
  const missingness = calculateMissingness(rawValues.length, texts.length);

  if (texts.length === 0) {
    return {
      kind: "string",
      minLength: null,
      maxLength: null,
      avgLength: null,
      uniqueCount: 0,
      ...missingness,
    };
  }

  let minLength = Number.POSITIVE_INFINITY;
  let maxLength = 0;
  let totalLength = 0;

  for (const text of texts) {
    const length = textLength(text);
    minLength = Math.min(minLength, length);
    maxLength = Math.max(maxLength, length);
    totalLength += length;
  }

  return {
    kind: "string",
    minLength,
    maxLength,
    avgLength: totalLength / texts.length,
    uniqueCount: new Set(texts).size,
    ...missingness,
  };
}
