import type { MissingnessStats } from "../../types/data-model.js";

/**
 * Missingness for a column where `usedCount` values took part in the stats.
 * Everything else (absent or unparseable) is missing.
 */
export function calculateMissingness(
  totalRows: number,
  usedCount: number,
): MissingnessStats {
  const missingCount = Math.max(0, totalRows - usedCount);
  return {
    missingCount,
    missingPercentage: totalRows > 0 ? (missingCount * 100) / totalRows : 0,
  };
}
