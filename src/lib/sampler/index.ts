/**
 * Sampler module - picks a few raw rows of a dataset for display
 */

import type { Dataset } from "../../types/data-model.js";
import { ValidationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { getSamplingStrategy } from "./strategies.js";
import type {
  SampleOptions,
  SampleResult,
  SamplingMode,
} from "./types.js";

export * from "./types.js";
export * from "./strategies.js";

/**
 * Select up to `size` rows. Rows keep their original relative order and
 * carry the source values verbatim.
 *
 * @throws ValidationError if size is not a non-negative integer
 */
export function selectSample(
  dataset: Dataset,
  size: number,
  mode: SamplingMode = "head",
  options: SampleOptions = {},
): SampleResult {
  if (!Number.isInteger(size) || size < 0) {
    throw new ValidationError(`Sample size must be a non-negative integer, got ${size}`, {
      size,
    });
  }

  const strategy = getSamplingStrategy(mode);
  const indices = strategy.selectIndices(dataset.rowCount, size, options);

  const rows = indices.map((rowIndex) => ({
    rowIndex,
    values: dataset.columns.map((column) => column.values[rowIndex]),
  }));

  logger.debug("Sample selected", {
    mode,
    requested: size,
    returned: rows.length,
  });

  return {
    columns: dataset.columns.map((column) => column.name),
    rows,
    metadata: {
      mode,
      requested: size,
      returned: rows.length,
      ...(options.seed !== undefined ? { seed: options.seed } : {}),
    },
  };
}
