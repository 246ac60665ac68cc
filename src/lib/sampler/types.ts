/**
 * Sampler module types
 */

import type { CellValue } from "../../types/data-model.js";
import type { Seed } from "../../utils/seed-manager.js";

export type SamplingMode = "head" | "random";

export interface SampleOptions {
  /** Makes random sampling reproducible */
  seed?: Seed;
}

/**
 * One sampled row: raw cell values in column order
 */
export interface SampleRow {
  rowIndex: number;
  values: CellValue[];
}

export interface SampleMetadata {
  mode: SamplingMode;
  requested: number;
  returned: number;
  seed?: Seed;
}

export interface SampleResult {
  columns: string[];
  rows: SampleRow[];
  metadata: SampleMetadata;
}
