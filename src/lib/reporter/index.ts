/**
 * Reporter module - assembles per-column profiles into an AnalysisReport
 */

import type { ProfilerConfig } from "../../types/config.js";
import type {
  AnalysisReport,
  CellValue,
  Column,
  ColumnProfile,
  Dataset,
  PresentValue,
} from "../../types/data-model.js";
import { createProfilerConfig } from "../../utils/config-loader.js";
import { isPresent } from "../../utils/cell-values.js";
import { logger } from "../../utils/logger.js";
import { TypeInferencer } from "../inferencer/index.js";
import { StatisticsComputer } from "../profiler/index.js";
import { calculateCompleteness } from "./completeness.js";
import type { ReporterOptions } from "./types.js";

export * from "./types.js";
export * from "./completeness.js";
export * from "./serializer.js";
export * from "./summary.js";

/**
 * First `limit` present values, in row order
 */
export function collectSampleValues(
  values: readonly CellValue[],
  limit: number,
): PresentValue[] {
  const samples: PresentValue[] = [];
  for (const value of values) {
    if (samples.length >= limit) break;
    if (isPresent(value)) {
      samples.push(value);
    }
  }
  return samples;
}

/**
 * Main report assembler. Holds the compiled config so every column of a run
 * is classified and summarized with the same rules.
 */
export class ReportAssembler {
  private config: ProfilerConfig;
  private inferencer: TypeInferencer;
  private statistics: StatisticsComputer;
  private now: () => Date;

  constructor(config: ProfilerConfig = createProfilerConfig(), options: ReporterOptions = {}) {
    this.config = config;
    this.inferencer = new TypeInferencer(config);
    this.statistics = new StatisticsComputer(this.inferencer.getRules());
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Classify and summarize one column
   */
  profileColumn(column: Column): ColumnProfile {
    const fieldType = this.inferencer.infer(column.name, column.values);
    const stats = this.statistics.compute(fieldType, column.values);

    let totalCount = 0;
    for (const value of column.values) {
      if (isPresent(value)) totalCount++;
    }

    return {
      name: column.name,
      fieldType,
      totalCount,
      stats,
      sampleValues: collectSampleValues(column.values, this.config.sampleValuesLimit),
    };
  }

  /**
   * Profile every column in source order and wrap the results in a report
   */
  assemble(dataset: Dataset): AnalysisReport {
    const startedAt = performance.now();
    const analysisTimestamp = this.now();

    logger.info("Analyzing dataset", {
      source: dataset.source.path,
      rows: dataset.rowCount,
      columns: dataset.columns.length,
    });

    const fields = dataset.columns.map((column) => this.profileColumn(column));
    const completenessPercentage = calculateCompleteness(fields);
    const processingTimeSeconds = (performance.now() - startedAt) / 1000;

    logger.info("Analysis complete", {
      columns: fields.length,
      completenessPercentage,
      processingTimeSeconds,
    });

    return {
      source: { ...dataset.source },
      totalRows: dataset.rowCount,
      totalColumns: dataset.columns.length,
      fields,
      analysisTimestamp,
      processingTimeSeconds,
      completenessPercentage,
    };
  }
}

/**
 * Analyze a dataset with the given (or default) config
 *
 * @example
 * const report = analyzeDataset(dataset, createProfilerConfig({ topValuesLimit: 5 }));
 */
export function analyzeDataset(
  dataset: Dataset,
  config: ProfilerConfig = createProfilerConfig(),
  options: ReporterOptions = {},
): AnalysisReport {
  return new ReportAssembler(config, options).assemble(dataset);
}
