/**
 * Row selection strategies
 */

import { Faker, en, faker } from "@faker-js/faker";
import { logger } from "../../utils/logger.js";
import { toNumericSeed } from "../../utils/seed-manager.js";
import type { SampleOptions, SamplingMode } from "./types.js";

export interface SamplingStrategy {
  name: SamplingMode;
  /**
   * Pick row indices, returned in ascending (original) order
   */
  selectIndices(rowCount: number, size: number, options?: SampleOptions): number[];
}

/**
 * First-N sampling (rows in source order)
 */
export class HeadSamplingStrategy implements SamplingStrategy {
  name = "head" as const;

  selectIndices(rowCount: number, size: number): number[] {
    logger.debug("Executing head sampling strategy", { rowCount, size });
    return Array.from({ length: Math.min(size, rowCount) }, (_, index) => index);
  }
}

/**
 * Random sampling without replacement. Uses the process-wide faker instance
 * unless a seed is given, in which case a dedicated seeded instance is used.
 */
export class RandomSamplingStrategy implements SamplingStrategy {
  name = "random" as const;

  selectIndices(rowCount: number, size: number, options: SampleOptions = {}): number[] {
    logger.debug("Executing random sampling strategy", {
      rowCount,
      size,
      seeded: options.seed !== undefined,
    });

    const indices = Array.from({ length: rowCount }, (_, index) => index);
    const count = Math.min(size, rowCount);
    if (count === rowCount) {
      return indices;
    }

    const random = this.createRandomSource(options);
    return random.helpers.arrayElements(indices, count).sort((a, b) => a - b);
  }

  private createRandomSource(options: SampleOptions): Faker {
    if (options.seed === undefined) {
      return faker;
    }

    const seeded = new Faker({ locale: [en] });
    seeded.seed(toNumericSeed(options.seed));
    return seeded;
  }
}

export function getSamplingStrategy(mode: SamplingMode): SamplingStrategy {
  return mode === "random"
    ? new RandomSamplingStrategy()
    : new HeadSamplingStrategy();
}
