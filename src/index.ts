/**
 * tabscope: column type inference and descriptive statistics for
 * in-memory tabular datasets
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/dataset/index.js";
export * from "./lib/inferencer/index.js";
export * from "./lib/profiler/index.js";
export * from "./lib/sampler/index.js";
export * from "./lib/reporter/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
export * from "./utils/cell-values.js";
export * from "./utils/datetime.js";
export * from "./utils/frequency-map.js";
export * from "./utils/seed-manager.js";
