// Core re-exports for the tabscope type system
// This file provides a single import point for all project types

export * from "./data-model.js";
export * from "./config.js";
export * from "../lib/inferencer/types.js";
export * from "../lib/profiler/types.js";
export * from "../lib/sampler/types.js";
export * from "../lib/reporter/types.js";
