/**
 * Compile a ProfilerConfig into the regexes and lookup sets both the
 * inferencer and the profiler use
 */

import type { ProfilerConfig } from "../../types/config.js";
import { compileDatetimeFormats } from "../../utils/datetime.js";
import { compileIdentifierPatterns } from "./identifier-patterns.js";
import type { CompiledRules } from "./types.js";

function normalizeLiterals(literals: string[]): Set<string> {
  return new Set(literals.map((literal) => literal.trim().toLowerCase()));
}

export function compileRules(config: ProfilerConfig): CompiledRules {
  return {
    config,
    identifierPatterns: compileIdentifierPatterns(config.identifierNamePatterns),
    datetimeFormats: compileDatetimeFormats(config.datetimeFormats),
    truthyLiterals: normalizeLiterals(config.booleanLiterals.truthy),
    falsyLiterals: normalizeLiterals(config.booleanLiterals.falsy),
  };
}
