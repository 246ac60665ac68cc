/**
 * Value-level parsers used by type inference and statistics
 */

import type { PresentValue } from "../../types/data-model.js";
import type { CompiledRules } from "./types.js";

const NUMERIC_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export type BooleanLabel = "True" | "False";

/**
 * Parse a present value as a finite number. Booleans are never numbers;
 * strings must be plain decimal or exponent notation.
 */
export function parseNumeric(value: PresentValue): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "boolean") {
    return null;
  }

  const trimmed = value.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Lower-cased, trimmed text used to compare against boolean literals
 */
export function normalizeBooleanLiteral(value: PresentValue): string {
  return String(value).trim().toLowerCase();
}

/**
 * Map a value to its display label, or null if it is not a boolean literal
 */
export function toBooleanLabel(
  value: PresentValue,
  rules: CompiledRules,
): BooleanLabel | null {
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }

  const normalized = normalizeBooleanLiteral(value);
  if (rules.truthyLiterals.has(normalized)) {
    return "True";
  }
  if (rules.falsyLiterals.has(normalized)) {
    return "False";
  }
  return null;
}

/**
 * True when every value is a boolean literal and at most two distinct
 * normalized literals occur (so "yes", "no", "true" is rejected)
 */
export function isBooleanColumn(
  values: readonly PresentValue[],
  rules: CompiledRules,
): boolean {
  if (values.length === 0) {
    return false;
  }

  const seen = new Set<string>();
  for (const value of values) {
    if (toBooleanLabel(value, rules) === null) {
      return false;
    }
    seen.add(normalizeBooleanLiteral(value));
    if (seen.size > 2) {
      return false;
    }
  }
  return true;
}
