/**
 * Identifier detection by column name and value shape
 */

import type { NamedPattern } from "../../types/config.js";

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Compile configured name patterns. Stateful flags (g, y) are dropped so
 * that test() has no lastIndex side effects.
 */
export function compileIdentifierPatterns(patterns: NamedPattern[]): RegExp[] {
  return patterns.map(
    (pattern) =>
      new RegExp(pattern.regex, (pattern.flags ?? "").replace(/[gy]/g, "")),
  );
}

/**
 * Check whether a column name looks like a key column
 *
 * @example
 * matchesIdentifierName("customer_id", compileIdentifierPatterns(patterns))
 * // Returns: true
 */
export function matchesIdentifierName(
  columnName: string,
  patterns: RegExp[],
): boolean {
  const name = columnName.trim();
  return patterns.some((pattern) => pattern.test(name));
}

/**
 * 8-4-4-4-12 hex grouping, any version
 */
export function isUuid(text: string): boolean {
  return UUID_PATTERN.test(text.trim());
}
