/**
 * Profiler module types
 */

import type { FieldStatsKind, FieldType } from "../../types/data-model.js";

/**
 * Which stats variant a field type produces. Boolean and identifier
 * columns are summarized like categorical ones.
 */
export const STATS_KIND_BY_FIELD_TYPE: Record<FieldType, FieldStatsKind> = {
  integer: "numerical",
  float: "numerical",
  boolean: "categorical",
  categorical: "categorical",
  identifier: "categorical",
  string: "string",
  datetime: "datetime",
};
