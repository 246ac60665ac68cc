/**
 * Configuration types for tabscope
 */

/**
 * Named regular expression, compiled with the given flags
 */
export interface NamedPattern {
  name: string;
  regex: string;
  flags?: string;
}

/**
 * Datetime format. The regex must use the named groups year, month and day,
 * and may use hour, minute, second, fraction and offset.
 */
export type DatetimeFormat = NamedPattern;

export interface BooleanLiterals {
  truthy: string[];
  falsy: string[];
}

/**
 * ProfilerConfig - Thresholds and limits shared by inference and statistics
 */
export interface ProfilerConfig {
  /** Column-name patterns that mark a candidate identifier */
  identifierNamePatterns: NamedPattern[];
  /** Unique/present ratio an identifier must exceed; also the UUID match share */
  idUniquenessThreshold: number;
  booleanLiterals: BooleanLiterals;
  datetimeFormats: DatetimeFormat[];
  /** Share of present values that must parse as dates (0-1) */
  datetimeParseThreshold: number;
  /** Share of present values that must parse as numbers (0-1) */
  numericParseThreshold: number;
  categoricalMaxUniqueCount: number;
  categoricalRatioThreshold: number;
  topValuesLimit: number;
  sampleValuesLimit: number;
}

const DATE = "(?<year>\\d{4})-(?<month>\\d{1,2})-(?<day>\\d{1,2})";
const TIME =
  "(?<hour>\\d{1,2}):(?<minute>\\d{2})(?::(?<second>\\d{2})(?:\\.(?<fraction>\\d{1,9}))?)?";
const OFFSET = "(?<offset>Z|[+-]\\d{2}:?\\d{2})?";

export const DEFAULT_PROFILER_CONFIG: ProfilerConfig = {
  identifierNamePatterns: [
    { name: "exact-id", regex: "^id$", flags: "i" },
    { name: "id-suffix", regex: "[_\\- ]id$", flags: "i" },
    { name: "id-prefix", regex: "^id[_\\- ]", flags: "i" },
    { name: "camel-id", regex: "[a-z0-9]I[Dd]$" },
    { name: "identifier", regex: "identifier", flags: "i" },
    { name: "uuid", regex: "uuid|guid", flags: "i" },
    { name: "key-suffix", regex: "key$", flags: "i" },
    { name: "code-suffix", regex: "code$", flags: "i" },
    { name: "primary-key", regex: "(^|_)pk$", flags: "i" },
  ],
  idUniquenessThreshold: 0.9,
  booleanLiterals: {
    truthy: ["true", "yes", "y", "t", "1", "on"],
    falsy: ["false", "no", "n", "f", "0", "off"],
  },
  datetimeFormats: [
    { name: "iso-datetime", regex: `^${DATE}[T ]${TIME}${OFFSET}$` },
    { name: "iso-date", regex: `^${DATE}$` },
    {
      name: "slash-ymd",
      regex:
        "^(?<year>\\d{4})/(?<month>\\d{1,2})/(?<day>\\d{1,2})(?: (?<hour>\\d{1,2}):(?<minute>\\d{2})(?::(?<second>\\d{2}))?)?$",
    },
    {
      name: "us-mdy",
      regex:
        "^(?<month>\\d{1,2})/(?<day>\\d{1,2})/(?<year>\\d{4})(?: (?<hour>\\d{1,2}):(?<minute>\\d{2})(?::(?<second>\\d{2}))?)?$",
    },
  ],
  datetimeParseThreshold: 1.0,
  numericParseThreshold: 1.0,
  categoricalMaxUniqueCount: 20,
  categoricalRatioThreshold: 0.5,
  topValuesLimit: 3,
  sampleValuesLimit: 5,
};
