/**
 * Configuration loader for profiler thresholds
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import {
  DEFAULT_PROFILER_CONFIG,
  type NamedPattern,
  type ProfilerConfig,
} from "../types/config.js";
import { ConfigError, FileIOError } from "./errors.js";
import { compileSchema, formatSchemaErrors } from "./schema-registry.js";
import type { ValidateFunction } from "ajv";
import { logger } from "./logger.js";

export type ProfilerConfigOverrides = Partial<ProfilerConfig>;

const RATIO_FIELDS = [
  "idUniquenessThreshold",
  "datetimeParseThreshold",
  "numericParseThreshold",
  "categoricalRatioThreshold",
] as const;

const COUNT_FIELDS = [
  "categoricalMaxUniqueCount",
  "topValuesLimit",
  "sampleValuesLimit",
] as const;

const REQUIRED_DATE_GROUPS = ["year", "month", "day"];

let configFileValidator: ValidateFunction<ProfilerConfigOverrides> | undefined;

function getConfigFileValidator(): ValidateFunction<ProfilerConfigOverrides> {
  configFileValidator ??= compileSchema<ProfilerConfigOverrides>("profiler-config");
  return configFileValidator;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Build an immutable config from overrides, an optional parsed config file
 * section, and the defaults
 *
 * @throws ConfigError if any threshold or pattern is invalid
 *
 * @example
 * const config = createProfilerConfig({ topValuesLimit: 10 });
 */
export function createProfilerConfig(
  overrides: ProfilerConfigOverrides = {},
  fileConfig: ProfilerConfigOverrides = {},
): ProfilerConfig {
  const defaults = DEFAULT_PROFILER_CONFIG;

  // Precedence: overrides > config file > defaults
  const config: ProfilerConfig = structuredClone({
    identifierNamePatterns:
      overrides.identifierNamePatterns ??
      fileConfig.identifierNamePatterns ??
      defaults.identifierNamePatterns,
    idUniquenessThreshold:
      overrides.idUniquenessThreshold ??
      fileConfig.idUniquenessThreshold ??
      defaults.idUniquenessThreshold,
    booleanLiterals:
      overrides.booleanLiterals ??
      fileConfig.booleanLiterals ??
      defaults.booleanLiterals,
    datetimeFormats:
      overrides.datetimeFormats ??
      fileConfig.datetimeFormats ??
      defaults.datetimeFormats,
    datetimeParseThreshold:
      overrides.datetimeParseThreshold ??
      fileConfig.datetimeParseThreshold ??
      defaults.datetimeParseThreshold,
    numericParseThreshold:
      overrides.numericParseThreshold ??
      fileConfig.numericParseThreshold ??
      defaults.numericParseThreshold,
    categoricalMaxUniqueCount:
      overrides.categoricalMaxUniqueCount ??
      fileConfig.categoricalMaxUniqueCount ??
      defaults.categoricalMaxUniqueCount,
    categoricalRatioThreshold:
      overrides.categoricalRatioThreshold ??
      fileConfig.categoricalRatioThreshold ??
      defaults.categoricalRatioThreshold,
    topValuesLimit:
      overrides.topValuesLimit ??
      fileConfig.topValuesLimit ??
      defaults.topValuesLimit,
    sampleValuesLimit:
      overrides.sampleValuesLimit ??
      fileConfig.sampleValuesLimit ??
      defaults.sampleValuesLimit,
  });

  validateProfilerConfig(config);

  logger.debug("Profiler config created", {
    idUniquenessThreshold: config.idUniquenessThreshold,
    categoricalMaxUniqueCount: config.categoricalMaxUniqueCount,
    categoricalRatioThreshold: config.categoricalRatioThreshold,
    topValuesLimit: config.topValuesLimit,
  });

  return deepFreeze(config);
}

function validatePatterns(
  patterns: NamedPattern[],
  field: string,
  requiredGroups: string[] = [],
): void {
  const names = new Set<string>();

  for (const pattern of patterns) {
    if (names.has(pattern.name)) {
      throw new ConfigError(`Duplicate pattern name in ${field}: ${pattern.name}`);
    }
    names.add(pattern.name);

    try {
      new RegExp(pattern.regex, pattern.flags);
    } catch (error) {
      throw new ConfigError(
        `Invalid regex pattern for ${pattern.name}: ${pattern.regex}`,
        { field },
        { cause: error },
      );
    }

    const missingGroups = requiredGroups.filter(
      (group) => !pattern.regex.includes(`(?<${group}>`),
    );
    if (missingGroups.length > 0) {
      throw new ConfigError(
        `Pattern ${pattern.name} in ${field} is missing named groups: ${missingGroups.join(", ")}`,
      );
    }
  }
}

/**
 * Validate profiler configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateProfilerConfig(config: ProfilerConfig): void {
  for (const field of RATIO_FIELDS) {
    const value = config[field];
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new ConfigError(`${field} must be between 0.0 and 1.0, got ${value}`, {
        field,
        value,
      });
    }
  }

  for (const field of COUNT_FIELDS) {
    const value = config[field];
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigError(`${field} must be a non-negative integer, got ${value}`, {
        field,
        value,
      });
    }
  }

  const truthy = config.booleanLiterals.truthy.map((v) => v.trim().toLowerCase());
  const falsy = config.booleanLiterals.falsy.map((v) => v.trim().toLowerCase());
  if (truthy.length === 0 || falsy.length === 0) {
    throw new ConfigError("booleanLiterals needs at least one truthy and one falsy literal");
  }
  const overlap = truthy.filter((literal) => falsy.includes(literal));
  if (overlap.length > 0) {
    throw new ConfigError(
      `Boolean literals cannot be both truthy and falsy: ${overlap.join(", ")}`,
    );
  }

  validatePatterns(config.identifierNamePatterns, "identifierNamePatterns");
  validatePatterns(config.datetimeFormats, "datetimeFormats", REQUIRED_DATE_GROUPS);
}

/**
 * Parse configuration file content (JSON or YAML, chosen by extension)
 */
export function parseConfigFile(filePath: string): ProfilerConfigOverrides {
  logger.info("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  // An empty YAML document parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const validate = getConfigFileValidator();
  if (!validate(parsed)) {
    throw new ConfigError(`Invalid config file: ${filePath}`, {
      filePath,
      issues: formatSchemaErrors(validate.errors),
    });
  }

  logger.info("Configuration file parsed successfully", {
    keys: Object.keys(parsed),
  });

  return parsed;
}

/**
 * Load profiler config from a file
 * Precedence: overrides > config file > defaults
 */
export function loadProfilerConfig(
  filePath: string,
  overrides: ProfilerConfigOverrides = {},
): ProfilerConfig {
  return createProfilerConfig(overrides, parseConfigFile(filePath));
}
