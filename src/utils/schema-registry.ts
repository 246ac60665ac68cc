/**
 * JSON Schema validation using Ajv
 * Schemas live in the package's schemas/ directory
 */

import { readFileSync } from "fs";
import AjvModule from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import { logger } from "./logger.js";

// ajv ships CommonJS; under NodeNext the class sits on the default export
const Ajv = AjvModule.default;

export type SchemaName = "analysis-report" | "profiler-config";

export interface SchemaIssue {
  path: string;
  message: string;
}

const ajv = new Ajv({
  allErrors: true, // Collect all validation errors
  strict: false, // Nullable fields use type unions
});

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function loadSchema(name: SchemaName): SchemaObject {
  const url = new URL(`../../schemas/${name}.schema.json`, import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(url, "utf-8"));
  if (!isSchemaObject(parsed)) {
    throw new Error(`Schema ${name} is not a JSON object`);
  }
  return parsed;
}

/**
 * Compile a bundled schema into a type guard for T.
 * Callers cache the result; compiling is comparatively slow.
 */
export function compileSchema<T>(name: SchemaName): ValidateFunction<T> {
  const validate = ajv.compile<T>(loadSchema(name));
  logger.debug("Schema compiled", { schema: name });
  return validate;
}

/**
 * Map Ajv errors to path/message pairs
 */
export function formatSchemaErrors(
  errors: ErrorObject[] | null | undefined,
): SchemaIssue[] {
  if (!errors) {
    return [];
  }

  return errors.map((error) => {
    // For missing required properties, Ajv includes the field name in params
    const path =
      error.keyword === "required" && "missingProperty" in error.params
        ? `${error.instancePath}/${String(error.params.missingProperty)}`
        : error.instancePath || "/";

    return {
      path,
      message: `${error.message ?? "is invalid"} (keyword: ${error.keyword})`,
    };
  });
}
