/**
 * JSON Schema validation (ajv). Used for tool arguments and for configuration.
 */

import AjvImport, { type ErrorObject } from "ajv";
import type { JsonSchema } from "./types.js";

interface AjvValidateFunction {
  (data: unknown): boolean;
  errors?: ErrorObject[] | null;
}

interface AjvInstance {
  compile(schema: JsonSchema): AjvValidateFunction;
}

type AjvOptions = { allErrors?: boolean };

// ajv ships CommonJS; depending on the loader the class is the module itself or its `default`.
const AjvConstructor = (
  typeof AjvImport === "function"
    ? AjvImport
    : (
        AjvImport as unknown as {
          default: new (opts?: AjvOptions) => AjvInstance;
        }
      ).default
) as new (opts?: AjvOptions) => AjvInstance;

const ajv = new AjvConstructor({ allErrors: true });

interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export type Validator = (data: unknown) => ValidationResult;

/** `label` maps an instance path ("/0", "/logLevel") to the subject of the message. */
export function formatAjvErrors(
  errors: ErrorObject[] | null | undefined,
  label: (instancePath: string) => string = (path) => path || "/"
): string[] {
  if (!errors || errors.length === 0) {
    return [];
  }
  return errors.map((e) => `${label(e.instancePath)} ${e.message ?? e.keyword}`);
}

export function compileValidator(
  schema: JsonSchema,
  label?: (instancePath: string) => string
): Validator {
  const validate = ajv.compile(schema);
  return (data: unknown) => {
    if (validate(data)) {
      return { valid: true };
    }
    return { valid: false, errors: formatAjvErrors(validate.errors, label) };
  };
}
