import Ajv2020Module from "ajv/dist/2020.js";
import type { AnySchemaObject, ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";
import { readFileSync } from "node:fs";
import { join } from "node:path";

import { DEFAULT_CONTRACTS_DIR } from "../config.js";
import type { MboModelInputs } from "../types/inputs.js";

export const CONTRACT_SCHEMA_FILE = "mbo_model_v1.schema.json";

export type RequestValidation =
  | { valid: true; inputs: MboModelInputs; errors: [] }
  | { valid: false; errors: string[] };

// Both packages ship CommonJS; from ESM the class and plugin sit on `.default`
const Ajv2020 = Ajv2020Module.default;
const addFormats = addFormatsModule.default;

const validators = new Map<string, ValidateFunction<MboModelInputs>>();

function getValidator(contractsDir: string): ValidateFunction<MboModelInputs> {
  const cached = validators.get(contractsDir);
  if (cached) {
    return cached;
  }

  const schemaPath = join(contractsDir, CONTRACT_SCHEMA_FILE);
  const schema: AnySchemaObject = JSON.parse(readFileSync(schemaPath, "utf8"));

  const ajv = new Ajv2020({ strict: true, allErrors: true });
  addFormats(ajv);

  const validate = ajv.compile<MboModelInputs>(schema);
  validators.set(contractsDir, validate);
  return validate;
}

export function validateRequest(request: unknown, contractsDir = DEFAULT_CONTRACTS_DIR): RequestValidation {
  try {
    const validate = getValidator(contractsDir);
    if (validate(request)) {
      return { valid: true, inputs: request, errors: [] };
    }

    const errors = (validate.errors ?? []).map((error) => {
      const path = error.instancePath && error.instancePath.length > 0 ? error.instancePath : "/";
      const message = error.message ?? "invalid";
      return `${path}: ${message}`;
    });

    return { valid: false, errors };
  } catch (error) {
    return {
      valid: false,
      errors: [error instanceof Error ? error.message : "Validation failed"],
    };
  }
}
