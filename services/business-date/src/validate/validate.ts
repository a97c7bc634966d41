import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import type { ScheduleRequestV0 } from "../runtime/types.js";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

interface AjvError {
  instancePath?: string;
  message?: string;
}

type AjvValidateFunction = ((data: unknown) => boolean) & {
  errors?: AjvError[] | null;
};

type AjvValidator = {
  compile: (schema: unknown) => AjvValidateFunction;
};

let compiled: AjvValidateFunction | null = null;

export const SCHEDULE_SCHEMA_PATH = join(
  dirname(fileURLToPath(import.meta.url)),
  "..",
  "..",
  "..",
  "..",
  "contracts",
  "schedule_request_v0.schema.json",
);

function getValidator(): AjvValidateFunction {
  if (compiled) {
    return compiled;
  }

  const schema: unknown = JSON.parse(readFileSync(SCHEDULE_SCHEMA_PATH, "utf8"));

  // ajv and ajv-formats are CommonJS; their default export types do not line up under NodeNext.
  const AjvConstructor = Ajv2020 as unknown as new (opts: Record<string, unknown>) => AjvValidator;
  const ajv = new AjvConstructor({ strict: true, allErrors: true });
  const addFormatsPlugin = addFormats as unknown as (instance: AjvValidator) => void;
  addFormatsPlugin(ajv);

  compiled = ajv.compile(schema);
  return compiled;
}

function formatErrors(errors: AjvError[] | null | undefined): string[] {
  return (errors ?? []).map((error) => {
    const path = error.instancePath && error.instancePath.length > 0 ? error.instancePath : "/";
    return `${path}: ${error.message ?? "invalid"}`;
  });
}

export function isScheduleRequest(request: unknown): request is ScheduleRequestV0 {
  return getValidator()(request);
}

export function validateRequest(request: unknown): ValidationResult {
  try {
    const validate = getValidator();
    if (validate(request)) {
      return { valid: true, errors: [] };
    }
    return { valid: false, errors: formatErrors(validate.errors) };
  } catch (error) {
    return {
      valid: false,
      errors: [error instanceof Error ? error.message : "Validation failed"],
    };
  }
}
