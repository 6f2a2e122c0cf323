// Validation for documents accepted over HTTP and read back from Redis.
// JSON Schemas live in the service-level schemas directory (resolveJsonModule).
import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import conditionSchema from "../../schemas/condition.schema.json";
import taskRunSchema from "../../schemas/taskrun.schema.json";
import podSchema from "../../schemas/pod.schema.json";
import logAppendSchema from "../../schemas/log-append.schema.json";
import type { Pod, TaskRun } from "../types";

export interface LogAppend {
  lines: string[];
  end?: boolean;
}

const ajv = new Ajv({ strict: false, allErrors: true, allowUnionTypes: true });
ajv.addSchema(conditionSchema);

const validateTaskRunFn: ValidateFunction<TaskRun> = ajv.compile<TaskRun>(taskRunSchema);
const validatePodFn: ValidateFunction<Pod> = ajv.compile<Pod>(podSchema);
const validateLogAppendFn: ValidateFunction<LogAppend> = ajv.compile<LogAppend>(logAppendSchema);

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) return [];
  return errors.map((e) => {
    const path = e.instancePath.length ? e.instancePath : "(root)";
    const message = e.message ?? JSON.stringify(e);
    return `${path} ${message}`.trim();
  });
}

function check<T>(fn: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (fn(data)) {
    return { valid: true, value: data };
  }
  return { valid: false, errors: formatErrors(fn.errors) };
}

export { ajv };

export function validateTaskRun(data: unknown): ValidationResult<TaskRun> {
  return check(validateTaskRunFn, data);
}

export function validatePod(data: unknown): ValidationResult<Pod> {
  return check(validatePodFn, data);
}

export function validateLogAppend(data: unknown): ValidationResult<LogAppend> {
  return check(validateLogAppendFn, data);
}

/**
 * Parses a stored JSON document. Invalid JSON or a document that does not
 * match the schema is treated as missing.
 */
export function parseStored<T>(raw: string | null, validate: (data: unknown) => ValidationResult<T>): T | null {
  if (!raw) return null;
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = validate(data);
  return result.valid ? result.value : null;
}
