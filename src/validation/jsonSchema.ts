import Ajv, { type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import runResultSchema from "../../schemas/run_result.schema.json";
import gateSummarySchema from "../../schemas/gate_summary.schema.json";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const ARTIFACT_SCHEMAS = {
  run_result: runResultSchema,
  gate_summary: gateSummarySchema
};

export type ArtifactSchemaName = keyof typeof ARTIFACT_SCHEMAS;

const validatorCache = new Map<ArtifactSchemaName, ValidateFunction>();

export function getSchemaValidator(name: ArtifactSchemaName): ValidateFunction {
  const cached = validatorCache.get(name);
  if (cached) return cached;
  const validator = ajv.compile(ARTIFACT_SCHEMAS[name]);
  validatorCache.set(name, validator);
  return validator;
}

export function schemaErrors(validator: ValidateFunction, data: unknown): string[] {
  if (validator(data)) return [];
  return (validator.errors ?? []).map((error) => `${error.instancePath || "<root>"} ${error.message}`);
}

export function assertValidSchema(
  validator: ValidateFunction,
  data: unknown,
  label: string
): void {
  const errors = schemaErrors(validator, data);
  if (errors.length === 0) return;
  throw new Error(`${label} failed schema validation: ${errors.join("; ")}`);
}
