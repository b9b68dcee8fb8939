import { ResourceTypeSchema } from './resource/resource-type-schema.js';
import { ConfigError, type ValidationError } from './types/errors.js';
import type { ValidatorOptions } from './types/options.js';
import { err, ok, type Result } from './types/result.js';
import type { JsonObject } from './types/schema.js';
import { Validator } from './validator/validator.js';

// Facades for one-off calls. Long-lived callers should build one Validator
// and reuse it: construction reads and registers the bundled meta-schemas.

function obtainValidator(
  source: Validator | ValidatorOptions | undefined
): Result<Validator, ConfigError> {
  if (source instanceof Validator) return ok(source);
  try {
    return ok(new Validator(source));
  } catch (error) {
    if (error instanceof ConfigError) return err(error);
    throw error;
  }
}

/**
 * Validate a resource definition, load it as a schema and extract its
 * metadata.
 */
export async function loadResourceDefinition(
  definition: unknown,
  validator?: Validator | ValidatorOptions
): Promise<Result<ResourceTypeSchema, ValidationError | ConfigError>> {
  const obtained = obtainValidator(validator);
  if (obtained.isErr()) return obtained;
  return ResourceTypeSchema.load(definition, obtained.value);
}

/**
 * Validate an instance document against a schema; failures are redacted.
 */
export async function validateInstance(
  instance: unknown,
  schema: JsonObject,
  validator?: Validator | ValidatorOptions
): Promise<Result<void, ValidationError | ConfigError>> {
  const obtained = obtainValidator(validator);
  if (obtained.isErr()) return obtained;
  return obtained.value.validateInstance(instance, schema);
}
