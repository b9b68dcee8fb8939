// @resource-schema/core entry point
//
// - Validator: two-step definition loading (shape check, then reference
//   resolution) and instance validation with redacted failures.
// - ResourceTypeSchema / ResourceTagging: vendor metadata of a loaded
//   definition.
// - Pointer utilities, the error hierarchy and the failure taxonomy.

export { loadResourceDefinition, validateInstance } from './api.js';

export {
  Validator,
  type LoadedDefinition,
  type ValidatorDependencies,
} from './validator/validator.js';

export {
  ResourceTypeSchema,
  type ResourceTypeSchemaOptions,
} from './resource/resource-type-schema.js';
export {
  ResourceTagging,
  DEFAULT_TAG_PROPERTY,
  type ResourceTaggingSnapshot,
} from './resource/resource-tagging.js';
export {
  HANDLER_ACTIONS,
  REPLACEMENT_STRATEGIES,
  DEFAULT_REPLACEMENT_STRATEGY,
  type HandlerAction,
  type HandlerMetadata,
  type ReplacementStrategy,
} from './resource/residual-fields.js';

// Engine seam
export type {
  CompiledSchema,
  NativeFailure,
  SchemaEngine,
  SchemaFetcher,
} from './engine/types.js';
export { AjvSchemaEngine, type AjvEngineOptions } from './engine/ajv-engine.js';
export { buildFailureTree } from './engine/failure-tree.js';
export { createHttpSchemaFetcher } from './resolver/http-fetcher.js';

// Registry
export {
  MetaSchemaRegistry,
  registerMetaSchema,
  createDefaultRegistry,
  DRAFT_07_META_URI,
  RESOURCE_DEFINITION_SCHEMA_URI,
  type MetaSchemaEntry,
} from './registry/meta-schema-registry.js';

// Errors
export { ErrorCode, type Severity, getExitCode } from './errors/codes.js';
export {
  ResourceSchemaError,
  ValidationError,
  ConfigError,
  ParseError,
  isResourceSchemaError,
  type ErrorContext,
  type SerializedError,
  type UserError,
  type ValidationErrorKind,
} from './types/errors.js';
export {
  scrubFailure,
  buildFullFailureMessage,
  countViolations,
  SAFE_KEYWORDS,
  type ValidationFailure,
} from './errors/validation-failure.js';

// Pointers
export {
  parsePointer,
  formatPointer,
  resolvePointer,
  hasPointer,
  removePointer,
  stripPropertiesPrefix,
  type PointerLookup,
} from './util/json-pointer.js';

// Options, results, logging, metrics
export {
  DEFAULT_VALIDATOR_OPTIONS,
  resolveValidatorOptions,
  type ValidatorOptions,
  type ResolvedValidatorOptions,
  type RemoteOptions,
} from './types/options.js';
export { Ok, Err, ok, err, isOk, isErr, type Result } from './types/result.js';
export type { JsonValue, JsonObject, JsonArray } from './types/schema.js';
export {
  createConsoleLogger,
  silentLogger,
  type Logger,
} from './util/logger.js';
export {
  MetricsCollector,
  METRIC_PHASES,
  type MetricPhase,
  type MetricsSnapshot,
} from './util/metrics.js';
