import { AjvSchemaEngine } from '../engine/ajv-engine.js';
import type {
  CompiledSchema,
  NativeFailure,
  SchemaEngine,
} from '../engine/types.js';
import {
  createValidationFailure,
  scrubFailure,
} from '../errors/validation-failure.js';
import {
  RESOURCE_DEFINITION_SCHEMA_URI,
  createDefaultRegistry,
  type MetaSchemaRegistry,
} from '../registry/meta-schema-registry.js';
import { createHttpSchemaFetcher } from '../resolver/http-fetcher.js';
import { ValidationError, type ValidationErrorKind } from '../types/errors.js';
import {
  resolveValidatorOptions,
  type ResolvedValidatorOptions,
  type ValidatorOptions,
} from '../types/options.js';
import { err, ok, type Result } from '../types/result.js';
import { cloneJson, isJsonObject, type JsonObject } from '../types/schema.js';
import { createConsoleLogger, type Logger } from '../util/logger.js';
import type { MetricPhase } from '../util/metrics.js';

export interface ValidatorDependencies {
  /** Defaults to the bundled registry */
  registry?: MetaSchemaRegistry;
  /** Defaults to an Ajv engine over the registry */
  engine?: SchemaEngine;
}

const LOADED = Symbol('loaded-definition');

/**
 * A definition that passed both load steps. Only `Validator` can create
 * one, so metadata extraction never sees an unchecked document.
 */
export class LoadedDefinition implements CompiledSchema {
  constructor(
    _token: typeof LOADED,
    private readonly compiled: CompiledSchema
  ) {}

  get document(): JsonObject {
    return this.compiled.document;
  }

  validate(instance: unknown): NativeFailure | null {
    return this.compiled.validate(instance);
  }

  definesProperty(name: string): boolean {
    return this.compiled.definesProperty(name);
  }
}

function compileFailure(failure: NativeFailure): ValidationError {
  return new ValidationError({
    kind: 'reference',
    failure: createValidationFailure(
      failure.message,
      failure.keyword,
      failure.pointer
    ),
  });
}

function instanceFailure(
  kind: ValidationErrorKind,
  failure: NativeFailure
): ValidationError {
  return new ValidationError({ kind, failure: scrubFailure(failure) });
}

function notAnObject(kind: ValidationErrorKind): ValidationError {
  return ValidationError.of(
    kind,
    '#: expected type: object, found: non-object',
    'type',
    '#'
  );
}

/**
 * Validates resource definitions against the resource-definition
 * meta-schema and compiles them into schemas for instance validation.
 *
 * Construction assembles the registry once and throws ConfigError when a
 * bundled document is broken. Every operation afterwards reports failures
 * as Result values.
 */
export class Validator {
  readonly options: ResolvedValidatorOptions;
  readonly logger: Logger;
  readonly registry: MetaSchemaRegistry;
  private readonly engine: SchemaEngine;

  constructor(
    options: ValidatorOptions = {},
    dependencies: ValidatorDependencies = {}
  ) {
    this.options = resolveValidatorOptions(options);
    this.logger =
      this.options.logger ?? createConsoleLogger({ debug: this.options.debug });
    this.registry = dependencies.registry ?? createDefaultRegistry();
    this.engine =
      dependencies.engine ??
      new AjvSchemaEngine({
        registry: this.registry,
        fetcher:
          this.options.fetcher ?? createHttpSchemaFetcher(this.options.remote),
        validateFormats: this.options.validateFormats,
        allErrors: this.options.allErrors,
        logger: this.logger,
        metrics: this.options.metrics,
      });
  }

  /**
   * Check `instance` against `schema`. The schema is compiled in a fresh
   * context; reference failures come back with kind `reference`, instance
   * failures with kind `instance`, redacted.
   */
  async validateInstance(
    instance: unknown,
    schema: JsonObject
  ): Promise<Result<void, ValidationError>> {
    const compiled = await this.measure('REFERENCE_LOAD', () =>
      this.engine.compile(schema)
    );
    if (compiled.isErr()) return err(compileFailure(compiled.error));
    return this.checkInstance(compiled.value, instance);
  }

  /** Validate an instance against an already compiled schema. */
  checkInstance(
    compiled: CompiledSchema,
    instance: unknown
  ): Result<void, ValidationError> {
    const failure = this.measureSync('INSTANCE_VALIDATION', () =>
      compiled.validate(instance)
    );
    return failure ? err(instanceFailure('instance', failure)) : ok(undefined);
  }

  /** Both load steps without semantic extraction. */
  async validateDefinition(
    definition: unknown
  ): Promise<Result<void, ValidationError>> {
    const loaded = await this.loadDefinitionAsSchema(definition);
    return loaded.isOk() ? ok(undefined) : err(loaded.error);
  }

  /**
   * Stamp `$schema`, check the definition's shape (step 1), then compile it
   * as a schema so every `$ref` is resolved (step 2). A shape failure skips
   * step 2. The caller's document is not modified.
   */
  async loadDefinitionAsSchema(
    definition: unknown
  ): Promise<Result<LoadedDefinition, ValidationError>> {
    if (!isJsonObject(definition)) {
      this.options.metrics?.increment('definitionsRejected');
      return err(notAnObject('shape'));
    }
    const stamped = cloneJson(definition);
    stamped.$schema = RESOURCE_DEFINITION_SCHEMA_URI;

    const shape = await this.checkShape(stamped);
    if (shape.isErr()) {
      this.logger.debug(`definition rejected by shape check: ${shape.error.message}`);
      this.options.metrics?.increment('definitionsRejected');
      return err(shape.error);
    }

    const compiled = await this.measure('REFERENCE_LOAD', () =>
      this.engine.compile(stamped)
    );
    if (compiled.isErr()) {
      this.logger.debug(`definition failed to load: ${compiled.error.message}`);
      this.options.metrics?.increment('definitionsRejected');
      return err(compileFailure(compiled.error));
    }

    this.logger.debug('definition loaded');
    this.options.metrics?.increment('definitionsLoaded');
    return ok(new LoadedDefinition(LOADED, compiled.value));
  }

  private async checkShape(
    definition: JsonObject
  ): Promise<Result<void, ValidationError>> {
    const metaSchema = await this.measure('SHAPE_CHECK', () =>
      this.engine.compileRegistered(RESOURCE_DEFINITION_SCHEMA_URI)
    );
    if (metaSchema.isErr()) return err(compileFailure(metaSchema.error));

    const failure = this.measureSync('SHAPE_CHECK', () =>
      metaSchema.value.validate(definition)
    );
    return failure ? err(instanceFailure('shape', failure)) : ok(undefined);
  }

  private measure<T>(phase: MetricPhase, fn: () => Promise<T>): Promise<T> {
    const { metrics } = this.options;
    return metrics ? metrics.measure(phase, fn) : fn();
  }

  private measureSync<T>(phase: MetricPhase, fn: () => T): T {
    const { metrics } = this.options;
    return metrics ? metrics.measureSync(phase, fn) : fn();
  }
}
