import type { CompiledSchema } from '../engine/types.js';
import { scrubFailure } from '../errors/validation-failure.js';
import { ValidationError } from '../types/errors.js';
import { DEFAULT_TIMEOUT_IN_MINUTES } from '../types/options.js';
import { err, ok, type Result } from '../types/result.js';
import {
  cloneJson,
  residualProperties,
  type JsonObject,
  type JsonValue,
} from '../types/schema.js';
import {
  hasPointer,
  removePointer,
  stripPropertiesPrefix,
} from '../util/json-pointer.js';
import { silentLogger, type Logger } from '../util/logger.js';
import type { MetricsCollector } from '../util/metrics.js';
import type {
  LoadedDefinition,
  Validator,
} from '../validator/validator.js';
import {
  RESIDUAL_FIELDS,
  emptyMetadata,
  type ExtractedMetadata,
  type HandlerAction,
  type HandlerMetadata,
  type ReplacementStrategy,
} from './residual-fields.js';
import { ResourceTagging } from './resource-tagging.js';

export interface ResourceTypeSchemaOptions {
  /** Handler timeout when a handler declares none (default: 120) */
  defaultTimeoutInMinutes?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
}

function semanticError(
  message: string,
  keyword: string | null,
  pointer: string
): ValidationError {
  return ValidationError.of('semantic', message, keyword, pointer);
}

function copyHandler(handler: HandlerMetadata): HandlerMetadata {
  const { permissions, timeoutInMinutes, handlerSchema } = handler;
  return {
    permissions: [...permissions],
    timeoutInMinutes,
    ...(handlerSchema ? { handlerSchema: cloneJson(handlerSchema) } : {}),
  };
}

function resolveTagging(
  metadata: ExtractedMetadata,
  compiled: CompiledSchema
): Result<ResourceTagging, ValidationError> {
  const { legacyTaggable, tagging } = metadata;
  if (legacyTaggable !== undefined && tagging !== undefined) {
    return err(
      semanticError(
        'More than one configuration found for taggable value.',
        'taggable',
        '#/taggable'
      )
    );
  }
  if (tagging !== undefined) {
    const parsed = ResourceTagging.fromConfig(tagging);
    if (parsed.isErr()) return parsed;
    const checked = parsed.value.validateTaggingMetadata(
      metadata.handlers.has('update'),
      (name) => compiled.definesProperty(name)
    );
    return checked.isErr() ? err(checked.error) : parsed;
  }
  if (legacyTaggable !== undefined) {
    return ok(new ResourceTagging(legacyTaggable));
  }
  return ok(ResourceTagging.defaults());
}

/**
 * A loaded resource type definition: the compiled schema plus the vendor
 * metadata extracted from its residual properties.
 */
export class ResourceTypeSchema {
  private constructor(
    private readonly compiled: CompiledSchema,
    private readonly metadata: ExtractedMetadata,
    private readonly tagging: ResourceTagging,
    private readonly unprocessed: ReadonlyMap<string, JsonValue>
  ) {}

  /**
   * Extract metadata from a definition loaded by `Validator`. Each
   * recognized residual key is consumed once; what remains is kept as
   * unprocessed properties.
   */
  static fromCompiled(
    compiled: LoadedDefinition,
    options: ResourceTypeSchemaOptions = {}
  ): Result<ResourceTypeSchema, ValidationError> {
    const extract = (): Result<ResourceTypeSchema, ValidationError> =>
      ResourceTypeSchema.extract(compiled, options);
    return options.metrics
      ? options.metrics.measureSync('EXTRACTION', extract)
      : extract();
  }

  /**
   * Validate, load and extract a definition in one step.
   */
  static async load(
    definition: unknown,
    validator: Validator
  ): Promise<Result<ResourceTypeSchema, ValidationError>> {
    const loaded = await validator.loadDefinitionAsSchema(definition);
    if (loaded.isErr()) return loaded;
    return ResourceTypeSchema.fromCompiled(loaded.value, {
      defaultTimeoutInMinutes: validator.options.defaultTimeoutInMinutes,
      logger: validator.logger,
      metrics: validator.options.metrics,
    });
  }

  private static extract(
    compiled: CompiledSchema,
    options: ResourceTypeSchemaOptions
  ): Result<ResourceTypeSchema, ValidationError> {
    const logger = options.logger ?? silentLogger;
    const context = {
      defaultTimeoutInMinutes:
        options.defaultTimeoutInMinutes ?? DEFAULT_TIMEOUT_IN_MINUTES,
    };
    const residual = residualProperties(compiled.document);
    const metadata = emptyMetadata();

    for (const field of RESIDUAL_FIELDS) {
      if (!residual.has(field.key)) continue;
      const value = residual.get(field.key);
      if (value === undefined || !field.consume(metadata, value, context)) {
        return err(
          semanticError(
            `Invalid ${field.key} value: expected ${field.expected}`,
            field.key,
            `#/${field.key}`
          )
        );
      }
      residual.delete(field.key);
    }

    if (metadata.typeName === undefined) {
      return err(
        semanticError('#: required key [typeName] not found', 'required', '#')
      );
    }

    const tagging = resolveTagging(metadata, compiled);
    if (tagging.isErr()) return tagging;

    if (residual.size > 0) {
      logger.warn(
        `${metadata.typeName} carries unprocessed properties: ${[...residual.keys()].join(', ')}`
      );
    }
    return ok(
      new ResourceTypeSchema(compiled, metadata, tagging.value, residual)
    );
  }

  getTypeName(): string {
    return this.metadata.typeName ?? '';
  }

  getDescription(): string | undefined {
    const { description } = this.compiled.document;
    return typeof description === 'string' ? description : undefined;
  }

  getSourceUrl(): string | undefined {
    return this.metadata.sourceUrl;
  }

  getDocumentationUrl(): string | undefined {
    return this.metadata.documentationUrl;
  }

  getSchemaUri(): string | undefined {
    const { $schema } = this.compiled.document;
    return typeof $schema === 'string' ? $schema : undefined;
  }

  getReplacementStrategy(): ReplacementStrategy {
    return this.metadata.replacementStrategy;
  }

  getCreateOnlyPropertiesAsStrings(): string[] {
    return [...this.metadata.createOnlyProperties];
  }

  getConditionalCreateOnlyPropertiesAsStrings(): string[] {
    return [...this.metadata.conditionalCreateOnlyProperties];
  }

  getDeprecatedPropertiesAsStrings(): string[] {
    return [...this.metadata.deprecatedProperties];
  }

  getPrimaryIdentifierAsStrings(): string[] {
    return [...this.metadata.primaryIdentifier];
  }

  getAdditionalIdentifiersAsStrings(): string[][] {
    return this.metadata.additionalIdentifiers.map((identifier) => [
      ...identifier,
    ]);
  }

  getReadOnlyPropertiesAsStrings(): string[] {
    return [...this.metadata.readOnlyProperties];
  }

  getWriteOnlyPropertiesAsStrings(): string[] {
    return [...this.metadata.writeOnlyProperties];
  }

  getNonPublicPropertiesAsStrings(): string[] {
    return [...this.metadata.nonPublicProperties];
  }

  getPropertyTransform(): Record<string, string> {
    return { ...this.metadata.propertyTransform };
  }

  getHandlers(): ReadonlyMap<HandlerAction, HandlerMetadata> {
    const handlers = new Map<HandlerAction, HandlerMetadata>();
    for (const [action, handler] of this.metadata.handlers) {
      handlers.set(action, copyHandler(handler));
    }
    return handlers;
  }

  getHandler(action: HandlerAction): HandlerMetadata | undefined {
    const handler = this.metadata.handlers.get(action);
    return handler ? copyHandler(handler) : undefined;
  }

  hasHandler(action: HandlerAction): boolean {
    return this.metadata.handlers.has(action);
  }

  getTagging(): ResourceTagging {
    return this.tagging.clone();
  }

  isTaggable(): boolean {
    return this.tagging.taggable;
  }

  getTypeConfiguration(): JsonObject | undefined {
    const { typeConfiguration } = this.metadata;
    return typeConfiguration ? cloneJson(typeConfiguration) : undefined;
  }

  getUnprocessedProperties(): ReadonlyMap<string, JsonValue> {
    return new Map(this.unprocessed);
  }

  getDocument(): JsonObject {
    return cloneJson(this.compiled.document);
  }

  definesProperty(name: string): boolean {
    return this.compiled.definesProperty(name);
  }

  /**
   * Strip every write-only property from `instance` in place. Pointers are
   * schema-rooted; the first `/properties` segment is dropped to address
   * the instance. Absent properties are ignored.
   */
  removeWriteOnlyProperties(instance: JsonValue): void {
    for (const pointer of this.metadata.writeOnlyProperties) {
      removePointer(instance, stripPropertiesPrefix(pointer));
    }
  }

  hasWriteOnlyProperties(instance: JsonValue): boolean {
    return this.metadata.writeOnlyProperties.some((pointer) =>
      hasPointer(instance, stripPropertiesPrefix(pointer))
    );
  }

  /** Whether an instance-rooted pointer resolves to a non-null value. */
  hasProperty(pointer: string, instance: JsonValue): boolean {
    return hasPointer(instance, pointer);
  }

  validateInstance(instance: unknown): Result<void, ValidationError> {
    const failure = this.compiled.validate(instance);
    if (!failure) return ok(undefined);
    return err(
      new ValidationError({ kind: 'instance', failure: scrubFailure(failure) })
    );
  }
}
