import {
  isJsonObject,
  isStringArray,
  type JsonObject,
  type JsonValue,
} from '../types/schema.js';
import { parsePointer } from '../util/json-pointer.js';

export const HANDLER_ACTIONS = [
  'create',
  'read',
  'update',
  'delete',
  'list',
] as const;

export type HandlerAction = (typeof HANDLER_ACTIONS)[number];

export const REPLACEMENT_STRATEGIES = [
  'create_then_delete',
  'delete_then_create',
] as const;

export type ReplacementStrategy = (typeof REPLACEMENT_STRATEGIES)[number];

export const DEFAULT_REPLACEMENT_STRATEGY: ReplacementStrategy =
  'create_then_delete';

export interface HandlerMetadata {
  readonly permissions: readonly string[];
  readonly timeoutInMinutes: number;
  /** Input schema of the list handler */
  readonly handlerSchema?: JsonObject;
}

/**
 * Vendor metadata pulled out of a definition's residual properties.
 */
export interface ExtractedMetadata {
  sourceUrl?: string;
  documentationUrl?: string;
  typeName?: string;
  replacementStrategy: ReplacementStrategy;
  createOnlyProperties: string[];
  conditionalCreateOnlyProperties: string[];
  deprecatedProperties: string[];
  primaryIdentifier: string[];
  readOnlyProperties: string[];
  writeOnlyProperties: string[];
  nonPublicProperties: string[];
  additionalIdentifiers: string[][];
  propertyTransform: Record<string, string>;
  typeConfiguration?: JsonObject;
  handlers: Map<HandlerAction, HandlerMetadata>;
  legacyTaggable?: boolean;
  tagging?: JsonObject;
}

export interface ExtractionContext {
  defaultTimeoutInMinutes: number;
}

export function emptyMetadata(): ExtractedMetadata {
  return {
    replacementStrategy: DEFAULT_REPLACEMENT_STRATEGY,
    createOnlyProperties: [],
    conditionalCreateOnlyProperties: [],
    deprecatedProperties: [],
    primaryIdentifier: [],
    readOnlyProperties: [],
    writeOnlyProperties: [],
    nonPublicProperties: [],
    additionalIdentifiers: [],
    propertyTransform: {},
    handlers: new Map(),
  };
}

/**
 * One recognized residual key: a shape guard plus the setter that records
 * it. `consume` returns false when the value has the wrong shape.
 */
export interface ResidualField {
  readonly key: string;
  /** Human-readable shape, used in error messages */
  readonly expected: string;
  consume(
    metadata: ExtractedMetadata,
    value: JsonValue,
    context: ExtractionContext
  ): boolean;
}

function field<T extends JsonValue>(
  key: string,
  expected: string,
  guard: (value: JsonValue) => value is T,
  apply: (metadata: ExtractedMetadata, value: T, context: ExtractionContext) => void
): ResidualField {
  return {
    key,
    expected,
    consume(metadata, value, context) {
      if (!guard(value)) return false;
      apply(metadata, value, context);
      return true;
    },
  };
}

function isString(value: JsonValue): value is string {
  return typeof value === 'string';
}

function isBoolean(value: JsonValue): value is boolean {
  return typeof value === 'boolean';
}

function isObject(value: JsonValue): value is JsonObject {
  return isJsonObject(value);
}

function isPointerList(value: JsonValue): value is string[] {
  return (
    isStringArray(value) &&
    value.every((pointer) => parsePointer(pointer).isOk())
  );
}

function isPointerLists(value: JsonValue): value is string[][] {
  return Array.isArray(value) && value.every(isPointerList);
}

function isReplacementStrategy(value: JsonValue): value is ReplacementStrategy {
  return REPLACEMENT_STRATEGIES.some((strategy) => strategy === value);
}

function isHandlerAction(key: string): key is HandlerAction {
  return HANDLER_ACTIONS.some((action) => action === key);
}

function isStringMap(value: JsonValue): value is JsonObject {
  return (
    isJsonObject(value) &&
    Object.values(value).every((entry) => typeof entry === 'string')
  );
}

function isHandlerMap(value: JsonValue): value is JsonObject {
  return (
    isJsonObject(value) &&
    Object.entries(value).every(
      ([action, handler]) => isHandlerAction(action) && isJsonObject(handler)
    )
  );
}

function toHandlerMetadata(
  action: HandlerAction,
  handler: JsonObject,
  context: ExtractionContext
): HandlerMetadata {
  const { permissions, timeoutInMinutes, handlerSchema } = handler;
  return {
    permissions: isStringArray(permissions) ? [...permissions] : [],
    timeoutInMinutes:
      typeof timeoutInMinutes === 'number'
        ? timeoutInMinutes
        : context.defaultTimeoutInMinutes,
    ...(action === 'list' && isJsonObject(handlerSchema)
      ? { handlerSchema }
      : {}),
  };
}

type PointerListKey =
  | 'createOnlyProperties'
  | 'conditionalCreateOnlyProperties'
  | 'deprecatedProperties'
  | 'primaryIdentifier'
  | 'readOnlyProperties'
  | 'writeOnlyProperties'
  | 'nonPublicProperties';

function pointerList(key: PointerListKey): ResidualField {
  return field(key, 'a list of JSON pointers', isPointerList, (metadata, value) => {
    metadata[key] = [...value];
  });
}

/**
 * Every residual key the extractor understands, in extraction order. Keys
 * not listed here stay in the unprocessed map.
 */
export const RESIDUAL_FIELDS: readonly ResidualField[] = [
  field('sourceUrl', 'a string', isString, (metadata, value) => {
    metadata.sourceUrl = value;
  }),
  field('documentationUrl', 'a string', isString, (metadata, value) => {
    metadata.documentationUrl = value;
  }),
  field('typeName', 'a string', isString, (metadata, value) => {
    metadata.typeName = value;
  }),
  field(
    'replacementStrategy',
    `one of ${REPLACEMENT_STRATEGIES.join(', ')}`,
    isReplacementStrategy,
    (metadata, value) => {
      metadata.replacementStrategy = value;
    }
  ),
  pointerList('createOnlyProperties'),
  pointerList('conditionalCreateOnlyProperties'),
  pointerList('deprecatedProperties'),
  pointerList('primaryIdentifier'),
  pointerList('readOnlyProperties'),
  pointerList('writeOnlyProperties'),
  pointerList('nonPublicProperties'),
  field(
    'additionalIdentifiers',
    'a list of JSON pointer lists',
    isPointerLists,
    (metadata, value) => {
      metadata.additionalIdentifiers = value.map((identifier) => [...identifier]);
    }
  ),
  field(
    'propertyTransform',
    'a map of JSON pointers to expressions',
    isStringMap,
    (metadata, value) => {
      for (const [pointer, expression] of Object.entries(value)) {
        if (typeof expression === 'string') {
          metadata.propertyTransform[pointer] = expression;
        }
      }
    }
  ),
  field('typeConfiguration', 'an object', isObject, (metadata, value) => {
    metadata.typeConfiguration = value;
  }),
  field(
    'handlers',
    'a map of handler actions to handler definitions',
    isHandlerMap,
    (metadata, value, context) => {
      for (const [action, handler] of Object.entries(value)) {
        if (isHandlerAction(action) && isJsonObject(handler)) {
          metadata.handlers.set(
            action,
            toHandlerMetadata(action, handler, context)
          );
        }
      }
    }
  ),
  field('taggable', 'a boolean', isBoolean, (metadata, value) => {
    metadata.legacyTaggable = value;
  }),
  field('tagging', 'an object', isObject, (metadata, value) => {
    metadata.tagging = value;
  }),
];
