/**
 * Generic JSON document model and draft-07 keyword tables
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((entry) => typeof entry === 'string')
  );
}

/**
 * Deep copy of a JSON document; input definitions are cloned before the
 * loader stamps `$schema` so callers' objects are never mutated.
 */
export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

/**
 * Root keywords understood by a draft-07 validator. Anything else at the
 * root of a resource definition is a residual (vendor) property.
 */
export const DRAFT_07_KEYWORDS: ReadonlySet<string> = new Set([
  '$id',
  '$schema',
  '$ref',
  '$comment',
  'title',
  'description',
  'default',
  'readOnly',
  'writeOnly',
  'examples',
  'multipleOf',
  'maximum',
  'exclusiveMaximum',
  'minimum',
  'exclusiveMinimum',
  'maxLength',
  'minLength',
  'pattern',
  'additionalItems',
  'items',
  'maxItems',
  'minItems',
  'uniqueItems',
  'contains',
  'maxProperties',
  'minProperties',
  'required',
  'additionalProperties',
  'definitions',
  'properties',
  'patternProperties',
  'dependencies',
  'propertyNames',
  'const',
  'enum',
  'type',
  'format',
  'contentMediaType',
  'contentEncoding',
  'if',
  'then',
  'else',
  'allOf',
  'anyOf',
  'oneOf',
  'not',
]);

/**
 * The non-standard root keys of a schema document, as a fresh map.
 */
export function residualProperties(document: JsonObject): Map<string, JsonValue> {
  const residual = new Map<string, JsonValue>();
  for (const [key, value] of Object.entries(document)) {
    if (!DRAFT_07_KEYWORDS.has(key)) residual.set(key, value);
  }
  return residual;
}
