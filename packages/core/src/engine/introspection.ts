import { isJsonObject, type JsonValue } from '../types/schema.js';

/**
 * Resolves a `$ref` value to its target sub-schema, or undefined when the
 * target is unknown.
 */
export type RefResolver = (ref: string) => JsonValue | undefined;

const COMBINATORS = ['allOf', 'anyOf', 'oneOf'] as const;

function matchesPattern(pattern: string, name: string): boolean {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern, 'u');
  } catch {
    // an uncompilable pattern declares nothing
    return false;
  }
  return regex.test(name);
}

function definesTokens(
  schema: JsonValue | undefined,
  tokens: readonly string[],
  resolveRef: RefResolver,
  visiting: ReadonlySet<string>
): boolean {
  if (!isJsonObject(schema) || tokens.length === 0) return false;
  const [head, ...rest] = tokens;

  const descend = (sub: JsonValue): boolean =>
    rest.length === 0 || definesTokens(sub, rest, resolveRef, visiting);

  const ref = schema.$ref;
  if (typeof ref === 'string' && !visiting.has(ref)) {
    const target = resolveRef(ref);
    const next = new Set(visiting).add(ref);
    if (definesTokens(target, tokens, resolveRef, next)) return true;
  }

  const properties = schema.properties;
  if (
    isJsonObject(properties) &&
    Object.prototype.hasOwnProperty.call(properties, head) &&
    descend(properties[head])
  ) {
    return true;
  }

  const patternProperties = schema.patternProperties;
  if (isJsonObject(patternProperties)) {
    for (const [pattern, sub] of Object.entries(patternProperties)) {
      if (matchesPattern(pattern, head) && descend(sub)) return true;
    }
  }

  for (const combinator of COMBINATORS) {
    const branches = schema[combinator];
    if (!Array.isArray(branches)) continue;
    for (const branch of branches) {
      if (definesTokens(branch, tokens, resolveRef, visiting)) return true;
    }
  }

  return false;
}

/**
 * Whether `schema` declares the property `name`. A `/`-separated name
 * (`Outer/Inner`) descends through nested property schemas; `properties`,
 * `patternProperties`, `$ref`s and every combinator branch are searched.
 * A combinator without any object branch simply yields false.
 */
export function definesProperty(
  schema: JsonValue,
  name: string,
  resolveRef: RefResolver
): boolean {
  const tokens = name
    .replace(/^#/, '')
    .replace(/^\//, '')
    .split('/')
    .filter((token) => token.length > 0);
  return definesTokens(schema, tokens, resolveRef, new Set());
}
