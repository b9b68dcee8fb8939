import { err, ok, type Result } from '../types/result.js';
import type { JsonValue } from '../types/schema.js';

/**
 * Outcome of resolving a pointer. Absence is a value, not an exception:
 * callers removing or probing optional properties branch on `found`.
 */
export type PointerLookup =
  | { found: true; value: JsonValue }
  | { found: false };

const NOT_FOUND: PointerLookup = { found: false };

const ARRAY_INDEX = /^(0|[1-9][0-9]*)$/;

export function escapePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function unescapePointerToken(token: string): string {
  return token.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Parse `""`, `/a/b`, `#` or `#/a/b` into reference tokens.
 */
export function parsePointer(pointer: string): Result<string[], string> {
  const body = pointer.startsWith('#') ? pointer.slice(1) : pointer;
  if (body === '') return ok([]);
  if (!body.startsWith('/')) {
    return err(`JSON Pointer must be '' or start with '/': ${pointer}`);
  }
  if (/~(?![01])/.test(body)) {
    return err(`JSON Pointer contains an invalid escape: ${pointer}`);
  }
  return ok(body.slice(1).split('/').map(unescapePointerToken));
}

export function formatPointer(tokens: readonly string[]): string {
  return tokens.map((token) => `/${escapePointerToken(token)}`).join('');
}

function child(container: JsonValue, token: string): PointerLookup {
  if (Array.isArray(container)) {
    if (!ARRAY_INDEX.test(token)) return NOT_FOUND;
    const index = Number(token);
    return index < container.length
      ? { found: true, value: container[index] }
      : NOT_FOUND;
  }
  if (container !== null && typeof container === 'object') {
    return Object.prototype.hasOwnProperty.call(container, token)
      ? { found: true, value: container[token] }
      : NOT_FOUND;
  }
  return NOT_FOUND;
}

function resolveTokens(
  document: JsonValue,
  tokens: readonly string[]
): PointerLookup {
  let current: JsonValue = document;
  for (const token of tokens) {
    const next = child(current, token);
    if (!next.found) return NOT_FOUND;
    current = next.value;
  }
  return { found: true, value: current };
}

export function resolvePointer(
  document: JsonValue,
  pointer: string
): PointerLookup {
  const parsed = parsePointer(pointer);
  if (parsed.isErr()) return NOT_FOUND;
  return resolveTokens(document, parsed.value);
}

/**
 * True when the pointer resolves to a present, non-null value.
 */
export function hasPointer(document: JsonValue, pointer: string): boolean {
  const lookup = resolvePointer(document, pointer);
  return lookup.found && lookup.value !== null;
}

/**
 * Delete the node addressed by `pointer` from its parent container.
 * Returns whether something was removed; an absent ancestor, a malformed
 * pointer or a non-index token against an array is a no-op.
 */
export function removePointer(document: JsonValue, pointer: string): boolean {
  const parsed = parsePointer(pointer);
  if (parsed.isErr()) return false;
  const tokens = parsed.value;
  if (tokens.length === 0) return false;

  const key = tokens[tokens.length - 1];
  const parent = resolveTokens(document, tokens.slice(0, -1));
  if (!parent.found) return false;

  const container = parent.value;
  if (Array.isArray(container)) {
    if (!ARRAY_INDEX.test(key)) return false;
    const index = Number(key);
    if (index >= container.length) return false;
    container.splice(index, 1);
    return true;
  }
  if (
    container !== null &&
    typeof container === 'object' &&
    Object.prototype.hasOwnProperty.call(container, key)
  ) {
    delete container[key];
    return true;
  }
  return false;
}

/**
 * Rewrite a schema-rooted pointer (`/properties/A/properties/B`) into an
 * instance-rooted one by dropping the first `/properties` segment only.
 */
export function stripPropertiesPrefix(pointer: string): string {
  return pointer.replace('/properties', '');
}
