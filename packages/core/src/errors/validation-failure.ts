import type { NativeFailure } from '../engine/types.js';

/**
 * A node of the validation failure tree. Aggregate nodes (produced for
 * combinators or several violations at once) carry a null keyword and a
 * non-empty list of causes; leaf nodes carry the violated keyword.
 */
export interface ValidationFailure {
  readonly message: string;
  readonly keyword: string | null;
  /** Instance location, `#`-prefixed (e.g. `#/propertyA`). */
  readonly pointer: string;
  readonly causes: readonly ValidationFailure[];
}

/**
 * Keywords whose messages never echo an instance value. Every other keyword
 * (pattern, enum, const, format, numeric bounds, ...) is rewritten.
 */
export const SAFE_KEYWORDS: ReadonlySet<string> = new Set([
  // object keywords
  'required',
  'minProperties',
  'maxProperties',
  'dependencies',
  'additionalProperties',
  // string keywords
  'minLength',
  'maxLength',
  // array keywords
  'minItems',
  'maxItems',
  'uniqueItems',
  'contains',
  // misc keywords
  'type',
  'allOf',
  'anyOf',
  'oneOf',
]);

export function createValidationFailure(
  message: string,
  keyword: string | null,
  pointer: string,
  causes: readonly ValidationFailure[] = []
): ValidationFailure {
  return {
    message,
    keyword,
    pointer,
    causes: Object.freeze([...causes]),
  };
}

/** An aggregate node reports a violation count, never an instance value. */
export function isAggregateFailure(failure: {
  readonly keyword: string | null;
  readonly causes: readonly unknown[];
}): boolean {
  return failure.keyword === null && failure.causes.length > 0;
}

export function isSafeKeyword(keyword: string | null): boolean {
  return keyword !== null && SAFE_KEYWORDS.has(keyword);
}

export function redactedMessage(
  pointer: string,
  keyword: string | null
): string {
  return `${pointer}: failed validation constraint for keyword [${String(keyword)}]`;
}

/**
 * Translate an engine failure tree into the redacted taxonomy. Children are
 * scrubbed whatever happens to their parent.
 */
export function scrubFailure(native: NativeFailure): ValidationFailure {
  const causes = native.children.map(scrubFailure);
  const aggregate = isAggregateFailure({
    keyword: native.keyword,
    causes: native.children,
  });
  const message =
    aggregate || isSafeKeyword(native.keyword)
      ? native.message
      : redactedMessage(native.pointer, native.keyword);
  return createValidationFailure(
    message,
    native.keyword,
    native.pointer,
    causes
  );
}

/**
 * Newline-separated messages of every non-aggregate node, depth first.
 */
export function buildFullFailureMessage(
  failure: ValidationFailure | undefined
): string {
  if (!failure) return '';
  return collectMessages(failure).join('\n').trim();
}

function collectMessages(failure: ValidationFailure): string[] {
  const lines: string[] = [];
  if (!isAggregateFailure(failure) && failure.message) {
    lines.push(failure.message);
  }
  for (const cause of failure.causes) {
    lines.push(...collectMessages(cause));
  }
  return lines;
}

/** Number of leaf violations below (and including) this node. */
export function countViolations(failure: ValidationFailure): number {
  if (failure.causes.length === 0) return 1;
  return failure.causes.reduce(
    (total, cause) => total + countViolations(cause),
    0
  );
}

export function leafFailures(failure: ValidationFailure): ValidationFailure[] {
  if (failure.causes.length === 0) return [failure];
  return failure.causes.flatMap(leafFailures);
}
