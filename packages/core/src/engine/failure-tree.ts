import type { ErrorObject } from 'ajv';

import { isJsonObject, type JsonValue } from '../types/schema.js';
import { escapePointerToken } from '../util/json-pointer.js';
import type { NativeFailure } from './types.js';

/**
 * Ajv reports a flat, ordered error list. Consumers expect a tree where
 * combinator failures own the branch failures beneath them:
 * - anyOf/oneOf errors adopt the branch errors Ajv emitted just before them
 * - errors below `allOf/<n>` are grouped under a synthesized allOf node
 * - several top-level nodes are wrapped in one aggregate root
 *
 * Errors raised inside a `$ref` target carry the target's schema path. When
 * the target is referenced from exactly one place in the document, that path
 * is mapped back onto the referencing site before grouping.
 */

interface DraftNode {
  /** Schema path with single-use `$ref` targets mapped to their site */
  readonly schemaPath: string;
  /** Schema path as Ajv reported it */
  readonly rawPath: string;
  /** `$ref` values of the branches, for anyOf/oneOf errors */
  readonly branchRefs: readonly string[];
  readonly pointer: string;
  readonly keyword: string | null;
  readonly message: string;
  readonly order: number;
  children: DraftNode[];
}

const BRANCH_INDEX = /^(0|[1-9][0-9]*)$/;
const DEFINITION_CONTAINERS = new Set(['definitions', '$defs']);

export function toFailurePointer(instancePath: string): string {
  return `#${instancePath}`;
}

function readParam(error: ErrorObject, name: string): string {
  const value: unknown = error.params[name];
  return typeof value === 'string' || typeof value === 'number'
    ? String(value)
    : '';
}

export function describeError(error: ErrorObject): string {
  const pointer = toFailurePointer(error.instancePath);
  switch (error.keyword) {
    case 'required':
      return `${pointer}: required key [${readParam(error, 'missingProperty')}] not found`;
    case 'additionalProperties':
      return `${pointer}: extraneous key [${readParam(error, 'additionalProperty')}] is not permitted`;
    case 'minLength':
    case 'maxLength': {
      const data: unknown = error.data;
      const actual = typeof data === 'string' ? Array.from(data).length : '?';
      return `${pointer}: expected ${error.keyword}: ${readParam(error, 'limit')}, actual: ${actual}`;
    }
    default:
      return `${pointer}: ${error.message ?? 'is invalid'}`;
  }
}

/** Whether pointer or schema path `child` lies at or below `parent`. */
function isWithin(child: string, parent: string): boolean {
  return child === parent || child.startsWith(`${parent}/`);
}

function commonPointer(pointers: readonly string[]): string {
  const split = pointers.map((pointer) => pointer.split('/'));
  const [first = ['#']] = split;
  let length = first.length;
  for (const tokens of split) {
    let i = 0;
    while (i < length && i < tokens.length && tokens[i] === first[i]) i++;
    length = i;
  }
  return first.slice(0, Math.max(1, length)).join('/');
}

/**
 * Local `$ref` targets mapped to the schema paths that reference them.
 */
function collectRefSites(schema: JsonValue | undefined): Map<string, string[]> {
  const sites = new Map<string, string[]>();
  const visit = (node: JsonValue, path: string): void => {
    if (Array.isArray(node)) {
      node.forEach((item, index) => visit(item, `${path}/${index}`));
      return;
    }
    if (!isJsonObject(node)) return;
    const ref = node.$ref;
    if (typeof ref === 'string' && ref.startsWith('#')) {
      const target = ref === '#' || ref === '#/' ? '#' : ref;
      const known = sites.get(target) ?? [];
      known.push(path);
      sites.set(target, known);
    }
    for (const [key, value] of Object.entries(node)) {
      visit(value, `${path}/${escapePointerToken(key)}`);
    }
  };
  if (schema !== undefined) visit(schema, '#');
  return sites;
}

function toLogicalPath(
  schemaPath: string,
  sites: ReadonlyMap<string, string[]>
): string {
  let path = schemaPath;
  for (let step = 0; step <= sites.size; step++) {
    let target: string | undefined;
    for (const [candidate, referrers] of sites) {
      if (referrers.length !== 1 || candidate === '#') continue;
      if (!isWithin(path, candidate)) continue;
      if (!target || candidate.length > target.length) target = candidate;
    }
    if (!target) break;
    const [site] = sites.get(target) ?? [];
    if (site === undefined || isWithin(site, target)) break;
    path = `${site}${path.slice(target.length)}`;
  }
  return path;
}

/**
 * Whether an error emitted before a combinator error can belong to one of
 * its branches. Errors from other keywords or branches of the surrounding
 * schema, or from instance locations outside the combinator's, end the
 * branch range. Ajv reports errors of an inlined `$ref` branch under the
 * reference itself; other paths that leave the combinator through a
 * definitions container come from `$ref` targets too and stay in range.
 */
function belongsToBranches(node: DraftNode, combinator: DraftNode): boolean {
  if (!isWithin(node.pointer, combinator.pointer)) return false;
  if (isWithin(node.schemaPath, combinator.schemaPath)) return true;
  if (combinator.branchRefs.some((ref) => isWithin(node.rawPath, ref))) {
    return true;
  }
  const own = node.schemaPath.split('/');
  const other = combinator.schemaPath.split('/');
  let shared = 0;
  while (shared < own.length && shared < other.length && own[shared] === other[shared]) {
    shared++;
  }
  const diverging = own[shared] ?? '';
  const enclosing = shared > 0 ? own[shared - 1] : '';
  return (
    DEFINITION_CONTAINERS.has(diverging) || DEFINITION_CONTAINERS.has(enclosing)
  );
}

function readBranchRefs(error: ErrorObject): string[] {
  if (error.keyword !== 'anyOf' && error.keyword !== 'oneOf') return [];
  const branches: unknown = error.schema;
  if (!Array.isArray(branches)) return [];
  return branches.flatMap((branch: unknown) =>
    isJsonObject(branch) && typeof branch.$ref === 'string' ? [branch.$ref] : []
  );
}

function adoptBranches(nodes: readonly DraftNode[]): DraftNode[] {
  const claimed = new Set<DraftNode>();
  nodes.forEach((node, index) => {
    if (node.keyword !== 'anyOf' && node.keyword !== 'oneOf') return;
    const adopted: DraftNode[] = [];
    for (let j = index - 1; j >= 0; j--) {
      const candidate = nodes[j];
      if (claimed.has(candidate)) continue;
      if (!belongsToBranches(candidate, node)) break;
      adopted.unshift(candidate);
      claimed.add(candidate);
    }
    node.children = adopted;
  });
  return nodes.filter((node) => !claimed.has(node));
}

function findAllOf(schemaPath: string, base: string): string | undefined {
  const segments = schemaPath.split('/');
  const start = isWithin(schemaPath, base) ? base.split('/').length : 1;
  for (let i = start; i < segments.length - 1; i++) {
    if (segments[i] === 'allOf' && BRANCH_INDEX.test(segments[i + 1])) {
      return segments.slice(0, i + 1).join('/');
    }
  }
  return undefined;
}

function branchOf(schemaPath: string, allOfPath: string): string {
  const [index = ''] = schemaPath.slice(allOfPath.length + 1).split('/');
  return index;
}

/**
 * Groups `items` under synthesized allOf nodes for every allOf found below
 * `base`, recursing into the groups.
 */
function groupAllOf(items: readonly DraftNode[], base: string): DraftNode[] {
  const groups = new Map<string, DraftNode[]>();
  const result: DraftNode[] = [];
  for (const item of items) {
    const allOfPath = findAllOf(item.schemaPath, base);
    if (allOfPath === undefined) {
      result.push(item);
      continue;
    }
    const members = groups.get(allOfPath);
    if (members) {
      members.push(item);
    } else {
      groups.set(allOfPath, [item]);
    }
  }
  for (const [allOfPath, members] of groups) {
    const pointer = commonPointer(members.map((member) => member.pointer));
    const branches = new Set(
      members.map((member) => branchOf(member.schemaPath, allOfPath))
    );
    result.push({
      schemaPath: allOfPath,
      rawPath: allOfPath,
      branchRefs: [],
      pointer,
      keyword: 'allOf',
      message: `${pointer}: ${branches.size} subschema(s) failed to match in allOf`,
      order: Math.min(...members.map((member) => member.order)),
      children: groupAllOf(members, allOfPath),
    });
  }
  return result;
}

function arrange(items: readonly DraftNode[], base: string): DraftNode[] {
  for (const item of items) {
    if (item.children.length > 0) {
      item.children = arrange(item.children, item.schemaPath);
    }
  }
  return groupAllOf(items, base);
}

function freeze(node: DraftNode): NativeFailure {
  const children = [...node.children]
    .sort((a, b) => a.order - b.order)
    .map(freeze);
  return {
    message: node.message,
    keyword: node.keyword,
    pointer: node.pointer,
    children,
  };
}

export function countNativeLeaves(failure: NativeFailure): number {
  if (failure.children.length === 0) return 1;
  return failure.children.reduce(
    (total, child) => total + countNativeLeaves(child),
    0
  );
}

/**
 * Build the failure tree for one validation run. Returns null when Ajv
 * reported nothing. `schema` is the validated document; it lets errors
 * raised inside local `$ref` targets be placed under the referencing
 * combinator branch.
 */
export function buildFailureTree(
  errors: readonly ErrorObject[] | null | undefined,
  schema?: JsonValue
): NativeFailure | null {
  if (!errors || errors.length === 0) return null;

  const sites = collectRefSites(schema);
  const nodes: DraftNode[] = errors.map((error, order) => ({
    schemaPath: toLogicalPath(error.schemaPath, sites),
    rawPath: error.schemaPath,
    branchRefs: readBranchRefs(error),
    pointer: toFailurePointer(error.instancePath),
    keyword: error.keyword,
    message: describeError(error),
    order,
    children: [],
  }));

  const tree = arrange(adoptBranches(nodes), '#')
    .sort((a, b) => a.order - b.order)
    .map(freeze);
  if (tree.length === 1) return tree[0];

  const violations = tree.reduce(
    (total, root) => total + countNativeLeaves(root),
    0
  );
  return {
    message: `#: ${violations} schema violations found`,
    keyword: null,
    pointer: '#',
    children: tree,
  };
}
