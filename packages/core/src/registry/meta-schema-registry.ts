import { readFileSync } from 'node:fs';
import { createRequire } from 'node:module';
import { pathToFileURL } from 'node:url';

import { ConfigError, toError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { isJsonObject, type JsonObject } from '../types/schema.js';

const requireFromHere = createRequire(import.meta.url);

export const DRAFT_07_META_URI = 'http://json-schema.org/draft-07/schema';

export const RESOURCE_DEFINITION_SCHEMA_URI =
  'https://schema.cloudformation.us-east-1.amazonaws.com/provider.definition.schema.v1.json';

export const BUNDLED_SCHEMA_FILES = [
  'base.definition.schema.v1.json',
  'provider.configuration.definition.schema.v1.json',
  'provider.definition.schema.v1.json',
] as const;

export interface MetaSchemaEntry {
  readonly uri: string;
  readonly schema: JsonObject;
  /** Meta-schemas may be named by `$schema`; plain entries only by `$ref`. */
  readonly meta: boolean;
}

/**
 * URI -> document map assembled once and only read afterwards. Every engine
 * context is seeded from it so that references to these URIs never reach
 * the fetcher.
 */
export class MetaSchemaRegistry {
  private readonly map = new Map<string, MetaSchemaEntry>();

  add(entry: MetaSchemaEntry): void {
    this.map.set(normalizeSchemaUri(entry.uri), entry);
  }

  get(uri: string): MetaSchemaEntry | undefined {
    return this.map.get(normalizeSchemaUri(uri));
  }

  has(uri: string): boolean {
    return this.map.has(normalizeSchemaUri(uri));
  }

  entries(): Iterable<MetaSchemaEntry> {
    return this.map.values();
  }

  size(): number {
    return this.map.size;
  }
}

export function normalizeSchemaUri(uri: string): string {
  return uri.replace(/#\/?$/, '');
}

function isAbsoluteUri(uri: string): boolean {
  try {
    return new URL(uri).protocol.length > 0;
  } catch {
    return false;
  }
}

/**
 * Register a schema document under its own `$id`.
 */
export function registerMetaSchema(
  registry: MetaSchemaRegistry,
  schema: unknown,
  options: { meta?: boolean } = {}
): Result<void, ConfigError> {
  if (!isJsonObject(schema)) {
    return err(
      new ConfigError({
        message: 'Meta-schema must be a JSON object',
        context: { setting: '$id' },
      })
    );
  }
  const id = schema.$id;
  if (typeof id !== 'string' || id.trim() === '') {
    return err(
      new ConfigError({
        message: 'Invalid $id value: a meta-schema must declare a non-empty $id',
        context: { setting: '$id', value: id },
      })
    );
  }
  if (!isAbsoluteUri(id)) {
    return err(
      new ConfigError({
        message: `Invalid $id value: ${id} is not an absolute URI`,
        context: { setting: '$id', value: id },
      })
    );
  }
  registry.add({
    uri: normalizeSchemaUri(id),
    schema,
    meta: options.meta ?? true,
  });
  return ok(undefined);
}

/**
 * http/https spellings of a meta-schema URI. Trailing `#` variants need no
 * entry of their own since lookups normalize it away.
 */
export function metaSchemaSynonyms(canonical: string): string[] {
  const base = normalizeSchemaUri(canonical.trim());
  if (!base) return [];
  return [
    ...new Set([
      base.replace(/^https:\/\//, 'http://'),
      base.replace(/^http:\/\//, 'https://'),
    ]),
  ];
}

function loadDraft07(): unknown {
  return requireFromHere('ajv/dist/refs/json-schema-draft-07.json');
}

/**
 * The package's `schema/` directory, found through the package's own
 * manifest so sources and compiled output read the same files.
 */
export function bundledSchemaDirectory(): URL {
  const manifest = requireFromHere.resolve('@resource-schema/core/package.json');
  return new URL('schema/', pathToFileURL(manifest));
}

export function readBundledSchema(fileName: string): unknown {
  const location = new URL(fileName, bundledSchemaDirectory());
  return JSON.parse(readFileSync(location, 'utf8'));
}

function unwrap(result: Result<void, ConfigError>): void {
  if (result.isErr()) throw result.error;
}

/**
 * Registry with the draft-07 meta-schema (under each synonym) and the
 * bundled resource-definition documents. Throws ConfigError when a bundled
 * document is missing or broken.
 */
export function createDefaultRegistry(
  loadBundled: (fileName: string) => unknown = readBundledSchema
): MetaSchemaRegistry {
  const registry = new MetaSchemaRegistry();

  const draft07 = loadDraft07();
  if (!isJsonObject(draft07)) {
    throw new ConfigError({
      message: 'Bundled draft-07 meta-schema is not a JSON object',
      context: { setting: DRAFT_07_META_URI },
    });
  }
  for (const uri of metaSchemaSynonyms(DRAFT_07_META_URI)) {
    unwrap(registerMetaSchema(registry, { ...draft07, $id: uri }));
  }

  for (const fileName of BUNDLED_SCHEMA_FILES) {
    let document: unknown;
    try {
      document = loadBundled(fileName);
    } catch (error) {
      throw new ConfigError({
        message: `Unable to read bundled schema ${fileName}`,
        context: { setting: fileName },
        cause: toError(error),
      });
    }
    unwrap(
      registerMetaSchema(registry, document, {
        meta: fileName === 'provider.definition.schema.v1.json',
      })
    );
  }

  if (!registry.has(RESOURCE_DEFINITION_SCHEMA_URI)) {
    throw new ConfigError({
      message: `Resource definition meta-schema ${RESOURCE_DEFINITION_SCHEMA_URI} is not registered`,
      context: { setting: RESOURCE_DEFINITION_SCHEMA_URI },
    });
  }
  return registry;
}
