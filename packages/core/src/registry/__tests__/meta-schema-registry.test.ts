import { describe, expect, it } from 'vitest';
import { existsSync } from 'node:fs';

import {
  bundledSchemaDirectory,
  createDefaultRegistry,
  DRAFT_07_META_URI,
  MetaSchemaRegistry,
  metaSchemaSynonyms,
  normalizeSchemaUri,
  readBundledSchema,
  registerMetaSchema,
  RESOURCE_DEFINITION_SCHEMA_URI,
} from '../meta-schema-registry.js';
import { ConfigError } from '../../types/errors.js';

const BASE_URI =
  'https://schema.cloudformation.us-east-1.amazonaws.com/base.definition.schema.v1.json';

describe('MetaSchemaRegistry', () => {
  it('normalizes trailing fragments on every lookup', () => {
    const registry = new MetaSchemaRegistry();
    registry.add({
      uri: 'https://schemas.example.com/a.json#',
      schema: { $id: 'https://schemas.example.com/a.json#' },
      meta: false,
    });

    expect(registry.has('https://schemas.example.com/a.json')).toBe(true);
    expect(registry.has('https://schemas.example.com/a.json#/')).toBe(true);
    expect(registry.get('https://schemas.example.com/a.json')?.meta).toBe(false);
    expect(registry.size()).toBe(1);
  });

  it('lists http and https synonyms', () => {
    expect(metaSchemaSynonyms('http://json-schema.org/draft-07/schema#')).toEqual([
      'http://json-schema.org/draft-07/schema',
      'https://json-schema.org/draft-07/schema',
    ]);
    expect(metaSchemaSynonyms('  ')).toEqual([]);
  });

  it('strips only a trailing fragment marker', () => {
    expect(normalizeSchemaUri('urn:a#')).toBe('urn:a');
    expect(normalizeSchemaUri('urn:a#/')).toBe('urn:a');
    expect(normalizeSchemaUri('urn:a#/definitions/x')).toBe(
      'urn:a#/definitions/x'
    );
  });
});

describe('registerMetaSchema', () => {
  it('registers a document under its $id', () => {
    const registry = new MetaSchemaRegistry();
    const result = registerMetaSchema(registry, {
      $id: 'https://schemas.example.com/meta.json#',
      type: 'object',
    });

    expect(result.isOk()).toBe(true);
    expect(registry.get('https://schemas.example.com/meta.json')?.meta).toBe(
      true
    );
  });

  it('accepts URN identifiers', () => {
    const registry = new MetaSchemaRegistry();
    expect(
      registerMetaSchema(registry, { $id: 'urn:example:meta' }).isOk()
    ).toBe(true);
  });

  const rejected: Array<[string, unknown, string]> = [
    ['a non-object', ['not', 'a', 'schema'], 'Meta-schema must be a JSON object'],
    [
      'a missing $id',
      { type: 'object' },
      'Invalid $id value: a meta-schema must declare a non-empty $id',
    ],
    [
      'a blank $id',
      { $id: '   ' },
      'Invalid $id value: a meta-schema must declare a non-empty $id',
    ],
    [
      'a relative $id',
      { $id: 'schemas/meta.json' },
      'Invalid $id value: schemas/meta.json is not an absolute URI',
    ],
  ];

  it.each(rejected)('rejects %s', (_label, schema, message) => {
    const registry = new MetaSchemaRegistry();
    const result = registerMetaSchema(registry, schema);

    expect(result.isErr() && result.error).toBeInstanceOf(ConfigError);
    expect(result.isErr() && result.error.message).toBe(message);
    expect(result.isErr() && result.error.setting).toBe('$id');
    expect(registry.size()).toBe(0);
  });
});

describe('createDefaultRegistry', () => {
  it('registers draft-07 synonyms and the bundled documents', () => {
    const registry = createDefaultRegistry();

    expect(registry.has(DRAFT_07_META_URI)).toBe(true);
    expect(registry.has('http://json-schema.org/draft-07/schema#')).toBe(true);
    expect(registry.has('https://json-schema.org/draft-07/schema')).toBe(true);
    expect(registry.get(RESOURCE_DEFINITION_SCHEMA_URI)?.meta).toBe(true);
    expect(registry.get(BASE_URI)?.meta).toBe(false);
    expect(registry.size()).toBe(5);
  });

  it('reads bundled documents from the package schema directory', () => {
    const document = readBundledSchema('provider.definition.schema.v1.json');
    expect(document).toMatchObject({ $id: RESOURCE_DEFINITION_SCHEMA_URI });
  });

  it('locates the schema directory beside the package manifest', () => {
    const directory = bundledSchemaDirectory();

    expect(directory.href.endsWith('/core/schema/')).toBe(true);
    expect(existsSync(new URL('../package.json', directory))).toBe(true);
  });

  it('wraps unreadable bundled documents in a ConfigError', () => {
    expect(() =>
      createDefaultRegistry(() => {
        throw new Error('ENOENT');
      })
    ).toThrow('Unable to read bundled schema base.definition.schema.v1.json');
  });

  it('rejects bundled documents without an $id', () => {
    expect(() => createDefaultRegistry(() => ({ type: 'object' }))).toThrow(
      'Invalid $id value: a meta-schema must declare a non-empty $id'
    );
  });

  it('requires the resource definition meta-schema', () => {
    let counter = 0;
    const loadBundled = (): unknown => {
      counter += 1;
      return { $id: `urn:example:bundled:${counter}` };
    };

    expect(() => createDefaultRegistry(loadBundled)).toThrow(
      `Resource definition meta-schema ${RESOURCE_DEFINITION_SCHEMA_URI} is not registered`
    );
  });
});
