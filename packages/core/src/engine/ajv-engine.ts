import {
  Ajv,
  type Logger as AjvLogger,
  type Options as AjvOptions,
  type SchemaObject,
  type ValidateFunction,
} from 'ajv';
import addFormats from 'ajv-formats';

import {
  normalizeSchemaUri,
  type MetaSchemaRegistry,
} from '../registry/meta-schema-registry.js';
import { ParseError, toError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types/schema.js';
import { resolvePointer } from '../util/json-pointer.js';
import type { Logger } from '../util/logger.js';
import type { MetricsCollector } from '../util/metrics.js';
import { buildFailureTree } from './failure-tree.js';
import { definesProperty } from './introspection.js';
import type {
  CompiledSchema,
  NativeFailure,
  SchemaEngine,
  SchemaFetcher,
} from './types.js';

export interface AjvEngineOptions {
  registry: MetaSchemaRegistry;
  fetcher?: SchemaFetcher;
  validateFormats: boolean;
  allErrors: boolean;
  logger: Logger;
  metrics?: MetricsCollector;
}

/**
 * Ajv accepts only plain schema objects: `$id`/`$schema` must be strings
 * and async schemas are not supported here.
 */
export function isSchemaObject(value: unknown): value is SchemaObject {
  if (!isJsonObject(value)) return false;
  const { $id, $schema, $async } = value;
  return (
    ($id === undefined || typeof $id === 'string') &&
    ($schema === undefined || typeof $schema === 'string') &&
    ($async === undefined || $async === false)
  );
}

function isAbsoluteUri(uri: string): boolean {
  try {
    return new URL(uri).protocol.length > 0;
  } catch {
    return false;
  }
}

function formatLogArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (typeof arg === 'string') return arg;
      if (arg instanceof Error) return arg.message;
      return JSON.stringify(arg);
    })
    .join(' ');
}

function toAjvLogger(logger: Logger): AjvLogger {
  return {
    log: (...args: unknown[]) => logger.debug(formatLogArgs(args)),
    warn: (...args: unknown[]) => logger.warn(formatLogArgs(args)),
    error: (...args: unknown[]) => logger.warn(formatLogArgs(args)),
  };
}

function referenceFailure(message: string, keyword: string | null): NativeFailure {
  return { message: `#: ${message}`, keyword, pointer: '#', children: [] };
}

class AjvCompiledSchema implements CompiledSchema {
  constructor(
    readonly document: JsonObject,
    private readonly validateFn: ValidateFunction,
    private readonly ajv: Ajv
  ) {}

  validate(instance: unknown): NativeFailure | null {
    if (this.validateFn(instance)) return null;
    return buildFailureTree(this.validateFn.errors, this.document);
  }

  definesProperty(name: string): boolean {
    return definesProperty(this.document, name, (ref) => this.resolveRef(ref));
  }

  private resolveRef(ref: string): JsonValue | undefined {
    const hash = ref.indexOf('#');
    const base = hash >= 0 ? ref.slice(0, hash) : ref;
    const fragment = hash >= 0 ? ref.slice(hash) : '';

    let root: JsonValue | undefined;
    if (base === '') {
      root = this.document;
    } else {
      const absolute = this.absolutize(base);
      const target = absolute ? this.ajv.getSchema(absolute)?.schema : undefined;
      root = isJsonObject(target) ? target : undefined;
    }
    if (root === undefined) return undefined;

    const lookup = resolvePointer(root, fragment);
    return lookup.found ? lookup.value : undefined;
  }

  private absolutize(uri: string): string | undefined {
    const id = this.document.$id;
    try {
      return typeof id === 'string' ? new URL(uri, id).href : new URL(uri).href;
    } catch {
      return undefined;
    }
  }
}

/**
 * SchemaEngine over Ajv (draft-07). Every compile builds its own Ajv
 * instance seeded from the registry, so reference caches are never shared
 * between calls.
 */
export class AjvSchemaEngine implements SchemaEngine {
  constructor(private readonly options: AjvEngineOptions) {}

  async compile(
    document: JsonObject
  ): Promise<Result<CompiledSchema, NativeFailure>> {
    if (!isSchemaObject(document)) {
      return err(
        referenceFailure('$id and $schema must be strings', '$schema')
      );
    }
    const failedLoads = new Map<string, Error>();
    const ajv = this.createAjv(failedLoads);
    try {
      const validateFn = await ajv.compileAsync(document);
      return ok(new AjvCompiledSchema(document, validateFn, ajv));
    } catch (error) {
      return err(this.describeCompileError(toError(error), failedLoads));
    }
  }

  async compileRegistered(
    uri: string
  ): Promise<Result<CompiledSchema, NativeFailure>> {
    const entry = this.options.registry.get(uri);
    if (!entry) {
      return err(referenceFailure(`no schema registered for [${uri}]`, '$ref'));
    }
    const failedLoads = new Map<string, Error>();
    const ajv = this.createAjv(failedLoads);
    try {
      const validateFn = ajv.getSchema(normalizeSchemaUri(uri));
      if (!validateFn) {
        return err(referenceFailure(`unable to compile [${uri}]`, '$ref'));
      }
      return ok(new AjvCompiledSchema(entry.schema, validateFn, ajv));
    } catch (error) {
      return err(this.describeCompileError(toError(error), failedLoads));
    }
  }

  private createAjv(failedLoads: Map<string, Error>): Ajv {
    const { allErrors, validateFormats, logger } = this.options;
    const ajvOptions: AjvOptions = {
      allErrors,
      verbose: true,
      strict: false,
      validateFormats,
      logger: toAjvLogger(logger),
      loadSchema: (uri: string) => this.loadRemote(uri, failedLoads),
    };
    const ajv = new Ajv(ajvOptions);
    if (validateFormats) {
      addFormats.default(ajv);
    }
    this.seed(ajv);
    return ajv;
  }

  private seed(ajv: Ajv): void {
    for (const entry of this.options.registry.entries()) {
      if (ajv.getSchema(entry.uri)) continue;
      if (!isSchemaObject(entry.schema)) continue;
      if (entry.meta) {
        ajv.addMetaSchema(entry.schema);
      } else {
        ajv.addSchema(entry.schema);
      }
    }
  }

  private async loadRemote(
    uri: string,
    failedLoads: Map<string, Error>
  ): Promise<SchemaObject> {
    const { fetcher, logger, metrics } = this.options;
    try {
      if (!uri || !isAbsoluteUri(uri)) {
        throw new Error(`cannot resolve non-absolute reference [${uri}]`);
      }
      if (!fetcher) {
        throw new Error(`no fetcher configured to load [${uri}]`);
      }
      logger.debug(`fetching remote schema ${uri}`);
      metrics?.increment('remoteFetches');
      const document = await fetcher(uri);
      if (!isSchemaObject(document)) {
        throw new ParseError({
          message: `Remote schema ${uri} is not a JSON schema object`,
          ref: uri,
        });
      }
      return document;
    } catch (error) {
      failedLoads.set(uri, toError(error));
      throw error;
    }
  }

  private describeCompileError(
    error: Error,
    failedLoads: ReadonlyMap<string, Error>
  ): NativeFailure {
    if (error instanceof Ajv.MissingRefError) {
      return referenceFailure(
        `unable to resolve reference [${error.missingRef}]`,
        '$ref'
      );
    }
    for (const [uri, cause] of failedLoads) {
      if (cause === error || cause.message === error.message) {
        return referenceFailure(
          `unable to load referenced schema [${uri}]: ${cause.message}`,
          '$ref'
        );
      }
    }
    if (/cannot be resolved|can't resolve reference/.test(error.message)) {
      return referenceFailure(error.message, '$ref');
    }
    return referenceFailure(error.message, null);
  }
}
