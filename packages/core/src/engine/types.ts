import type { Result } from '../types/result.js';
import type { JsonObject } from '../types/schema.js';

/**
 * Failure tree as produced by the engine, before redaction. Messages may
 * still quote instance values.
 */
export interface NativeFailure {
  readonly message: string;
  readonly keyword: string | null;
  readonly pointer: string;
  readonly children: readonly NativeFailure[];
}

/**
 * Supplies the JSON document behind a remote `$ref` URI. Called once per
 * distinct URI within a single compile.
 */
export type SchemaFetcher = (uri: string) => Promise<unknown>;

export interface CompiledSchema {
  /** The document the schema was compiled from */
  readonly document: JsonObject;
  /** Returns null when the instance conforms */
  validate(instance: unknown): NativeFailure | null;
  /**
   * Whether `name` (a property name, or `/`-separated nested names) is
   * declared anywhere in the schema, combinators and `$ref`s included.
   */
  definesProperty(name: string): boolean;
}

export interface SchemaEngine {
  /**
   * Compile a document in a fresh context, resolving every `$ref`.
   * Failures (unresolvable or invalid references, invalid schema) come back
   * as a single-node failure tree.
   */
  compile(document: JsonObject): Promise<Result<CompiledSchema, NativeFailure>>;
  /** Compile a document already known to the engine by URI */
  compileRegistered(uri: string): Promise<Result<CompiledSchema, NativeFailure>>;
}
