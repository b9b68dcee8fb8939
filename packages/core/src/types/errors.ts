/**
 * Error hierarchy for resource schema processing
 * Every error carries a stable code, a severity and optional context.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';
import {
  buildFullFailureMessage,
  createValidationFailure,
  type ValidationFailure,
} from '../errors/validation-failure.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  pointer?: string; // `#`-prefixed location the error refers to
  keyword?: string | null; // schema keyword or vendor attribute involved
  ref?: string; // $ref URI that failed to resolve
  setting?: string; // configuration setting at fault
  value?: unknown; // problematic value (may contain secrets)
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string };
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  pointer?: string;
}

interface ResourceSchemaErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'secretAccessKey',
  'accessKeyId',
]);

/**
 * Base error class for all resource schema errors
 */
export abstract class ResourceSchemaError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  declare readonly cause?: Error;

  constructor(params: ResourceSchemaErrorParams) {
    super(params.message, { cause: params.cause });
    this.name = this.constructor.name;
    this.errorCode = params.errorCode;
    this.severity = params.severity ?? 'error';
    this.context = params.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
    };
    if (this.cause) {
      base.cause = { name: this.cause.name, message: this.cause.message };
    }
    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      pointer: this.context?.pointer,
    };
  }

  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;

    const redactValue = (val: unknown): unknown => {
      if (Array.isArray(val)) return val.map(redactValue);
      if (val !== null && typeof val === 'object') {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redactValue(v);
        }
        return out;
      }
      return val;
    };

    return { ...context, value: redactValue(context.value) };
  }
}

/**
 * Which stage rejected the document:
 * - shape: the definition fails the resource-definition meta-schema
 * - reference: a $ref target is missing or invalid (found only at load time)
 * - semantic: a vendor property is internally inconsistent
 * - instance: a resource instance fails an accepted schema
 */
export type ValidationErrorKind = 'shape' | 'reference' | 'semantic' | 'instance';

const CODE_BY_KIND: Record<ValidationErrorKind, ErrorCode> = {
  shape: ErrorCode.INVALID_DEFINITION_SHAPE,
  reference: ErrorCode.UNRESOLVED_REFERENCE,
  semantic: ErrorCode.SEMANTIC_CONSTRAINT_VIOLATION,
  instance: ErrorCode.INSTANCE_VALIDATION_FAILED,
};

/**
 * Validation errors wrap a (redacted) failure tree. The error message is
 * the root node's message.
 */
export class ValidationError extends ResourceSchemaError {
  public readonly kind: ValidationErrorKind;
  public readonly failure: ValidationFailure;

  constructor(params: {
    kind: ValidationErrorKind;
    failure: ValidationFailure;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.failure.message,
      errorCode: CODE_BY_KIND[params.kind],
      context: {
        pointer: params.failure.pointer,
        keyword: params.failure.keyword,
        ...(params.context ?? {}),
      },
      cause: params.cause,
    });
    this.kind = params.kind;
    this.failure = params.failure;
  }

  /** Convenience for single-node failures (semantic checks, bad refs). */
  static of(
    kind: ValidationErrorKind,
    message: string,
    keyword: string | null,
    pointer: string,
    cause?: Error
  ): ValidationError {
    return new ValidationError({
      kind,
      failure: createValidationFailure(message, keyword, pointer),
      cause,
    });
  }

  get keyword(): string | null {
    return this.failure.keyword;
  }

  get pointer(): string {
    return this.failure.pointer;
  }

  get causes(): readonly ValidationFailure[] {
    return this.failure.causes;
  }

  fullMessage(): string {
    return buildFullFailureMessage(this.failure);
  }
}

/**
 * Configuration and setup errors: broken bundled meta-schemas or invalid
 * options. These indicate a broken deployment, not bad user input.
 */
export class ConfigError extends ResourceSchemaError {
  constructor(params: {
    message: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * A fetched document could not be parsed as JSON.
 */
export class ParseError extends ResourceSchemaError {
  constructor(params: { message: string; ref?: string; cause?: Error }) {
    super({
      message: params.message,
      errorCode: ErrorCode.PARSE_ERROR,
      context: { ref: params.ref },
      cause: params.cause,
    });
  }
}

export function isResourceSchemaError(
  error: unknown
): error is ResourceSchemaError {
  return error instanceof ResourceSchemaError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
