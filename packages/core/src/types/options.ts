/**
 * Configuration options for the Validator
 *
 * All options are optional; `resolveValidatorOptions` merges them over
 * DEFAULT_VALIDATOR_OPTIONS and rejects invalid combinations.
 */

import type { SchemaFetcher } from '../engine/types.js';
import type { Logger } from '../util/logger.js';
import type { MetricsCollector } from '../util/metrics.js';
import { ConfigError } from './errors.js';

/**
 * Remote `$ref` retrieval used by the default HTTP fetcher
 */
export interface RemoteOptions {
  /** Abort a single fetch after this many milliseconds (default: 8000) */
  timeoutMs?: number;
  /** Reject documents larger than this many bytes (default: 5 MiB) */
  maxBytesPerDoc?: number;
  /**
   * Hosts allowed for remote fetches, as hostnames or regular expressions.
   * Empty means any host (default: [])
   */
  allowHosts?: Array<string | RegExp>;
  /** User-Agent header sent with requests */
  userAgent?: string;
}

export interface ValidatorOptions {
  /** Supplies documents for `$ref` targets that are not registered locally */
  fetcher?: SchemaFetcher;
  remote?: RemoteOptions;
  /** Validate `format` keywords with ajv-formats (default: true) */
  validateFormats?: boolean;
  /** Report every violation instead of the first one (default: true) */
  allErrors?: boolean;
  /** Handler timeout when a definition does not declare one (default: 120) */
  defaultTimeoutInMinutes?: number;
  /** Emit debug lines on stderr from the default logger (default: false) */
  debug?: boolean;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export interface ResolvedRemoteOptions {
  timeoutMs: number;
  maxBytesPerDoc: number;
  allowHosts: Array<string | RegExp>;
  userAgent?: string;
}

export interface ResolvedValidatorOptions {
  fetcher?: SchemaFetcher;
  remote: ResolvedRemoteOptions;
  validateFormats: boolean;
  allErrors: boolean;
  defaultTimeoutInMinutes: number;
  debug: boolean;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export const DEFAULT_TIMEOUT_IN_MINUTES = 120;

export const DEFAULT_VALIDATOR_OPTIONS: ResolvedValidatorOptions = {
  remote: {
    timeoutMs: 8000,
    maxBytesPerDoc: 5 * 1024 * 1024,
    allowHosts: [],
  },
  validateFormats: true,
  allErrors: true,
  defaultTimeoutInMinutes: DEFAULT_TIMEOUT_IN_MINUTES,
  debug: false,
};

export function resolveValidatorOptions(
  userOptions: ValidatorOptions = {}
): ResolvedValidatorOptions {
  const defaults = DEFAULT_VALIDATOR_OPTIONS;
  const remote = userOptions.remote ?? {};
  const resolved: ResolvedValidatorOptions = {
    fetcher: userOptions.fetcher,
    remote: {
      timeoutMs: remote.timeoutMs ?? defaults.remote.timeoutMs,
      maxBytesPerDoc: remote.maxBytesPerDoc ?? defaults.remote.maxBytesPerDoc,
      allowHosts: remote.allowHosts ?? [...defaults.remote.allowHosts],
      userAgent: remote.userAgent,
    },
    validateFormats: userOptions.validateFormats ?? defaults.validateFormats,
    allErrors: userOptions.allErrors ?? defaults.allErrors,
    defaultTimeoutInMinutes:
      userOptions.defaultTimeoutInMinutes ?? defaults.defaultTimeoutInMinutes,
    debug: userOptions.debug ?? defaults.debug,
    logger: userOptions.logger,
    metrics: userOptions.metrics,
  };

  validateOptions(resolved);
  return resolved;
}

function validateOptions(options: ResolvedValidatorOptions): void {
  const positive: Array<[string, number]> = [
    ['remote.timeoutMs', options.remote.timeoutMs],
    ['remote.maxBytesPerDoc', options.remote.maxBytesPerDoc],
    ['defaultTimeoutInMinutes', options.defaultTimeoutInMinutes],
  ];
  for (const [setting, value] of positive) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigError({
        message: `${setting} must be a positive number, got ${String(value)}`,
        context: { setting },
      });
    }
  }
}
