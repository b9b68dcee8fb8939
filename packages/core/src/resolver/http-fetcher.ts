/* global fetch, AbortController */
import type { SchemaFetcher } from '../engine/types.js';
import { ParseError, toError } from '../types/errors.js';
import {
  DEFAULT_VALIDATOR_OPTIONS,
  type RemoteOptions,
} from '../types/options.js';

function hostMatchesAllow(
  host: string,
  allow: ReadonlyArray<string | RegExp>
): boolean {
  for (const entry of allow) {
    if (typeof entry === 'string') {
      if (host === entry.trim().toLowerCase()) return true;
    } else if (entry.test(host)) {
      return true;
    }
  }
  return false;
}

async function fetchWithBounds(
  url: URL,
  timeoutMs: number,
  maxBytes: number,
  userAgent: string | undefined
): Promise<string> {
  const headers =
    typeof userAgent === 'string' && userAgent.trim().length > 0
      ? { 'user-agent': userAgent }
      : undefined;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, { signal: controller.signal, headers });
    if (!res.ok) throw new Error(`HTTP ${res.status}`);
    const text = await res.text();
    const bytes = Buffer.byteLength(text, 'utf8');
    if (bytes > maxBytes) {
      throw new Error(`document exceeds ${maxBytes} bytes (${bytes})`);
    }
    return text;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Default fetch capability: one GET per call over the global `fetch`,
 * bounded by a timeout and a byte cap, restricted to http(s) and the
 * optional host allow-list. No retries.
 */
export function createHttpSchemaFetcher(
  options: RemoteOptions = {}
): SchemaFetcher {
  const defaults = DEFAULT_VALIDATOR_OPTIONS.remote;
  const timeoutMs = options.timeoutMs ?? defaults.timeoutMs;
  const maxBytes = options.maxBytesPerDoc ?? defaults.maxBytesPerDoc;
  const allowHosts = options.allowHosts ?? defaults.allowHosts;

  return async (uri: string): Promise<unknown> => {
    const url = new URL(uri);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new Error(`unsupported protocol ${url.protocol} for ${uri}`);
    }
    const host = url.hostname.toLowerCase();
    if (allowHosts.length > 0 && !hostMatchesAllow(host, allowHosts)) {
      throw new Error(`host ${host} is not in the allow-list`);
    }
    url.hash = '';

    const text = await fetchWithBounds(
      url,
      timeoutMs,
      maxBytes,
      options.userAgent
    );
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ParseError({
        message: `Remote schema ${uri} is not valid JSON`,
        ref: uri,
        cause: toError(error),
      });
    }
  };
}
