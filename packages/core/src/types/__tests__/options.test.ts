import { describe, it, expect } from 'vitest';

import {
  DEFAULT_VALIDATOR_OPTIONS,
  resolveValidatorOptions,
  type ValidatorOptions,
} from '../options.js';
import { ConfigError } from '../errors.js';

describe('ValidatorOptions', () => {
  describe('resolveValidatorOptions defaulting behavior', () => {
    it('should apply all defaults when no options provided', () => {
      const resolved = resolveValidatorOptions();

      expect(resolved.remote.timeoutMs).toBe(8000);
      expect(resolved.remote.maxBytesPerDoc).toBe(5 * 1024 * 1024);
      expect(resolved.remote.allowHosts).toEqual([]);
      expect(resolved.remote.userAgent).toBeUndefined();
      expect(resolved.validateFormats).toBe(true);
      expect(resolved.allErrors).toBe(true);
      expect(resolved.defaultTimeoutInMinutes).toBe(120);
      expect(resolved.debug).toBe(false);
      expect(resolved.fetcher).toBeUndefined();
      expect(resolved.logger).toBeUndefined();
      expect(resolved.metrics).toBeUndefined();
    });

    it('should merge partial remote options over defaults', () => {
      const resolved = resolveValidatorOptions({
        remote: { timeoutMs: 500, allowHosts: ['schemas.example.com'] },
      });

      expect(resolved.remote.timeoutMs).toBe(500);
      expect(resolved.remote.maxBytesPerDoc).toBe(
        DEFAULT_VALIDATOR_OPTIONS.remote.maxBytesPerDoc
      );
      expect(resolved.remote.allowHosts).toEqual(['schemas.example.com']);
    });

    it('should not share the default allow-list array', () => {
      const resolved = resolveValidatorOptions();
      resolved.remote.allowHosts.push('mutated.example.com');

      expect(DEFAULT_VALIDATOR_OPTIONS.remote.allowHosts).toEqual([]);
    });

    it('should keep explicit false toggles', () => {
      const resolved = resolveValidatorOptions({
        validateFormats: false,
        allErrors: false,
      });

      expect(resolved.validateFormats).toBe(false);
      expect(resolved.allErrors).toBe(false);
    });
  });

  describe('validation', () => {
    const invalid: Array<[ValidatorOptions, string]> = [
      [{ remote: { timeoutMs: 0 } }, 'remote.timeoutMs'],
      [{ remote: { maxBytesPerDoc: -1 } }, 'remote.maxBytesPerDoc'],
      [{ defaultTimeoutInMinutes: Number.NaN }, 'defaultTimeoutInMinutes'],
    ];

    it.each(invalid)('rejects %j', (options, setting) => {
      let caught: unknown;
      try {
        resolveValidatorOptions(options);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      expect(caught instanceof ConfigError && caught.setting).toBe(setting);
    });

    it('reports the offending value', () => {
      expect(() =>
        resolveValidatorOptions({ defaultTimeoutInMinutes: -5 })
      ).toThrow('defaultTimeoutInMinutes must be a positive number, got -5');
    });
  });
});
