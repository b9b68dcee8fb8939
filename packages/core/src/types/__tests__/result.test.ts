import { describe, it, expect } from 'vitest';

import { Ok, Err, ok, err, isOk, isErr, type Result } from '../result.js';

describe('Result', () => {
  describe('Ok', () => {
    it('carries its value and tag', () => {
      const result = new Ok(42);

      expect(result.value).toBe(42);
      expect(result._tag).toBe('Ok');
      expect(result.isOk()).toBe(true);
      expect(result.isErr()).toBe(false);
    });

    it('maps and flatMaps the value', () => {
      const mapped = ok(10).map((x) => x * 2);
      expect(mapped.isOk() && mapped.value).toBe(20);

      const chained = ok(5).flatMap((x) => ok(x * 3));
      expect(chained.isOk() && chained.value).toBe(15);

      const failed = ok(5).flatMap(() => err('failed'));
      expect(failed.isErr() && failed.error).toBe('failed');
    });

    it('ignores mapErr and unwraps to its value', () => {
      const result = ok('kept');

      expect(result.mapErr(() => 'changed').isOk()).toBe(true);
      expect(result.unwrap()).toBe('kept');
      expect(result.unwrapOr('fallback')).toBe('kept');
    });
  });

  describe('Err', () => {
    it('carries its error and tag', () => {
      const result = new Err('failure');

      expect(result.error).toBe('failure');
      expect(result._tag).toBe('Err');
      expect(result.isOk()).toBe(false);
      expect(result.isErr()).toBe(true);
    });

    it('short-circuits map and flatMap', () => {
      const result = err('boom');

      const mapped = result.map(() => 'never');
      expect(mapped.isErr() && mapped.error).toBe('boom');

      const chained = result.flatMap(() => ok('never'));
      expect(chained.isErr() && chained.error).toBe('boom');
    });

    it('maps the error', () => {
      const mapped = err('original').mapErr((e) => `wrapped: ${e}`);

      expect(mapped.isErr() && mapped.error).toBe('wrapped: original');
    });

    it('rethrows Error values on unwrap', () => {
      const cause = new Error('root cause');

      expect(() => err(cause).unwrap()).toThrow(cause);
    });

    it('wraps other values on unwrap', () => {
      expect(() => err('plain').unwrap()).toThrow(
        'Called unwrap on an Err value: plain'
      );
    });

    it('falls back on unwrapOr', () => {
      expect(err('error').unwrapOr('fallback')).toBe('fallback');
    });
  });

  describe('type guards', () => {
    it('narrow a Result union', () => {
      const good: Result<string, number> = ok('value');
      const bad: Result<string, number> = err(404);

      expect(isOk(good)).toBe(true);
      expect(isErr(good)).toBe(false);
      expect(isOk(bad)).toBe(false);
      expect(isErr(bad)).toBe(true);

      if (isErr(bad)) {
        expect(bad.error).toBe(404);
      }
    });
  });
});
