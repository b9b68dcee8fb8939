import { describe, expect, it } from 'vitest';
import fc from 'fast-check';

import {
  escapePointerToken,
  formatPointer,
  hasPointer,
  parsePointer,
  removePointer,
  resolvePointer,
  stripPropertiesPrefix,
  unescapePointerToken,
} from '../json-pointer.js';
import type { JsonObject } from '../../types/schema.js';

describe('json-pointer', () => {
  describe('parsePointer', () => {
    it('accepts the empty pointer in both notations', () => {
      const plain = parsePointer('');
      const fragment = parsePointer('#');

      expect(plain.isOk() && plain.value).toEqual([]);
      expect(fragment.isOk() && fragment.value).toEqual([]);
    });

    it('unescapes ~1 and ~0 in tokens', () => {
      const parsed = parsePointer('#/a~1b/c~0d');
      expect(parsed.isOk() && parsed.value).toEqual(['a/b', 'c~d']);
    });

    it('rejects pointers without a leading slash', () => {
      const parsed = parsePointer('a/b');
      expect(parsed.isErr() && parsed.error).toBe(
        "JSON Pointer must be '' or start with '/': a/b"
      );
    });

    it('rejects invalid escapes', () => {
      const parsed = parsePointer('/a~2');
      expect(parsed.isErr() && parsed.error).toBe(
        'JSON Pointer contains an invalid escape: /a~2'
      );
    });

    it('restores the tokens it was formatted from', () => {
      fc.assert(
        fc.property(fc.array(fc.string()), (tokens) => {
          const parsed = parsePointer(formatPointer(tokens));
          return parsed.isOk() && JSON.stringify(parsed.value) === JSON.stringify(tokens);
        })
      );
    });
  });

  it('escapes tokens in the right order', () => {
    expect(escapePointerToken('~1')).toBe('~01');
    expect(unescapePointerToken('~01')).toBe('~1');
    expect(formatPointer(['a/b', 'c~d'])).toBe('/a~1b/c~0d');
  });

  describe('resolvePointer', () => {
    const document: JsonObject = {
      a: { b: [10, 20] },
      nothing: null,
      'x/y': 'slashed',
    };

    it('walks objects and arrays', () => {
      expect(resolvePointer(document, '#/a/b/1')).toEqual({
        found: true,
        value: 20,
      });
      expect(resolvePointer(document, '/x~1y')).toEqual({
        found: true,
        value: 'slashed',
      });
      expect(resolvePointer(document, '#')).toEqual({
        found: true,
        value: document,
      });
    });

    it('reports absent locations as not found', () => {
      expect(resolvePointer(document, '/a/b/2')).toEqual({ found: false });
      expect(resolvePointer(document, '/a/b/01')).toEqual({ found: false });
      expect(resolvePointer(document, '/a/b/-')).toEqual({ found: false });
      expect(resolvePointer(document, '/a/c')).toEqual({ found: false });
      expect(resolvePointer(document, '/nothing/deeper')).toEqual({
        found: false,
      });
      expect(resolvePointer(document, 'no-slash')).toEqual({ found: false });
    });

    it('does not follow inherited properties', () => {
      expect(resolvePointer(document, '/toString')).toEqual({ found: false });
    });
  });

  describe('hasPointer', () => {
    it('treats null values as absent', () => {
      const document: JsonObject = { empty: null, zero: 0, flag: false };

      expect(hasPointer(document, '/empty')).toBe(false);
      expect(hasPointer(document, '/zero')).toBe(true);
      expect(hasPointer(document, '/flag')).toBe(true);
      expect(hasPointer(document, '/missing')).toBe(false);
    });
  });

  describe('removePointer', () => {
    it('removes an object member', () => {
      const document: JsonObject = { a: { b: 1, c: 2 } };

      expect(removePointer(document, '/a/b')).toBe(true);
      expect(document).toEqual({ a: { c: 2 } });
    });

    it('splices an array element', () => {
      const document: JsonObject = { list: [1, 2, 3] };

      expect(removePointer(document, '/list/1')).toBe(true);
      expect(document).toEqual({ list: [1, 3] });
    });

    it('is a no-op for absent or malformed locations', () => {
      const document: JsonObject = { list: [1], a: { b: 1 } };

      expect(removePointer(document, '')).toBe(false);
      expect(removePointer(document, '/missing/child')).toBe(false);
      expect(removePointer(document, '/a/missing')).toBe(false);
      expect(removePointer(document, '/list/5')).toBe(false);
      expect(removePointer(document, '/list/name')).toBe(false);
      expect(removePointer(document, 'a/b')).toBe(false);
      expect(document).toEqual({ list: [1], a: { b: 1 } });
    });
  });

  describe('stripPropertiesPrefix', () => {
    it('drops only the first /properties segment', () => {
      expect(stripPropertiesPrefix('/properties/A/properties/B')).toBe(
        '/A/properties/B'
      );
      expect(stripPropertiesPrefix('/properties/Secret')).toBe('/Secret');
    });
  });
});
