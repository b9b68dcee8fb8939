import { describe, test, expect } from 'vitest';
import { ErrorCode, EXIT_CODES, getExitCode, type Severity } from '../codes.js';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    const unique = new Set(codes);
    expect(unique.size).toBe(codes.length);
  });

  test('EXIT_CODES covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    const mappedCodes = Object.keys(EXIT_CODES);
    expect(mappedCodes.length).toBe(enumCodes.length);
    for (const code of enumCodes) {
      expect(EXIT_CODES[code]).toBeTypeOf('number');
    }
  });

  test('exit codes are within valid 1-255 range', () => {
    for (const exit of Object.values(EXIT_CODES)) {
      expect(exit).toBeGreaterThanOrEqual(1);
      expect(exit).toBeLessThanOrEqual(255);
    }
  });

  test('definition failures map to distinct exit codes', () => {
    expect(getExitCode(ErrorCode.INVALID_DEFINITION_SHAPE)).toBe(20);
    expect(getExitCode(ErrorCode.UNRESOLVED_REFERENCE)).toBe(22);
    expect(getExitCode(ErrorCode.SEMANTIC_CONSTRAINT_VIOLATION)).toBe(23);
    expect(getExitCode(ErrorCode.INSTANCE_VALIDATION_FAILED)).toBe(40);
  });

  test('includes special codes E012 and E500', () => {
    expect(ErrorCode.UNRESOLVED_REFERENCE).toBe('E012');
    expect(ErrorCode.INTERNAL_ERROR).toBe('E500');
    expect(getExitCode(ErrorCode.INTERNAL_ERROR)).toBe(99);
  });

  test('Severity type is exported and constrained', () => {
    const sev: Severity = 'error';
    expect(sev).toBe('error');
  });
});
