import { describe, test, expect } from 'vitest';
import { ErrorCode, EXIT_CODES, getExitCode } from '../codes.js';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    expect(new Set(codes).size).toBe(codes.length);
  });

  test('EXIT_CODES covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    expect(Object.keys(EXIT_CODES)).toHaveLength(enumCodes.length);
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

  test('getExitCode maps input errors to usage exit status', () => {
    expect(getExitCode(ErrorCode.INVALID_INPUT)).toBe(2);
    expect(getExitCode(ErrorCode.INTERNAL_ERROR)).toBe(99);
  });
});
