import type { RatioConfig } from './types/config.js';

export const EXACT_SHORTCUT_MESSAGE = 'Looking for bugs, are we?';

export interface ExactShortcut {
  readonly numerator: number;
  readonly denominator: number;
  readonly error: 0;
  readonly message: string;
}

/**
 * 1:n and n:1 with n beyond the denominator bound are reported as exact.
 *
 * Applied by callers after the search and ahead of its result, including the
 * limit modes the search may have produced for the same input.
 */
export function findExactShortcut(
  a: number,
  b: number,
  config: RatioConfig
): ExactShortcut | undefined {
  if (a === 1 && b > config.maxDenominator) {
    return {
      numerator: 1,
      denominator: b,
      error: 0,
      message: EXACT_SHORTCUT_MESSAGE,
    };
  }
  if (b === 1 && a > config.maxDenominator) {
    return {
      numerator: a,
      denominator: 1,
      error: 0,
      message: EXACT_SHORTCUT_MESSAGE,
    };
  }
  return undefined;
}
