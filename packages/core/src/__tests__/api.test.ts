import { describe, it, expect } from 'vitest';

import { query } from '../api.js';
import { approximate } from '../approximator.js';
import { EXACT_SHORTCUT_MESSAGE, findExactShortcut } from '../shortcut.js';
import { DEFAULT_CONFIG } from '../types/config.js';

describe('findExactShortcut', () => {
  it('applies to 1:n and n:1 with n beyond the bound', () => {
    expect(findExactShortcut(1, 65, DEFAULT_CONFIG)).toEqual({
      numerator: 1,
      denominator: 65,
      error: 0,
      message: EXACT_SHORTCUT_MESSAGE,
    });
    expect(findExactShortcut(500, 1, DEFAULT_CONFIG)).toMatchObject({
      numerator: 500,
      denominator: 1,
      error: 0,
    });
  });

  it('does not apply at or below the bound', () => {
    expect(findExactShortcut(1, 64, DEFAULT_CONFIG)).toBeUndefined();
    expect(findExactShortcut(64, 1, DEFAULT_CONFIG)).toBeUndefined();
  });

  it('does not apply when neither term is 1', () => {
    expect(findExactShortcut(2, 1000, DEFAULT_CONFIG)).toBeUndefined();
  });

  it('does not apply to 1:1', () => {
    expect(findExactShortcut(1, 1, DEFAULT_CONFIG)).toBeUndefined();
  });

  it('follows the configured bound', () => {
    const config = { ...DEFAULT_CONFIG, maxDenominator: 10 };
    expect(findExactShortcut(1, 11, config)?.denominator).toBe(11);
  });
});

describe('query', () => {
  it('overrides a normal search result for 1:65', () => {
    // the search itself finds 1:64 first
    const searched = approximate(1, 65, DEFAULT_CONFIG);
    expect(searched.mode).toBe('normal');

    expect(query(1, 65, DEFAULT_CONFIG)).toEqual({
      kind: 'exact',
      numerator: 1,
      denominator: 65,
      error: 0,
      message: EXACT_SHORTCUT_MESSAGE,
    });
  });

  it('overrides a limit-mode search result for 1:1000', () => {
    expect(approximate(1, 1000, DEFAULT_CONFIG).mode).toBe('limit_small');
    expect(query(1, 1000, DEFAULT_CONFIG).kind).toBe('exact');
  });

  it('passes other results through', () => {
    expect(query(16, 9, DEFAULT_CONFIG)).toEqual({
      kind: 'approximation',
      approximation: approximate(16, 9, DEFAULT_CONFIG),
    });
    expect(query(2, 1000, DEFAULT_CONFIG)).toEqual({
      kind: 'approximation',
      approximation: {
        mode: 'limit_small',
        candidate: { numerator: 1, denominator: 500, error: 0 },
      },
    });
  });
});
