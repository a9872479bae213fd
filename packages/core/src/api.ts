import { approximate } from './approximator.js';
import { findExactShortcut, type ExactShortcut } from './shortcut.js';
import type { Approximation } from './types/approximation.js';
import type { RatioConfig } from './types/config.js';

// Shells go through query(): it is the single place that orders the exact
// shortcut ahead of the search result.

export interface ExactOutcome extends ExactShortcut {
  readonly kind: 'exact';
}

export interface ApproximationOutcome {
  readonly kind: 'approximation';
  readonly approximation: Approximation;
}

export type QueryOutcome = ExactOutcome | ApproximationOutcome;

/**
 * Answer one (a, b) query the way every shell displays it.
 *
 * The search always runs; when the exact shortcut applies its result is
 * discarded in favour of the shortcut.
 */
export function query(a: number, b: number, config: RatioConfig): QueryOutcome {
  const approximation = approximate(a, b, config);
  const shortcut = findExactShortcut(a, b, config);
  if (shortcut) {
    return { kind: 'exact', ...shortcut };
  }
  return { kind: 'approximation', approximation };
}
