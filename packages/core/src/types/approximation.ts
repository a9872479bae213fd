/**
 * A reduced fraction numerator/denominator and its distance to the target.
 */
export interface Candidate {
  readonly numerator: number;
  readonly denominator: number;
  /** |numerator / denominator − a / b| */
  readonly error: number;
}

export const APPROXIMATION_MODES = [
  'normal',
  'single_digit_preferred',
  'limit_small',
  'limit_large',
] as const;

export type ApproximationMode = (typeof APPROXIMATION_MODES)[number];

export interface NormalApproximation {
  readonly mode: 'normal';
  /** Up to TOP_CANDIDATES candidates, error ascending */
  readonly top: readonly Candidate[];
}

export interface SingleDigitApproximation {
  readonly mode: 'single_digit_preferred';
  /** Best one-digit-over-one-digit candidate, shown ahead of `top` */
  readonly pick: Candidate;
  readonly top: readonly Candidate[];
}

/**
 * No reduced fraction within the bound approximates the target; the smaller
 * term is locked to 1.
 */
export interface LimitApproximation {
  readonly mode: 'limit_small' | 'limit_large';
  readonly candidate: Candidate;
}

export type Approximation =
  | NormalApproximation
  | SingleDigitApproximation
  | LimitApproximation;

export function isLimitApproximation(
  approximation: Approximation
): approximation is LimitApproximation {
  return (
    approximation.mode === 'limit_small' || approximation.mode === 'limit_large'
  );
}

/**
 * Candidates a result carries, in display order. The single-digit pick is
 * listed first and is not removed from the top list.
 */
export function listCandidates(approximation: Approximation): Candidate[] {
  switch (approximation.mode) {
    case 'normal':
      return [...approximation.top];
    case 'single_digit_preferred':
      return [approximation.pick, ...approximation.top];
    case 'limit_small':
    case 'limit_large':
      return [approximation.candidate];
  }
}
