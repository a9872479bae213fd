import type {
  Approximation,
  Candidate,
  LimitApproximation,
} from './types/approximation.js';
import {
  DEFAULT_CONFIG,
  TOP_CANDIDATES,
  type RatioConfig,
} from './types/config.js';
import { isReduced, roundHalfEven } from './util/rational.js';

function isSingleDigit(candidate: Candidate): boolean {
  return (
    candidate.numerator >= 1 &&
    candidate.numerator <= 9 &&
    candidate.denominator >= 1 &&
    candidate.denominator <= 9
  );
}

function byError(left: Candidate, right: Candidate): number {
  return left.error - right.error;
}

/**
 * Reduced fractions num/den for den = 1..maxDenominator, in ascending
 * denominator order. num is target·den rounded half-to-even; zero and
 * unreduced numerators are skipped.
 */
export function collectCandidates(
  target: number,
  maxDenominator: number
): Candidate[] {
  const candidates: Candidate[] = [];
  for (let denominator = 1; denominator <= maxDenominator; denominator += 1) {
    const numerator = roundHalfEven(target * denominator);
    if (numerator === 0) continue;
    if (!isReduced(numerator, denominator)) continue;
    candidates.push({
      numerator,
      denominator,
      error: Math.abs(numerator / denominator - target),
    });
  }
  return candidates;
}

function limitApproximation(a: number, b: number): LimitApproximation {
  const target = a / b;
  if (a < b) {
    const denominator = Math.max(1, roundHalfEven(b / a));
    return {
      mode: 'limit_small',
      candidate: {
        numerator: 1,
        denominator,
        error: Math.abs(1 / denominator - target),
      },
    };
  }
  const numerator = Math.max(1, roundHalfEven(a / b));
  return {
    mode: 'limit_large',
    candidate: {
      numerator,
      denominator: 1,
      error: Math.abs(numerator - target),
    },
  };
}

/**
 * Approximate a/b by reduced fractions with denominators up to
 * config.maxDenominator.
 *
 * Expects positive integers (callers validate). Never throws: when no
 * fraction in range approximates the target the result is a limit mode with
 * the smaller term locked to 1, and a close single-digit ratio that is not
 * already the best match is reported alongside the top list.
 */
export function approximate(
  a: number,
  b: number,
  config: RatioConfig = DEFAULT_CONFIG
): Approximation {
  const target = a / b;
  const candidates = collectCandidates(target, config.maxDenominator);

  const [first] = candidates;
  if (first === undefined) {
    return limitApproximation(a, b);
  }

  // Array#sort is stable: equal errors keep ascending denominator order.
  const ranked = [...candidates].sort(byError);
  const best = ranked[0] ?? first;
  const top = ranked.slice(0, TOP_CANDIDATES);

  let pick: Candidate | undefined;
  for (const candidate of candidates) {
    if (!isSingleDigit(candidate)) continue;
    if (pick === undefined || candidate.error < pick.error) pick = candidate;
  }

  if (
    pick !== undefined &&
    pick.error < config.singleDigitThreshold &&
    (pick.numerator !== best.numerator ||
      pick.denominator !== best.denominator)
  ) {
    return { mode: 'single_digit_preferred', pick, top };
  }

  return { mode: 'normal', top };
}
