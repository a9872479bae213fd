// Float "exact" matches are rarely bit-identical to zero, hence the tiers.
const ZERO_EPSILON = 1e-16;
const DISPLAY_EPSILON = 1e-8;
const DISPLAY_DIGITS = 8;

/**
 * Display form of an approximation error: "=0", "<0.00000001" or
 * "≈" followed by the error with 8 decimals.
 */
export function formatError(error: number): string {
  if (error < ZERO_EPSILON) return '=0';
  if (error < DISPLAY_EPSILON) return `<${DISPLAY_EPSILON.toFixed(DISPLAY_DIGITS)}`;
  return `≈${error.toFixed(DISPLAY_DIGITS)}`;
}

export function formatRatio(numerator: number, denominator: number): string {
  return `${numerator}:${denominator}`;
}
