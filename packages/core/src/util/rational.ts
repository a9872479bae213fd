// Integer helpers for small-denominator fractions. Inputs stay within
// Number.MAX_SAFE_INTEGER; bigint is not needed for a bounded search.

export function gcd(a: number, b: number): number {
  a = Math.abs(a);
  b = Math.abs(b);
  while (b !== 0) {
    const t = b;
    b = a % b;
    a = t;
  }
  return a;
}

export function isReduced(numerator: number, denominator: number): boolean {
  return gcd(numerator, denominator) === 1;
}

// Bankers rounding (round-half-even) to an integer. The fractional part of
// a finite double is computed exactly, so ties are exact ties.
export function roundHalfEven(x: number): number {
  if (!Number.isFinite(x)) return x;
  const floor = Math.floor(x);
  const frac = x - floor;
  if (frac > 0.5) return floor + 1;
  if (frac < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}
