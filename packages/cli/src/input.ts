import { InputError, err, isErr, ok, type Result } from '@ratiofit/core';

export interface RatioInput {
  a: number;
  b: number;
}

const DIGITS = /^\d+$/;

const USAGE_HINT = 'Enter two numbers separated by a space or a colon, e.g. "16 9" or "16:9".';

function splitTerms(line: string): string[] {
  if (line.includes(':')) {
    return line.split(':').map((part) => part.trim());
  }
  return line.split(/\s+/);
}

function parseTerm(term: string, line: string): Result<number, InputError> {
  if (!DIGITS.test(term)) {
    return err(
      new InputError({
        message: 'Enter valid positive integers.',
        reason: 'not-integer',
        context: { input: line, value: term, suggestion: USAGE_HINT },
      })
    );
  }
  const value = Number(term);
  if (!Number.isSafeInteger(value)) {
    return err(
      new InputError({
        message: `Numbers above ${Number.MAX_SAFE_INTEGER} are not supported.`,
        reason: 'not-integer',
        context: { input: line, value: term },
      })
    );
  }
  if (value <= 0) {
    return err(
      new InputError({
        message: 'Enter positive integers (greater than 0).',
        reason: 'not-positive',
        context: { input: line, value },
      })
    );
  }
  return ok(value);
}

/**
 * Parse "a b" or "a:b" into two positive integers.
 */
export function parseRatioInput(raw: string): Result<RatioInput, InputError> {
  const line = raw.trim();
  const terms = splitTerms(line);
  const [first, second] = terms;
  if (terms.length !== 2 || first === undefined || second === undefined) {
    return err(
      new InputError({
        message: 'Expected two positive integers.',
        reason: 'arity',
        context: { input: line, suggestion: USAGE_HINT },
      })
    );
  }

  // Both terms are checked for format before either is checked for sign.
  const a = parseTerm(first, line);
  const b = parseTerm(second, line);
  for (const term of [a, b]) {
    if (isErr(term) && term.error.reason === 'not-integer') return term;
  }
  if (isErr(a)) return a;
  if (isErr(b)) return b;
  return ok({ a: a.value, b: b.value });
}
