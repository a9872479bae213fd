import {
  formatError,
  formatRatio,
  isLimitApproximation,
  type Candidate,
  type CLIErrorView,
  type ConfigWarning,
  type QueryOutcome,
} from '@ratiofit/core';

// Minimal ANSI helpers (no external deps)
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  bold: '\u001B[1m',
};

export const SEPARATOR = '-'.repeat(45);

export const LIMIT_NOTICE = [
  'Warning: outside the regular search range.',
  'The smaller term was locked to 1 and the',
  'closest ratio computed from it.',
  '',
  'Note: this may not be the closest ratio.',
];

function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

function wrapText(text: string, width: number): string {
  if (!text) return '';
  const words = text.split(/\s+/);
  const lines: string[] = [];
  let line = '';
  for (const word of words) {
    if ((line + (line ? ' ' : '') + word).length > width) {
      if (line) lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines.join('\n');
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines: string[] = [];

  const title = `❌ ${view.title}`;
  lines.push(
    colorize(colorize(title, view.colors, ANSI.bold), view.colors, ANSI.red)
  );

  if (view.location) {
    lines.push(wrapText(`📍 ${view.location}`, width));
  }
  if (view.excerpt) {
    lines.push(wrapText(`Excerpt: ${view.excerpt}`, width));
  }
  if (view.workaround) {
    lines.push(wrapText(`💡 ${view.workaround}`, width));
  }

  return lines.join('\n');
}

function candidateLines(label: string, candidate: Candidate): string[] {
  return [
    `${label} [${formatRatio(candidate.numerator, candidate.denominator)}]`,
    `    error ${formatError(candidate.error)}`,
  ];
}

/**
 * Text lines for one query, shared by the console loop and `approx`.
 */
export function renderOutcome(outcome: QueryOutcome): string[] {
  if (outcome.kind === 'exact') {
    return [
      ...candidateLines('Ratio 1', outcome),
      '',
      outcome.message,
    ];
  }

  const { approximation } = outcome;
  if (isLimitApproximation(approximation)) {
    return [
      ...candidateLines('Special ratio', approximation.candidate),
      '',
      ...LIMIT_NOTICE,
    ];
  }
  switch (approximation.mode) {
    case 'single_digit_preferred':
      return [
        ...candidateLines('Single-digit ratio', approximation.pick),
        SEPARATOR,
        ...approximation.top.flatMap((c, i) => candidateLines(`Ratio ${i + 1}`, c)),
      ];
    case 'normal':
      return approximation.top.flatMap((c, i) =>
        candidateLines(`Ratio ${i + 1}`, c)
      );
  }
}

export interface OutcomeJSON {
  input: { a: number; b: number };
  kind: QueryOutcome['kind'];
  mode?: string;
  ratio?: Candidate;
  message?: string;
  pick?: Candidate;
  candidate?: Candidate;
  top?: Candidate[];
}

function plain(candidate: Candidate): Candidate {
  return {
    numerator: candidate.numerator,
    denominator: candidate.denominator,
    error: candidate.error,
  };
}

export function toOutcomeJSON(a: number, b: number, outcome: QueryOutcome): OutcomeJSON {
  const input = { a, b };
  if (outcome.kind === 'exact') {
    return {
      input,
      kind: 'exact',
      ratio: plain(outcome),
      message: outcome.message,
    };
  }
  const { approximation } = outcome;
  if (isLimitApproximation(approximation)) {
    return {
      input,
      kind: 'approximation',
      mode: approximation.mode,
      candidate: plain(approximation.candidate),
    };
  }
  switch (approximation.mode) {
    case 'single_digit_preferred':
      return {
        input,
        kind: 'approximation',
        mode: approximation.mode,
        pick: plain(approximation.pick),
        top: approximation.top.map(plain),
      };
    case 'normal':
      return {
        input,
        kind: 'approximation',
        mode: approximation.mode,
        top: approximation.top.map(plain),
      };
  }
}

export function renderWarningLines(warnings: readonly ConfigWarning[]): string[] {
  return warnings.map((w) => `  ⚠ ${w.message}`);
}
