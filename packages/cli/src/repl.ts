import type { EventEmitter } from 'node:events';
import readline from 'node:readline';
import {
  isErr,
  query,
  toRatioError,
  type ConfigWarning,
  type RatioConfig,
} from '@ratiofit/core';
import { parseRatioInput } from './input.js';
import { SEPARATOR, renderOutcome, renderWarningLines } from './render.js';

export const PROMPT = 'ratio (q to quit)> ';

const BANNER_RULE = '='.repeat(45);
const QUIT_WORDS = new Set(['q', 'quit']);

export type ReplExit = 'quit' | 'end' | 'interrupt';

export interface ReplOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  config: RatioConfig;
  warnings?: readonly ConfigWarning[];
  /** Let readline handle Ctrl-C itself; set for interactive terminals. */
  terminal?: boolean;
  /** Source of SIGINT when input is not a terminal (default: process) */
  signals?: EventEmitter;
}

export interface ReplSession {
  rl: readline.Interface;
  done: Promise<ReplExit>;
}

export function bannerLines(warnings: readonly ConfigWarning[]): string[] {
  const lines = [
    BANNER_RULE,
    'ratiofit - ratio approximation console',
    BANNER_RULE,
    'Usage:',
    '  • Enter two numbers separated by a space or a colon (e.g. 16 9 or 16:9)',
    "  • Enter 'q' or 'quit' to exit",
  ];
  if (warnings.length > 0) {
    lines.push('', 'Configuration adjusted:', ...renderWarningLines(warnings));
  }
  lines.push(BANNER_RULE, '');
  return lines;
}

/**
 * Evaluate one non-empty console line into the lines to print. Searched
 * results are framed by separators; the exact shortcut is printed bare.
 */
export function evaluateLine(line: string, config: RatioConfig): string[] {
  const parsed = parseRatioInput(line);
  if (isErr(parsed)) {
    return [parsed.error.message];
  }
  const { a, b } = parsed.value;
  try {
    const outcome = query(a, b, config);
    if (outcome.kind === 'exact') {
      return renderOutcome(outcome);
    }
    return [SEPARATOR, ...renderOutcome(outcome), SEPARATOR];
  } catch (error: unknown) {
    return [`Unexpected error: ${toRatioError(error).message}`];
  }
}

export function startRepl(options: ReplOptions): ReplSession {
  const {
    input,
    output,
    config,
    warnings = [],
    terminal = false,
    signals = process,
  } = options;
  const write = (lines: readonly string[]): void => {
    for (const line of lines) output.write(`${line}\n`);
  };

  write(bannerLines(warnings));

  const rl = readline.createInterface({ input, output, terminal, prompt: PROMPT });
  let exit: ReplExit = 'end';
  let closed = false;

  const finish = (reason: ReplExit, farewell: string): void => {
    exit = reason;
    closed = true;
    write(['', farewell]);
    rl.close();
  };

  const onInterrupt = (): void => {
    if (closed) return;
    finish('interrupt', 'Interrupted, exiting.');
  };

  const done = new Promise<ReplExit>((resolve) => {
    rl.on('close', () => {
      closed = true;
      signals.off('SIGINT', onInterrupt);
      resolve(exit);
    });
  });

  rl.on('line', (raw) => {
    // readline keeps emitting buffered lines after close()
    if (closed) return;
    const line = raw.trim();
    if (line === '') {
      rl.prompt();
      return;
    }
    if (QUIT_WORDS.has(line.toLowerCase())) {
      finish('quit', 'Bye.');
      return;
    }
    write(evaluateLine(line, config));
    rl.prompt();
  });

  // A terminal delivers Ctrl-C through readline; piped input gets the signal.
  rl.on('SIGINT', onInterrupt);
  signals.on('SIGINT', onInterrupt);

  rl.prompt();
  return { rl, done };
}

/**
 * Run the interactive console until quit, end of input or Ctrl-C.
 */
export function runRepl(options: ReplOptions): Promise<ReplExit> {
  return startRepl(options).done;
}
