import { EventEmitter } from 'node:events';
import { PassThrough, Readable, Writable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONFIG,
  EXACT_SHORTCUT_MESSAGE,
  query,
  resolveConfig,
} from '@ratiofit/core';

import { SEPARATOR, renderOutcome } from './render.js';
import { PROMPT, bannerLines, evaluateLine, runRepl, startRepl } from './repl.js';

function collectOutput(): { output: Writable; text: () => string } {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { output, text: () => chunks.join('') };
}

function afterBanner(text: string): string {
  const banner = bannerLines([]).map((line) => `${line}\n`).join('');
  expect(text.startsWith(banner)).toBe(true);
  return text.slice(banner.length);
}

describe('bannerLines', () => {
  it('lists configuration warnings under the usage notes', () => {
    const { warnings } = resolveConfig({ maxDenominator: 0 });
    const lines = bannerLines(warnings);

    expect(lines.slice(6, 9)).toEqual([
      '',
      'Configuration adjusted:',
      '  ⚠ Invalid "maxDenominator" value 0, reset to 64.',
    ]);
  });

  it('omits the warning block when there is nothing to report', () => {
    expect(bannerLines([])).not.toContain('Configuration adjusted:');
  });
});

describe('evaluateLine', () => {
  it('frames a result between separators', () => {
    expect(evaluateLine('16:9', DEFAULT_CONFIG)).toEqual([
      SEPARATOR,
      ...renderOutcome(query(16, 9, DEFAULT_CONFIG)),
      SEPARATOR,
    ]);
  });

  it('prints the exact shortcut without separators', () => {
    const lines = evaluateLine('1 65', DEFAULT_CONFIG);

    expect(lines).toEqual(renderOutcome(query(1, 65, DEFAULT_CONFIG)));
    expect(lines).toEqual(['Ratio 1 [1:65]', '    error =0', '', EXACT_SHORTCUT_MESSAGE]);
  });

  it('returns the input error message alone', () => {
    expect(evaluateLine('0 9', DEFAULT_CONFIG)).toEqual([
      'Enter positive integers (greater than 0).',
    ]);
  });
});

describe('runRepl', () => {
  it('answers a query and quits on q', async () => {
    const { output, text } = collectOutput();

    const exit = await runRepl({
      input: Readable.from('16 9\nq\n'),
      output,
      config: DEFAULT_CONFIG,
    });

    expect(exit).toBe('quit');
    expect(afterBanner(text()).split('\n')).toEqual([
      `${PROMPT}${SEPARATOR}`,
      ...renderOutcome(query(16, 9, DEFAULT_CONFIG)),
      SEPARATOR,
      PROMPT,
      'Bye.',
      '',
    ]);
  });

  it('treats quit case-insensitively', async () => {
    const { output } = collectOutput();

    await expect(
      runRepl({ input: Readable.from('QuIt\n'), output, config: DEFAULT_CONFIG })
    ).resolves.toBe('quit');
  });

  it('prompts again on empty lines', async () => {
    const { output, text } = collectOutput();

    await runRepl({ input: Readable.from('\n   \nq\n'), output, config: DEFAULT_CONFIG });

    expect(afterBanner(text())).toBe(`${PROMPT}${PROMPT}${PROMPT}\nBye.\n`);
  });

  it('reports bad input and keeps going', async () => {
    const { output, text } = collectOutput();

    await runRepl({ input: Readable.from('abc\nq\n'), output, config: DEFAULT_CONFIG });

    expect(afterBanner(text())).toBe(
      `${PROMPT}Expected two positive integers.\n${PROMPT}\nBye.\n`
    );
  });

  it('shows the exact shortcut for 1:n beyond the bound', async () => {
    const { output, text } = collectOutput();

    await runRepl({ input: Readable.from('1:65\nq\n'), output, config: DEFAULT_CONFIG });

    expect(afterBanner(text())).toBe(
      `${PROMPT}Ratio 1 [1:65]\n    error =0\n\n${EXACT_SHORTCUT_MESSAGE}\n${PROMPT}\nBye.\n`
    );
  });

  it('ends quietly when input runs out', async () => {
    const { output, text } = collectOutput();

    const exit = await runRepl({
      input: Readable.from('3:2\n'),
      output,
      config: DEFAULT_CONFIG,
    });

    expect(exit).toBe('end');
    expect(text()).not.toContain('Bye.');
  });

  it('ignores lines buffered after quit', async () => {
    const { output, text } = collectOutput();

    await runRepl({
      input: Readable.from('16 9\nq\n3 2\n'),
      output,
      config: DEFAULT_CONFIG,
    });

    expect(text()).not.toContain('Ratio 1 [3:2]');
    expect(text().endsWith('\nBye.\n')).toBe(true);
  });

  it('uses the configured bound', async () => {
    const { output, text } = collectOutput();
    const config = { maxDenominator: 10, singleDigitThreshold: 0.01 };

    await runRepl({ input: Readable.from('16 9\nq\n'), output, config });

    expect(text()).toContain('Ratio 2 [9:5]\n    error ≈0.02222222\n');
  });

  it('exits on Ctrl-C from the terminal with a notice', async () => {
    const { output, text } = collectOutput();
    const signals = new EventEmitter();

    const { rl, done } = startRepl({
      input: new PassThrough(),
      output,
      config: DEFAULT_CONFIG,
      signals,
    });
    rl.emit('SIGINT');

    await expect(done).resolves.toBe('interrupt');
    expect(afterBanner(text())).toBe(`${PROMPT}\nInterrupted, exiting.\n`);
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });

  it('exits on a SIGINT delivered to the process when input is piped', async () => {
    const { output, text } = collectOutput();
    const signals = new EventEmitter();

    const done = runRepl({
      input: new PassThrough(),
      output,
      config: DEFAULT_CONFIG,
      signals,
    });
    signals.emit('SIGINT');

    await expect(done).resolves.toBe('interrupt');
    expect(afterBanner(text())).toBe(`${PROMPT}\nInterrupted, exiting.\n`);
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });

  it('stops listening for SIGINT once input ends', async () => {
    const { output } = collectOutput();
    const signals = new EventEmitter();

    await runRepl({ input: Readable.from('q\n'), output, config: DEFAULT_CONFIG, signals });

    expect(signals.listenerCount('SIGINT')).toBe(0);
  });
});
