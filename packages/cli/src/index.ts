#!/usr/bin/env tsx

// CLI entry point
// - `ratiofit` / `ratiofit repl`: interactive console (default command).
// - `ratiofit approx <a> <b>` or `ratiofit approx a:b`: one-shot query, text or JSON.
// Config comes from --config <file> first, then --max-denominator/--threshold.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  isErr,
  query,
  resolveConfig,
  toRatioError,
  type ConfigInput,
  type ResolvedConfig,
} from '@ratiofit/core';
import { printConfigDebug, printConfigWarnings } from './debug.js';
import {
  loadConfigFile,
  parseConfigFlags,
  resolveOutputFormat,
  type CliOptions,
  type OutputFormat,
} from './flags.js';
import { parseRatioInput } from './input.js';
import { renderCLIView, renderOutcome, toOutcomeJSON } from './render.js';
import { runRepl } from './repl.js';

function loadRatioConfig(options: CliOptions): ResolvedConfig {
  const sources: ConfigInput[] = [];
  if (typeof options.config === 'string') {
    sources.push(loadConfigFile(options.config));
  }
  sources.push(parseConfigFlags(options));
  const resolved = resolveConfig(...sources);

  if (options.debug === true) {
    printConfigDebug(sources, resolved);
  }
  return resolved;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('ratiofit')
    .description('Approximate a ratio with small whole numbers')
    .version('0.1.0')
    .option('--max-denominator <n>', 'Largest denominator searched (default 64)')
    .option(
      '--threshold <x>',
      'Error below which a single-digit ratio is preferred, 0..1 (default 0.01)'
    )
    .option('--config <file>', 'JSON config file with maxDenominator/singleDigitThreshold')
    .option('--debug', 'Print the effective configuration to stderr', false);

  program
    .command('repl', { isDefault: true })
    .description('Interactive console (default)')
    .action(async (_options: CliOptions, command: Command) => {
      try {
        const resolved = loadRatioConfig(command.optsWithGlobals<CliOptions>());
        await runRepl({
          input: process.stdin,
          output: process.stdout,
          config: resolved.config,
          warnings: resolved.warnings,
          terminal: process.stdin.isTTY === true,
        });
      } catch (err: unknown) {
        handleCliError(err);
      }
    });

  program
    .command('approx')
    .description('Approximate one ratio, given as "a b" or "a:b"')
    .argument('<terms...>', 'the two terms, or a single a:b')
    .option('--out <format>', 'Output format: text|json', 'text')
    .action((terms: string[], _options: CliOptions, command: Command) => {
      try {
        const options = command.optsWithGlobals<CliOptions>();
        const outFormat: OutputFormat = resolveOutputFormat(options.out);
        const resolved = loadRatioConfig(options);
        printConfigWarnings(resolved);

        const parsed = parseRatioInput(terms.join(' '));
        if (isErr(parsed)) {
          throw parsed.error;
        }
        const { a, b } = parsed.value;
        const outcome = query(a, b, resolved.config);

        if (outFormat === 'json') {
          process.stdout.write(
            `${JSON.stringify(toOutcomeJSON(a, b, outcome), null, 2)}\n`
          );
        } else {
          process.stdout.write(`${renderOutcome(outcome).join('\n')}\n`);
        }
      } catch (err: unknown) {
        handleCliError(err);
      }
    });

  return program;
}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, {
    colors: true,
    terminalWidth: process.stderr.columns,
  });

  const error = toRatioError(err);
  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

const program = createProgram();

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
