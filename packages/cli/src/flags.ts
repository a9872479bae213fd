import fs from 'node:fs';
import path from 'node:path';
import { ConfigError, ErrorCode, type ConfigInput } from '@ratiofit/core';

export type OutputFormat = 'text' | 'json';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  maxDenominator?: string;
  threshold?: string;
  config?: string;
  debug?: boolean;
  out?: string;
  // Allow additional CLI options that we don't process
  [key: string]: unknown;
}

const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Decimal literals become numbers; anything else is passed through as the
 * raw string so config validation reports it verbatim.
 */
export function parseNumericFlag(raw: string | undefined): unknown {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return NUMERIC.test(trimmed) ? Number(trimmed) : raw;
}

/**
 * Map --max-denominator/--threshold onto config keys.
 */
export function parseConfigFlags(
  options: Pick<CliOptions, 'maxDenominator' | 'threshold'>
): ConfigInput {
  return {
    maxDenominator: parseNumericFlag(options.maxDenominator),
    singleDigitThreshold: parseNumericFlag(options.threshold),
  };
}

const EXCERPT_LENGTH = 60;

function excerptOf(text: string): string | undefined {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  if (collapsed === '') return undefined;
  return collapsed.length > EXCERPT_LENGTH
    ? `${collapsed.slice(0, EXCERPT_LENGTH)}…`
    : collapsed;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Read a JSON config file. The file itself must exist and hold a JSON
 * object; the values inside are validated later by resolveConfig.
 */
export function loadConfigFile(file: string, cwd = process.cwd()): ConfigInput {
  const abs = path.resolve(cwd, file);
  if (!fs.existsSync(abs)) {
    throw new ConfigError({
      message: `Config file not found: ${abs}`,
      context: { file: abs },
    });
  }

  let text = '';
  let parsed: unknown;
  try {
    text = fs.readFileSync(abs, 'utf8');
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    throw new ConfigError({
      message: 'Config file is not valid JSON',
      errorCode: ErrorCode.PARSE_ERROR,
      context: {
        file: abs,
        valueExcerpt: excerptOf(text),
        suggestion: 'Check the file for JSON syntax errors.',
      },
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError({
      message: 'Config file must contain a JSON object',
      context: {
        file: abs,
        suggestion: 'Use {"maxDenominator": 64, "singleDigitThreshold": 0.01}.',
      },
    });
  }
  return parsed;
}

/**
 * Resolve output format flag into a known format or throw a ConfigError.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'text';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'text' || raw === 'json') {
    return raw;
  }
  throw new ConfigError({
    message: `Invalid --out value "${String(value)}"`,
    context: {
      setting: 'out',
      value,
      suggestion: 'Supported formats are "text" and "json".',
    },
  });
}
