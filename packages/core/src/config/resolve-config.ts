import {
  CONFIG_KEYS,
  DEFAULT_CONFIG,
  PRACTICAL_MAX_DENOMINATOR,
  type ConfigInput,
  type ConfigKey,
  type ConfigWarning,
  type RatioConfig,
  type ResolvedConfig,
} from '../types/config.js';
import { collectConfigIssues, getConfigValidator } from './config-schema.js';

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (Array.isArray(value)) return 'an array';
  if (value !== null && typeof value === 'object') return 'an object';
  return String(value);
}

/**
 * Merge config sources field by field; later sources win. Keys holding
 * undefined are treated as absent. Every key, "__proto__" included, ends up
 * as an own property of the result.
 */
export function mergeConfigInputs(sources: readonly ConfigInput[]): ConfigInput {
  const merged = new Map<string, unknown>();
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) merged.set(key, value);
    }
  }
  return Object.fromEntries(merged);
}

/**
 * Resolve raw config values into a frozen RatioConfig.
 *
 * Never throws for bad values: each invalid field falls back to its default
 * and produces exactly one warning, unknown keys are dropped with a warning.
 */
export function resolveConfig(...sources: ConfigInput[]): ResolvedConfig {
  const merged = mergeConfigInputs(sources);
  const validate = getConfigValidator();
  const issues = validate(merged)
    ? { invalidFields: new Set<string>(), unknownKeys: [] }
    : collectConfigIssues(validate.errors);

  const values: Record<ConfigKey, number> = { ...DEFAULT_CONFIG };
  const warnings: ConfigWarning[] = [];

  for (const key of CONFIG_KEYS) {
    if (!(key in merged)) continue;
    const value = merged[key];
    if (issues.invalidFields.has(key) || typeof value !== 'number') {
      const fallback = DEFAULT_CONFIG[key];
      warnings.push({
        kind: 'invalid-value',
        field: key,
        value,
        fallback,
        message: `Invalid "${key}" value ${describeValue(value)}, reset to ${fallback}.`,
      });
      continue;
    }
    values[key] = value;
  }

  for (const key of issues.unknownKeys) {
    if (isConfigKey(key)) continue;
    warnings.push({
      kind: 'unknown-key',
      field: key,
      value: merged[key],
      message: `Unknown config key "${key}" ignored.`,
    });
  }

  if (values.maxDenominator > PRACTICAL_MAX_DENOMINATOR) {
    warnings.push({
      kind: 'advisory',
      field: 'maxDenominator',
      value: values.maxDenominator,
      message: `"maxDenominator" is ${values.maxDenominator}; searching more than ${PRACTICAL_MAX_DENOMINATOR} denominators is slow.`,
    });
  }

  const config: RatioConfig = Object.freeze({
    maxDenominator: values.maxDenominator,
    singleDigitThreshold: values.singleDigitThreshold,
  });
  return { config, warnings };
}
