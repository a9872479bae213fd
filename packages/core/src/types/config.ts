/**
 * Configuration for the approximation search
 *
 * Resolved once at startup (see resolveConfig) and passed explicitly to the
 * core; a resolved config is frozen.
 */
export interface RatioConfig {
  /** Largest denominator searched, integer >= 1 (default: 64) */
  readonly maxDenominator: number;
  /**
   * A single-digit ratio is surfaced ahead of the best match when its error
   * is below this value, real in [0, 1] (default: 0.01). 0 disables it.
   */
  readonly singleDigitThreshold: number;
}

export type ConfigKey = keyof RatioConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'maxDenominator',
  'singleDigitThreshold',
];

export const DEFAULT_CONFIG: RatioConfig = Object.freeze({
  maxDenominator: 64,
  singleDigitThreshold: 0.01,
});

/** Searching beyond this bound works but is slow enough to warn about */
export const PRACTICAL_MAX_DENOMINATOR = 100_000;

/** Number of ranked candidates returned outside the limit modes */
export const TOP_CANDIDATES = 5;

/** Raw, unvalidated values from a config file or CLI flags */
export type ConfigInput = Partial<Record<string, unknown>>;

export type ConfigWarningKind = 'invalid-value' | 'unknown-key' | 'advisory';

export interface ConfigWarning {
  kind: ConfigWarningKind;
  field: string;
  value: unknown;
  /** Value used instead, absent when the input was kept or dropped */
  fallback?: number;
  message: string;
}

export interface ResolvedConfig {
  config: RatioConfig;
  warnings: ConfigWarning[];
}
