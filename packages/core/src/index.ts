// @ratiofit/core entry point
//
// - query() is what shells call: search plus the exact-shortcut rule.
// - approximate() is the bare search; findExactShortcut() the call-site rule.
// - resolveConfig() turns raw config values into a frozen RatioConfig and
//   the warnings to show for values that fell back to defaults.

export { query, type QueryOutcome, type ExactOutcome, type ApproximationOutcome } from './api.js';
export { approximate, collectCandidates } from './approximator.js';
export {
  findExactShortcut,
  EXACT_SHORTCUT_MESSAGE,
  type ExactShortcut,
} from './shortcut.js';
export { formatError, formatRatio } from './format.js';

export {
  APPROXIMATION_MODES,
  isLimitApproximation,
  listCandidates,
  type Approximation,
  type ApproximationMode,
  type Candidate,
  type LimitApproximation,
  type NormalApproximation,
  type SingleDigitApproximation,
} from './types/approximation.js';

// Configuration
export {
  CONFIG_KEYS,
  DEFAULT_CONFIG,
  PRACTICAL_MAX_DENOMINATOR,
  TOP_CANDIDATES,
  type ConfigInput,
  type ConfigKey,
  type ConfigWarning,
  type ConfigWarningKind,
  type RatioConfig,
  type ResolvedConfig,
} from './types/config.js';
export { resolveConfig, mergeConfigInputs } from './config/resolve-config.js';
export { CONFIG_SCHEMA } from './config/config-schema.js';

// Errors
export { ErrorCode, getExitCode } from './errors/codes.js';
export { ErrorPresenter, type CLIErrorView } from './errors/presenter.js';
export {
  RatioError,
  InputError,
  ConfigError,
  InternalError,
  isRatioError,
  toRatioError,
  type ErrorContext,
  type InputErrorReason,
} from './types/errors.js';
export { type Result, type Ok, type Err, ok, err, isErr } from './types/result.js';

export { gcd, isReduced, roundHalfEven } from './util/rational.js';
