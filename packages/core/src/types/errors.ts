/**
 * Error hierarchy for ratiofit
 * Errors carry a stable code, a context for presentation and an exit code
 */

import { ErrorCode, getExitCode as _getExitCode } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  input?: string; // Raw user input that was rejected
  setting?: string; // Configuration key involved
  file?: string; // Configuration file path
  value?: unknown; // Problematic value
  valueExcerpt?: string; // Short excerpt of a rejected file
  suggestion?: string;
  [key: string]: unknown;
}

export interface RatioErrorParams {
  message: string;
  errorCode: ErrorCode;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all ratiofit errors
 */
export abstract class RatioError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: RatioErrorParams) {
    const { message, errorCode, context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

export type InputErrorReason = 'arity' | 'not-integer' | 'not-positive';

/**
 * Rejected user input (malformed pair, non-digits, zero)
 */
export class InputError extends RatioError {
  public readonly reason: InputErrorReason;

  constructor(params: {
    message: string;
    reason: InputErrorReason;
    context?: ErrorContext & { input?: string };
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.INVALID_INPUT,
      context: params.context,
    });
    this.reason = params.reason;
  }
}

/**
 * Configuration source errors (unreadable or malformed config file).
 * Individual bad values are not errors: they fall back to defaults.
 */
export class ConfigError extends RatioError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext & { setting?: string; file?: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }
}

export function isRatioError(error: unknown): error is RatioError {
  return error instanceof RatioError;
}

/**
 * Wrap anything thrown into a RatioError with INTERNAL_ERROR
 */
export class InternalError extends RatioError {
  constructor(message: string, cause?: Error) {
    super({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause,
    });
  }
}

export function toRatioError(error: unknown): RatioError {
  if (isRatioError(error)) return error;
  if (error instanceof Error) return new InternalError(error.message, error);
  return new InternalError(String(error));
}
