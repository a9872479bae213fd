/**
 * ErrorPresenter - pure presentation layer for RatioError instances
 * - No business logic; formats into view objects the CLI renders
 */

import type { ErrorCode } from './codes.js';
import type { RatioError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: RatioError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error),
      excerpt: error.context?.valueExcerpt,
      workaround: this.#formatWorkaround(error),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  #formatTitle(error: RatioError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(error: RatioError): string | undefined {
    const ctx = error.context;
    if (!ctx) return undefined;
    if (ctx.input !== undefined) return `Input: ${JSON.stringify(ctx.input)}`;
    if (ctx.file !== undefined) return `File: ${ctx.file}`;
    if (ctx.setting !== undefined) return `Setting: ${ctx.setting}`;
    return undefined;
  }

  #formatWorkaround(error: RatioError): string | undefined {
    return error.context?.suggestion;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout.columns || 80;
  }
}
