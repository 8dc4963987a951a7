/**
 * ErrorPresenter - pure presentation layer for AnalysisError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type {
  AnalysisError,
  ErrorContext,
  SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  usage?: string;
  details?: string[];
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: AnalysisError): CLIErrorView {
    const colors = this.#shouldUseColors(this.options.colors);
    const terminalWidth = this.#getTerminalWidth(this.options.terminalWidth);

    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      excerpt: error.context?.token,
      usage: error.context?.usage,
      details: this.#formatDetails(error.context),
      colors,
      terminalWidth,
    };
  }

  formatForLog(error: AnalysisError): SerializedError {
    return error.toJSON(this._env);
  }

  // Helpers
  #formatTitle(error: AnalysisError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx?.path) return undefined;
    return ctx.line !== undefined
      ? `Location: ${ctx.path}:${ctx.line}`
      : `Location: ${ctx.path}`;
  }

  #formatDetails(ctx?: ErrorContext): string[] | undefined {
    const failures = ctx?.failures;
    if (!Array.isArray(failures) || failures.length === 0) return undefined;
    return failures.map((failure) => String(failure));
  }

  // Callers own the environment policy (NO_COLOR, --no-color, TTY checks)
  #shouldUseColors(opt?: boolean): boolean {
    return opt ?? this._env === 'dev';
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stderr?.columns || 80;
  }
}
