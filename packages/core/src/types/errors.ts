/**
 * Error hierarchy for qoslens
 * Provides structured error handling with context and usage hints
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // File or run directory the error relates to
  line?: number; // 1-based line number inside `path`
  token?: string; // Offending input excerpt
  usage?: string; // Invocation hint shown to CLI users
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface AnalysisErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all qoslens errors
 */
export abstract class AnalysisError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;

  constructor(params: AnalysisErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and the raw offending token
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#trimContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #trimContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;
    const { token: _token, ...rest } = context;
    return rest;
  }
}

/**
 * Invalid invocation: wrong argument count, unknown option values, missing
 * run directories. Always detected before any run data is loaded.
 */
export class ConfigurationError extends AnalysisError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
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

/**
 * A latency sample file holds a token that is not a number. Fatal for the
 * whole run: corrupt sample files are never partially used.
 */
export class SampleParseError extends AnalysisError {
  constructor(params: {
    message: string;
    context: ErrorContext & { path: string; line: number; token: string };
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.SAMPLE_PARSE_FAILED,
      context: params.context,
    });
  }

  get path(): string {
    return this.context?.path ?? '';
  }
  get line(): number {
    return this.context?.line ?? 0;
  }
  get token(): string {
    return this.context?.token ?? '';
  }
}

/**
 * An input file exists but could not be read.
 */
export class RunDataReadError extends AnalysisError {
  constructor(params: { message: string; path: string; cause?: Error }) {
    super({
      message: params.message,
      errorCode: ErrorCode.RUN_DATA_READ_FAILED,
      context: { path: params.path },
      cause: params.cause,
    });
  }
}

/**
 * A rendered report document does not match its published JSON Schema.
 */
export class ReportValidationError extends AnalysisError {
  public readonly failures: string[];

  constructor(params: { message: string; failures: string[] }) {
    super({
      message: params.message,
      errorCode: ErrorCode.REPORT_VALIDATION_FAILED,
      context: { failures: params.failures },
    });
    this.failures = params.failures;
  }
}

/**
 * Wraps anything thrown that is not an AnalysisError.
 */
export class InternalError extends AnalysisError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}

export function toAnalysisError(error: unknown): AnalysisError {
  if (isAnalysisError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new InternalError(error.message || 'Unexpected error', error);
  }
  return new InternalError(String(error) || 'Unexpected error');
}
