// @qoslens/core entry point
//
// Loader (metadata + per-phase latency samples), statistics calculator
// (percentiles, throughput, heuristic WAF), run summarizer, and the shared
// error hierarchy, presenter and logger used by reporter and CLI.

export * from './types/run.js';

// Loader
export * from './loader/index.js';

// Statistics
export * from './stats/index.js';

// Run summaries
export * from './summary/index.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  getExitCode,
  type Severity,
} from './errors/codes.js';
export {
  AnalysisError,
  ConfigurationError,
  InternalError,
  ReportValidationError,
  RunDataReadError,
  SampleParseError,
  isAnalysisError,
  toAnalysisError,
  type AnalysisErrorParams,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';

// Logging
export {
  LOG_PREFIX,
  createStderrLogger,
  silentLogger,
  type Logger,
  type StderrLoggerOptions,
} from './util/logger.js';
