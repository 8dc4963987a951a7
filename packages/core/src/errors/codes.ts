/**
 * Error Code Infrastructure
 * Stable error codes and process exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  RUN_DIRECTORY_NOT_FOUND = 'E301',

  // Input Errors (E400–E499)
  SAMPLE_PARSE_FAILED = 'E400',
  RUN_DATA_READ_FAILED = 'E410',

  // Output Errors (E500–E599)
  REPORT_VALIDATION_FAILED = 'E500',

  // Internal Errors (E900–E999)
  INTERNAL_ERROR = 'E900',
}

// CLI exit codes mapping; argument and directory problems always exit with 1
export const EXIT_CODES = {
  [ErrorCode.CONFIGURATION_ERROR]: 1,
  [ErrorCode.RUN_DIRECTORY_NOT_FOUND]: 1,
  [ErrorCode.SAMPLE_PARSE_FAILED]: 2,
  [ErrorCode.RUN_DATA_READ_FAILED]: 3,
  [ErrorCode.REPORT_VALIDATION_FAILED]: 4,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
