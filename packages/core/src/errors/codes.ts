/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit codes for the report pipeline.
 */

export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by pipeline stage
export enum ErrorCode {
  // Input artifacts (R100–R199)
  ARTIFACT_MISSING = 'R100',
  MALFORMED_FIELD = 'R110',
  MANIFEST_INVALID = 'R120',

  // Mandatory input (R200–R299)
  MISSING_MANDATORY_INPUT = 'R200',

  // Output artifacts (R300–R399)
  WRITE_FAILED = 'R300',

  // Configuration (R400–R499)
  CONFIGURATION_ERROR = 'R400',

  // Internal (R500–R599)
  INTERNAL_ERROR = 'R500',
}

export const EXIT_CODES = {
  [ErrorCode.ARTIFACT_MISSING]: 0,
  [ErrorCode.MALFORMED_FIELD]: 0,
  [ErrorCode.MANIFEST_INVALID]: 0,
  [ErrorCode.MISSING_MANDATORY_INPUT]: 20,
  [ErrorCode.WRITE_FAILED]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
