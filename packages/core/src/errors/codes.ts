/**
 * Error Code Infrastructure
 * Stable error codes and exit-code mapping for attribute group failures.
 */

export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Path Errors (E010–E019)
  INVALID_ATTRIBUTE_PATH = 'E010',

  // Type Errors (E020–E099)
  TYPE_RESOLUTION_FAILED = 'E020',

  // Validation Errors (E200–E299)
  UNKNOWN_ATTRIBUTE = 'E200',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse Errors (E400–E499)
  DESCRIPTION_PARSE_FAILED = 'E400',
  CYCLIC_DESCRIPTION = 'E401',

  // Internal Errors (E500–E599)
  CLONE_FAILED = 'E500',
  INTERNAL_ERROR = 'E599',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_ATTRIBUTE_PATH]: 20,
  [ErrorCode.TYPE_RESOLUTION_FAILED]: 21,
  [ErrorCode.UNKNOWN_ATTRIBUTE]: 40,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.DESCRIPTION_PARSE_FAILED]: 60,
  [ErrorCode.CYCLIC_DESCRIPTION]: 61,
  [ErrorCode.CLONE_FAILED]: 98,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
