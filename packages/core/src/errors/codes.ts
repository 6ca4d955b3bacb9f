/**
 * Error Code Infrastructure
 * Stable error codes and exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Word Errors (E001–E099)
  EMPTY_WORD = 'E001',
  INVALID_LETTER = 'E002',
  WORD_TOO_LONG = 'E003',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse Errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping (1 is reserved for "no path found")
export const EXIT_CODES = {
  [ErrorCode.EMPTY_WORD]: 10,
  [ErrorCode.INVALID_LETTER]: 11,
  [ErrorCode.WORD_TOO_LONG]: 12,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
