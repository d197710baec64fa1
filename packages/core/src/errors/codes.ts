/**
 * Error Code Infrastructure
 * Stable error codes and exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Argument Errors (E001–E099)
  INVALID_ARGUMENT = 'E001',
  INVALID_LITERAL = 'E002',
  INVALID_PARAMETER_NAME = 'E003',
  OPTIONAL_WITH_DEFAULT = 'E004',
  DUPLICATE_KEY = 'E005',

  // Merge Errors (E100–E199)
  DEFAULT_CONFLICT = 'E100',
  OPTIONAL_DEFAULT = 'E101',
  INVALID_POLICY_REFERENCE = 'E102',
  UNSATISFIED_REQUIRED_VALUE = 'E103',

  // Combination Errors (E200–E299)
  DICTIONARY_CONFLICT = 'E200',

  // Parse Errors (E400–E499)
  DUPLICATE_PARAMETER = 'E400',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  INVALID_DEFINITION = 'E301',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_ARGUMENT]: 10,
  [ErrorCode.INVALID_LITERAL]: 11,
  [ErrorCode.INVALID_PARAMETER_NAME]: 12,
  [ErrorCode.OPTIONAL_WITH_DEFAULT]: 13,
  [ErrorCode.DUPLICATE_KEY]: 14,
  [ErrorCode.DEFAULT_CONFLICT]: 20,
  [ErrorCode.OPTIONAL_DEFAULT]: 21,
  [ErrorCode.INVALID_POLICY_REFERENCE]: 22,
  [ErrorCode.UNSATISFIED_REQUIRED_VALUE]: 23,
  [ErrorCode.DICTIONARY_CONFLICT]: 30,
  [ErrorCode.DUPLICATE_PARAMETER]: 40,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INVALID_DEFINITION]: 51,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
