/**
 * Error Code Infrastructure
 * Stable error codes and exit-code mapping for thin CLI layers.
 */

export type Severity = 'info' | 'warn' | 'error';

export enum ErrorCode {
  // Definition errors (E001–E099)
  INVALID_DEFINITION_SHAPE = 'E010',
  UNRESOLVED_REFERENCE = 'E012',
  SEMANTIC_CONSTRAINT_VIOLATION = 'E020',

  // Instance errors (E200–E299)
  INSTANCE_VALIDATION_FAILED = 'E200',

  // Configuration errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

export const EXIT_CODES = {
  [ErrorCode.INVALID_DEFINITION_SHAPE]: 20,
  [ErrorCode.UNRESOLVED_REFERENCE]: 22,
  [ErrorCode.SEMANTIC_CONSTRAINT_VIOLATION]: 23,
  [ErrorCode.INSTANCE_VALIDATION_FAILED]: 40,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
