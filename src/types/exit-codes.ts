/**
 * flagstack exit codes.
 * Ranges: 0 = success, 1-9 = general errors, 10-19 = binding and resolution errors.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  CONFIG_ERROR = 8,

  // === BINDING ERRORS (10-19) ===
  INVALID_TARGET_KIND = 10,
  DECODE_ERROR = 11,
  PATH_UNRESOLVABLE = 12,
}

/** Check if an exit code represents an error. */
export function isErrorCode(code: ExitCode): boolean {
  return code !== ExitCode.SUCCESS;
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
