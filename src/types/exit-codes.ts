/**
 * issue-seeder exit codes.
 * 0 = success; every other code is a run-level failure and is the process
 * exit status as-is.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === ERRORS ===
  GENERAL_ERROR = 1,
  FILE_ERROR = 3,
  DEPENDENCY_ERROR = 5,
  VALIDATION_ERROR = 6,
  CONFIG_ERROR = 8,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
