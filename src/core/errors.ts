/**
 * Structured error type with exit code integration.
 */

import { ExitCode } from '../types/exit-codes.js';

/**
 * Structured error for issue-seeder operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 * Only run-level failures are thrown as SeederError; per-issue problems are
 * reported as outcomes.
 */
export class SeederError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'SeederError';
    this.code = code;
    this.fix = options?.fix;
  }
}

/**
 * Normalize any thrown value into a SeederError.
 * Unknown errors map to GENERAL_ERROR and keep the original as cause.
 */
export function toSeederError(err: unknown): SeederError {
  if (err instanceof SeederError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new SeederError(ExitCode.GENERAL_ERROR, message, { cause: err });
}
