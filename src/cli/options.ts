/**
 * Typed access to commander option bags and shared error exit handling.
 */

import { closeLogger } from '../core/logger.js';
import { formatError, formatHumanError } from '../core/output.js';
import { toSeederError } from '../core/errors.js';

/** String value of an option, or undefined when absent or not a string. */
export function stringOption(opts: Record<string, unknown>, key: string): string | undefined {
  const value = opts[key];
  return typeof value === 'string' ? value : undefined;
}

/** True only when a boolean flag was given. */
export function flagOption(opts: Record<string, unknown>, key: string): boolean {
  return opts[key] === true;
}

/**
 * Print a fatal error in the requested format and exit with its code.
 */
export function exitWithError(err: unknown, json: boolean, operation: string): never {
  const error = toSeederError(err);
  console.error(json ? formatError(error, operation) : formatHumanError(error));
  closeLogger();
  process.exit(error.code);
}
