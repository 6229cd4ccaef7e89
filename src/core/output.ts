/**
 * Output formatting for issue-seeder.
 *
 * Human-readable text is the default; `--json` switches commands to a
 * machine-parseable envelope:
 *   { success, result, error?, _meta: { operation, timestamp, requestId } }
 */

import { randomUUID } from 'node:crypto';
import { getExitCodeName } from '../types/exit-codes.js';
import { SeederError } from './errors.js';

/** Envelope metadata. */
export interface OutputMeta {
  operation: string;
  timestamp: string;
  requestId: string;
}

export interface SuccessEnvelope<T> {
  success: true;
  result: T;
  _meta: OutputMeta;
}

export interface ErrorEnvelope {
  success: false;
  result: null;
  error: {
    code: number;
    name: string;
    message: string;
    fix?: string;
  };
  _meta: OutputMeta;
}

function createMeta(operation: string): OutputMeta {
  return {
    operation,
    timestamp: new Date().toISOString(),
    requestId: randomUUID(),
  };
}

/** Format a successful result as a JSON envelope. */
export function formatSuccess<T>(data: T, operation = 'cli.output'): string {
  const envelope: SuccessEnvelope<T> = {
    success: true,
    result: data,
    _meta: createMeta(operation),
  };
  return JSON.stringify(envelope, null, 2);
}

/** Format an error as a JSON envelope. */
export function formatError(error: SeederError, operation = 'cli.output'): string {
  const envelope: ErrorEnvelope = {
    success: false,
    result: null,
    error: {
      code: error.code,
      name: getExitCodeName(error.code),
      message: error.message,
      ...(error.fix ? { fix: error.fix } : {}),
    },
    _meta: createMeta(operation),
  };
  return JSON.stringify(envelope, null, 2);
}

/** Format an error for a terminal: message line plus an optional fix line. */
export function formatHumanError(error: SeederError): string {
  const lines = [`Error: ${error.message}`];
  if (error.fix) lines.push(`Fix: ${error.fix}`);
  return lines.join('\n');
}
