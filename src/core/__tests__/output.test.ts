/**
 * Tests for output envelopes and error text.
 */

import { describe, it, expect } from 'vitest';
import { formatError, formatHumanError, formatSuccess } from '../output.js';
import { SeederError, toSeederError } from '../errors.js';
import { ExitCode, getExitCodeName } from '../../types/exit-codes.js';

describe('formatError', () => {
  it('names the exit code and keeps the fix hint', () => {
    const error = new SeederError(ExitCode.CONFIG_ERROR, 'Invalid configuration: repo: bad', {
      fix: 'Check .issue-seeder.json',
    });

    const envelope: unknown = JSON.parse(formatError(error, 'issues.create'));

    expect(envelope).toMatchObject({
      success: false,
      result: null,
      error: { code: 8, name: 'CONFIG_ERROR', message: 'Invalid configuration: repo: bad', fix: 'Check .issue-seeder.json' },
      _meta: { operation: 'issues.create' },
    });
  });

  it('leaves out the fix key when there is no hint', () => {
    const envelope: unknown = JSON.parse(formatError(new SeederError(ExitCode.FILE_ERROR, 'gone')));

    expect(envelope).toMatchObject({ error: { code: 3, name: 'FILE_ERROR', message: 'gone' } });
    expect(JSON.stringify(envelope)).not.toContain('"fix"');
  });
});

describe('formatSuccess', () => {
  it('wraps the result with operation metadata', () => {
    const envelope: unknown = JSON.parse(formatSuccess({ total: 1 }, 'issues.validate'));

    expect(envelope).toMatchObject({ success: true, result: { total: 1 }, _meta: { operation: 'issues.validate' } });
  });
});

describe('formatHumanError', () => {
  it('prints the message and the fix on its own line', () => {
    const error = new SeederError(ExitCode.DEPENDENCY_ERROR, 'gh missing', { fix: 'Install gh' });

    expect(formatHumanError(error)).toBe('Error: gh missing\nFix: Install gh');
  });
});

describe('exit codes', () => {
  it('maps unknown errors to GENERAL_ERROR', () => {
    const error = toSeederError(new Error('boom'));

    expect(error.code).toBe(ExitCode.GENERAL_ERROR);
    expect(error.message).toBe('boom');
  });

  it('names every code the tool raises', () => {
    expect(
      [
        ExitCode.GENERAL_ERROR,
        ExitCode.FILE_ERROR,
        ExitCode.DEPENDENCY_ERROR,
        ExitCode.VALIDATION_ERROR,
        ExitCode.CONFIG_ERROR,
      ].map((code) => `${code}:${getExitCodeName(code)}`),
    ).toEqual(['1:GENERAL_ERROR', '3:FILE_ERROR', '5:DEPENDENCY_ERROR', '6:VALIDATION_ERROR', '8:CONFIG_ERROR']);
  });
});
