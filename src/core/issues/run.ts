/**
 * One seeding run: load the document, check the backend, create issues.
 *
 * The document is loaded first so a broken file never reaches the backend.
 * The backend check still happens before any issue is processed. Only those
 * two steps can fail the run; per-issue failures end up in the RunResult.
 */

import { ExitCode } from '../../types/exit-codes.js';
import type { RunResult } from '../../types/issues.js';
import { SeederError } from '../errors.js';
import { getLogger } from '../logger.js';
import type { IssueBackend } from './backend.js';
import { IssueCreator } from './creator.js';
import { loadIssueDocument } from './document.js';
import { formatRunBanner } from './report.js';

export interface RunOptions {
  file: string;
  dryRun: boolean;
  labelColor: string;
}

export interface RunDeps {
  backend: IssueBackend;
  /** Sink for progress lines (default: console.log) */
  write?: (line: string) => void;
}

export async function runSeeder(options: RunOptions, deps: RunDeps): Promise<RunResult> {
  const log = getLogger('run');
  const write = deps.write ?? ((line: string) => console.log(line));

  const issues = await loadIssueDocument(options.file);
  log.debug({ file: options.file, count: issues.length }, 'issue document loaded');

  if (issues.length === 0) {
    write(`No issues found in ${options.file}`);
    return { total: 0, created: 0, failed: 0, dryRun: options.dryRun, outcomes: [] };
  }

  const availability = await deps.backend.checkAvailable();
  if (!availability.ok) {
    throw new SeederError(ExitCode.DEPENDENCY_ERROR, availability.error, {
      fix: "Install gh from https://cli.github.com/ and run 'gh auth login'",
    });
  }
  log.debug({ version: availability.value }, 'backend available');

  for (const line of formatRunBanner({
    target: deps.backend.target,
    dryRun: options.dryRun,
    count: issues.length,
  })) {
    write(line);
  }

  const creator = new IssueCreator(deps.backend, {
    dryRun: options.dryRun,
    labelColor: options.labelColor,
    write,
  });
  return creator.processBatch(issues);
}
