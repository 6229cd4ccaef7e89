/**
 * Narrow boundary to the issue tracker.
 *
 * Operations resolve to an explicit result instead of throwing; the caller
 * decides what each failure means for the run.
 */

import type { IssueSubmission } from '../../types/issues.js';

export type BackendResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export function ok<T>(value: T): BackendResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: string): BackendResult<T> {
  return { ok: false, error };
}

export interface IssueBackend {
  /** Human-readable name of the target, for the run banner. */
  readonly target: string;

  /** Verify the tool is installed and authenticated; resolves to its version line. */
  checkAvailable(): Promise<BackendResult<string>>;

  /** Number of the milestone with exactly this title (open or closed), or null. */
  findMilestone(title: string): Promise<BackendResult<number | null>>;

  /** Create a milestone and return its number. */
  createMilestone(title: string): Promise<BackendResult<number>>;

  /** Whether a label with exactly this name exists. */
  labelExists(name: string): Promise<BackendResult<boolean>>;

  createLabel(name: string, color: string): Promise<BackendResult<void>>;

  /** Submit an issue; resolves to the tool's output (the issue URL). */
  createIssue(issue: IssueSubmission): Promise<BackendResult<string>>;
}
