/**
 * Issue document and run result types.
 */

/** One issue record from the YAML document, normalized. */
export interface IssueSpec {
  /** Empty when the record has no title; such records are never submitted. */
  title: string;
  body: string;
  /** Distinct label names in document order. */
  labels: string[];
  milestone?: string;
  /** Set when the record could not be read: the offending path and problem. Never submitted. */
  malformed?: string;
}

/** Per-issue result of IssueCreator.createIssue. */
export type IssueStatus = 'created' | 'skipped' | 'failed';

/** Record of one processed issue, in input order. */
export interface IssueOutcome {
  title: string;
  status: IssueStatus;
  /** Output of the create call (usually the issue URL); absent in dry-run. */
  url?: string;
  /** Why the issue was skipped or failed. */
  reason?: string;
}

/** Aggregate result of one batch run. Skipped issues count as failed. */
export interface RunResult {
  total: number;
  created: number;
  failed: number;
  dryRun: boolean;
  outcomes: IssueOutcome[];
}

/** Payload handed to the backend when submitting an issue. */
export interface IssueSubmission {
  title: string;
  body: string;
  labels: string[];
  /** Milestone title; the backend resolves it at submission time. */
  milestone?: string;
}
