/**
 * In-memory IssueBackend for tests. Records every call as "op:arg".
 */

import type { IssueSubmission } from '../../../types/issues.js';
import { fail, ok, type BackendResult, type IssueBackend } from '../backend.js';

export const MUTATING_OPS = ['createMilestone', 'createLabel', 'createIssue'];

export class FakeBackend implements IssueBackend {
  readonly target = 'octo/demo';
  readonly calls: string[] = [];
  readonly submissions: IssueSubmission[] = [];
  readonly milestones = new Map<string, number>();
  readonly labels = new Set<string>();

  available: BackendResult<string> = ok('gh version 2.40.0');
  failMilestoneLookup = false;
  failLabelLookup = false;
  readonly failMilestones = new Set<string>();
  readonly failLabels = new Set<string>();
  readonly failIssues = new Set<string>();
  /** Titles whose create call succeeds but prints nothing. */
  readonly silentIssues = new Set<string>();

  private nextMilestone = 1;
  private nextIssue = 1;

  mutatingCalls(): string[] {
    return this.calls.filter((call) => MUTATING_OPS.includes(call.split(':')[0] ?? ''));
  }

  callsFor(op: string): string[] {
    return this.calls.filter((call) => call.startsWith(`${op}:`));
  }

  async checkAvailable(): Promise<BackendResult<string>> {
    this.calls.push('checkAvailable:');
    return this.available;
  }

  async findMilestone(title: string): Promise<BackendResult<number | null>> {
    this.calls.push(`findMilestone:${title}`);
    if (this.failMilestoneLookup) return fail('HTTP 502');
    return ok(this.milestones.get(title) ?? null);
  }

  async createMilestone(title: string): Promise<BackendResult<number>> {
    this.calls.push(`createMilestone:${title}`);
    if (this.failMilestones.has(title)) return fail('HTTP 422: Validation Failed');
    const number = this.nextMilestone++;
    this.milestones.set(title, number);
    return ok(number);
  }

  async labelExists(name: string): Promise<BackendResult<boolean>> {
    this.calls.push(`labelExists:${name}`);
    if (this.failLabelLookup) return fail('HTTP 502');
    return ok(this.labels.has(name));
  }

  async createLabel(name: string, color: string): Promise<BackendResult<void>> {
    this.calls.push(`createLabel:${name}:${color}`);
    if (this.failLabels.has(name)) return fail('HTTP 403: Resource not accessible');
    this.labels.add(name);
    return ok(undefined);
  }

  async createIssue(issue: IssueSubmission): Promise<BackendResult<string>> {
    this.calls.push(`createIssue:${issue.title}`);
    this.submissions.push(issue);
    if (this.failIssues.has(issue.title)) return fail('could not add label');
    if (this.silentIssues.has(issue.title)) return ok('');
    return ok(`https://github.com/octo/demo/issues/${this.nextIssue++}`);
  }
}
