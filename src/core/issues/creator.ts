/**
 * IssueCreator - create-or-reuse orchestration for one batch run.
 *
 * Milestones and labels are resolved lazily and cached for the lifetime of
 * the instance, so each distinct milestone title and label name costs at
 * most one lookup/create sequence per run. Caches only grow.
 *
 * A label that cannot be created is a warning: the issue is still submitted
 * and requests the label by name. A milestone that cannot be resolved fails
 * the issue before anything is submitted.
 */

import type { IssueOutcome, IssueSpec, IssueStatus, RunResult } from '../../types/issues.js';
import { getLogger } from '../logger.js';
import type { IssueBackend } from './backend.js';
import { formatRunSummary } from './report.js';

/** Milestone number cached in dry-run mode; real milestones start at 1. */
export const DRY_RUN_MILESTONE_NUMBER = 0;

/** Default colour for labels the tool creates. */
export const DEFAULT_LABEL_COLOR = '0366d6';

export interface IssueCreatorOptions {
  dryRun?: boolean;
  /** Colour for created labels (6 hex digits, no '#') */
  labelColor?: string;
  /** Sink for progress lines (default: console.log) */
  write?: (line: string) => void;
}

export class IssueCreator {
  private readonly milestoneCache = new Map<string, number>();
  private readonly labelCache = new Set<string>();
  private readonly dryRun: boolean;
  private readonly labelColor: string;
  private readonly write: (line: string) => void;
  private readonly log = getLogger('creator');

  constructor(
    private readonly backend: IssueBackend,
    options: IssueCreatorOptions = {},
  ) {
    this.dryRun = options.dryRun ?? false;
    this.labelColor = options.labelColor ?? DEFAULT_LABEL_COLOR;
    this.write = options.write ?? ((line) => console.log(line));
  }

  /**
   * Resolve a milestone title to its number, creating the milestone when it
   * does not exist. A failed lookup falls through to creation; returns null
   * when creation fails too.
   */
  async resolveMilestone(title: string): Promise<number | null> {
    const cached = this.milestoneCache.get(title);
    if (cached !== undefined) return cached;

    if (this.dryRun) {
      this.write(`  [DRY RUN] Would create milestone: ${title}`);
      this.milestoneCache.set(title, DRY_RUN_MILESTONE_NUMBER);
      return DRY_RUN_MILESTONE_NUMBER;
    }

    const existing = await this.backend.findMilestone(title);
    if (!existing.ok) {
      this.log.warn({ milestone: title, error: existing.error }, 'milestone lookup failed; trying to create');
    } else if (existing.value !== null) {
      this.write(`  ✓ Milestone exists: ${title} (#${existing.value})`);
      this.milestoneCache.set(title, existing.value);
      return existing.value;
    }

    this.write(`  ↻ Creating milestone: ${title}`);
    const created = await this.backend.createMilestone(title);
    if (!created.ok) {
      this.log.warn({ milestone: title, error: created.error }, 'milestone creation failed');
      this.write(`  ✗ Could not create milestone ${title}: ${created.error}`);
      return null;
    }
    this.write(`  ✓ Created milestone: ${title} (#${created.value})`);
    this.milestoneCache.set(title, created.value);
    return created.value;
  }

  /**
   * Make sure a label exists. A failed lookup falls through to creation.
   */
  async ensureLabel(name: string, color: string = this.labelColor): Promise<boolean> {
    if (this.labelCache.has(name)) return true;

    if (this.dryRun) {
      this.write(`  [DRY RUN] Would create label: ${name}`);
      this.labelCache.add(name);
      return true;
    }

    const exists = await this.backend.labelExists(name);
    if (exists.ok && exists.value) {
      this.labelCache.add(name);
      return true;
    }
    if (!exists.ok) {
      this.log.warn({ label: name, error: exists.error }, 'label lookup failed; trying to create');
    }

    this.write(`  ↻ Creating label: ${name}`);
    const created = await this.backend.createLabel(name, color);
    if (!created.ok) {
      this.log.warn({ label: name, error: created.error }, 'label creation failed');
      return false;
    }
    this.write(`  ✓ Created label: ${name}`);
    this.labelCache.add(name);
    return true;
  }

  /**
   * Create one issue: milestone first, then labels, then the issue itself.
   */
  async createIssue(spec: IssueSpec): Promise<IssueStatus> {
    return (await this.processIssue(spec)).status;
  }

  /** Like createIssue, with the URL or failure reason attached. */
  async processIssue(spec: IssueSpec): Promise<IssueOutcome> {
    const { title, body, labels, milestone } = spec;

    if (spec.malformed !== undefined) {
      this.write(`  ✗ Skipping malformed issue: ${spec.malformed}`);
      return { title, status: 'skipped', reason: `malformed record: ${spec.malformed}` };
    }

    if (!title.trim()) {
      this.write('  ✗ Skipping issue without title');
      return { title, status: 'skipped', reason: 'missing title' };
    }

    this.write('');
    this.write(`→ Processing: ${title}`);

    if (milestone) {
      const number = await this.resolveMilestone(milestone);
      if (number === null) {
        this.write(`  ✗ Failed to create/get milestone: ${milestone}`);
        return { title, status: 'failed', reason: `milestone "${milestone}" could not be resolved` };
      }
    }

    for (const label of labels) {
      if (!(await this.ensureLabel(label))) {
        this.write(`  ⚠ Warning: Could not create label: ${label}`);
      }
    }

    if (this.dryRun) {
      this.write('  [DRY RUN] Would create issue:');
      this.write(`    Title: ${title}`);
      this.write(`    Labels: ${labels.length > 0 ? labels.join(', ') : '(none)'}`);
      this.write(`    Milestone: ${milestone ?? '(none)'}`);
      return { title, status: 'created' };
    }

    this.write('  ↻ Creating issue...');
    const result = await this.backend.createIssue({ title, body, labels, milestone });
    if (result.ok && result.value) {
      this.write(`  ✓ Created: ${result.value}`);
      return { title, status: 'created', url: result.value };
    }

    const reason = result.ok ? 'no output from issue creation' : result.error;
    this.log.warn({ title, error: reason }, 'issue creation failed');
    this.write('  ✗ Failed to create issue');
    return { title, status: 'failed', reason };
  }

  /**
   * Create every issue in order. Never stops early; prints the summary.
   */
  async processBatch(issues: IssueSpec[]): Promise<RunResult> {
    const outcomes: IssueOutcome[] = [];
    let created = 0;
    let failed = 0;

    for (const issue of issues) {
      const outcome = await this.processIssue(issue);
      outcomes.push(outcome);
      if (outcome.status === 'created') created++;
      else failed++;
    }

    const result: RunResult = {
      total: issues.length,
      created,
      failed,
      dryRun: this.dryRun,
      outcomes,
    };
    for (const line of formatRunSummary(result)) this.write(line);
    return result;
  }
}
