/**
 * IssueBackend backed by the GitHub CLI (gh).
 *
 * gh owns authentication, transport and pagination. Every call passes the
 * target repository explicitly; without one, gh resolves the repository of
 * the working directory (`{owner}/{repo}` placeholders for `gh api`). A
 * host/owner/repo target goes to `gh api` as `--hostname` plus the
 * owner/repo path, and to other commands as `--repo` unchanged.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import type { IssueSubmission } from '../../types/issues.js';
import { getLogger } from '../logger.js';
import { fail, ok, type BackendResult, type IssueBackend } from './backend.js';

const execFileAsync = promisify(execFile);

/** Placeholder gh api expands to the current repository. */
const CURRENT_REPO = '{owner}/{repo}';

const MilestoneSchema = z.object({
  number: z.number().int(),
  title: z.string(),
});

const LabelSchema = z.object({ name: z.string() });

export interface GhCliBackendOptions {
  /** [host/]owner/repo; the working directory's repository when omitted */
  repo?: string;
  /** gh executable (default: 'gh') */
  ghPath?: string;
}

/**
 * Best error text from a failed execFile: gh's stderr, else the error message.
 */
function describeFailure(err: unknown): string {
  if (err !== null && typeof err === 'object' && 'stderr' in err && typeof err.stderr === 'string') {
    const stderr = err.stderr.trim();
    if (stderr) return stderr;
  }
  return err instanceof Error ? err.message : String(err);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class GhCliBackend implements IssueBackend {
  readonly target: string;
  private readonly repo?: string;
  private readonly host?: string;
  private readonly apiRepo: string;
  private readonly ghPath: string;
  private readonly log = getLogger('gh');

  constructor(options: GhCliBackendOptions = {}) {
    this.repo = options.repo;
    this.ghPath = options.ghPath ?? 'gh';
    this.target = options.repo ?? 'current repository';

    const parts = options.repo?.split('/') ?? [];
    if (parts.length === 3) {
      this.host = parts[0];
      this.apiRepo = parts.slice(1).join('/');
    } else {
      this.apiRepo = options.repo ?? CURRENT_REPO;
    }
  }

  private get repoArgs(): string[] {
    return this.repo ? ['--repo', this.repo] : [];
  }

  private get hostArgs(): string[] {
    return this.host ? ['--hostname', this.host] : [];
  }

  /**
   * Every item of a paginated `gh api` listing, one JSON object per line,
   * validated with the given schema.
   */
  private async listAll<T>(
    path: string,
    fields: string,
    schema: z.ZodType<T>,
    what: string,
  ): Promise<BackendResult<T[]>> {
    const result = await this.gh([
      'api',
      '--paginate',
      path,
      '--jq',
      `.[] | {${fields}} | @json`,
      ...this.hostArgs,
    ]);
    if (!result.ok) return result;

    const items: T[] = [];
    for (const line of result.value.split('\n')) {
      if (!line.trim()) continue;
      const parsed = schema.safeParse(parseJson(line));
      if (!parsed.success) {
        return fail(`Unexpected ${what} listing line: ${line}`);
      }
      items.push(parsed.data);
    }
    return ok(items);
  }

  /** Run gh and return trimmed stdout; a non-zero exit becomes a failed result. */
  private async gh(args: string[]): Promise<BackendResult<string>> {
    this.log.debug({ args }, 'gh invocation');
    try {
      const { stdout } = await execFileAsync(this.ghPath, args, {
        encoding: 'utf-8',
        maxBuffer: 16 * 1024 * 1024,
      });
      return ok(stdout.trim());
    } catch (err) {
      const error = describeFailure(err);
      this.log.debug({ args, error }, 'gh failed');
      return fail(error);
    }
  }

  async checkAvailable(): Promise<BackendResult<string>> {
    const version = await this.gh(['--version']);
    if (!version.ok) {
      return fail(`GitHub CLI (gh) is not installed: ${version.error}`);
    }
    const auth = await this.gh(['auth', 'status']);
    if (!auth.ok) {
      return fail(`GitHub CLI is not authenticated: ${auth.error}`);
    }
    return ok(version.value.split('\n')[0] ?? version.value);
  }

  async findMilestone(title: string): Promise<BackendResult<number | null>> {
    const result = await this.listAll(
      `repos/${this.apiRepo}/milestones?state=all&per_page=100`,
      'number, title',
      MilestoneSchema,
      'milestone',
    );
    if (!result.ok) return result;
    return ok(result.value.find((milestone) => milestone.title === title)?.number ?? null);
  }

  async createMilestone(title: string): Promise<BackendResult<number>> {
    const result = await this.gh([
      'api',
      `repos/${this.apiRepo}/milestones`,
      '-f',
      `title=${title}`,
      ...this.hostArgs,
    ]);
    if (!result.ok) return result;

    const parsed = MilestoneSchema.safeParse(parseJson(result.value));
    if (!parsed.success) {
      return fail(`Unexpected milestone response: ${result.value.slice(0, 200)}`);
    }
    return ok(parsed.data.number);
  }

  async labelExists(name: string): Promise<BackendResult<boolean>> {
    const result = await this.listAll(`repos/${this.apiRepo}/labels?per_page=100`, 'name', LabelSchema, 'label');
    if (!result.ok) return result;
    return ok(result.value.some((label) => label.name === name));
  }

  async createLabel(name: string, color: string): Promise<BackendResult<void>> {
    const result = await this.gh(['label', 'create', name, '--color', color, ...this.repoArgs]);
    if (!result.ok) return result;
    return ok(undefined);
  }

  async createIssue(issue: IssueSubmission): Promise<BackendResult<string>> {
    const args = ['issue', 'create', '--title', issue.title, '--body', issue.body];
    if (issue.labels.length > 0) {
      args.push('--label', issue.labels.join(','));
    }
    if (issue.milestone) {
      args.push('--milestone', issue.milestone);
    }
    args.push(...this.repoArgs);
    return this.gh(args);
  }
}
