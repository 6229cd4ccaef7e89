/**
 * YAML issue document loading and validation.
 *
 * Expected shape:
 *
 *   issues:
 *     - title: Add deck shuffling
 *       body: |
 *         Longer description.
 *       labels: [enhancement, core]
 *       milestone: v1.0
 *
 * An empty document, a missing `issues` key or an empty list all mean
 * "nothing to do". Only the document's outer shape is fatal here. A record
 * with the wrong shape loads as a malformed IssueSpec, and a record without
 * a title loads with an empty title; both are rejected per issue later.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ExitCode } from '../../types/exit-codes.js';
import type { IssueSpec } from '../../types/issues.js';
import { SeederError } from '../errors.js';

// ── Schemas ──────────────────────────────────────────────────────────

/** YAML scalars like `2024` or `true` are accepted as their string form. */
const TextSchema = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

export const IssueRecordSchema = z.object({
  title: TextSchema.nullish().transform((value) => value ?? ''),
  body: TextSchema.nullish().transform((value) => value ?? ''),
  labels: z
    .array(TextSchema)
    .nullish()
    .transform((labels) => [...new Set((labels ?? []).map((label) => label.trim()).filter(Boolean))]),
  milestone: TextSchema.nullish().transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  }),
});

/** Outer shape only; records are checked one by one. */
export const IssueDocumentSchema = z
  .object({
    issues: z.array(z.unknown()).nullish().transform((issues) => issues ?? []),
  })
  .nullish()
  .transform((doc) => doc?.issues ?? []);

// ── Loading ──────────────────────────────────────────────────────────

function describeIssues(issues: z.ZodIssue[], prefix: string[]): string {
  return issues
    .map((issue) => `${[...prefix, ...issue.path].join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Best-effort title of a record that failed validation, for reporting. */
function salvageTitle(raw: unknown): string {
  if (raw !== null && typeof raw === 'object' && 'title' in raw) {
    const { title } = raw;
    if (typeof title === 'string' || typeof title === 'number') return String(title);
  }
  return '';
}

function toIssueSpec(record: z.infer<typeof IssueRecordSchema>): IssueSpec {
  const spec: IssueSpec = {
    title: record.title,
    body: record.body,
    labels: record.labels,
  };
  if (record.milestone !== undefined) spec.milestone = record.milestone;
  return spec;
}

/**
 * Parse and validate issue document text.
 *
 * @param text   - Raw YAML
 * @param source - Name used in error messages (usually the file path)
 */
export function parseIssueDocument(text: string, source: string): IssueSpec[] {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new SeederError(ExitCode.VALIDATION_ERROR, `Invalid YAML in ${source}: ${detail}`, {
      cause: err,
    });
  }

  const result = IssueDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new SeederError(
      ExitCode.VALIDATION_ERROR,
      `Invalid issue document ${source}: ${describeIssues(result.error.issues, [])}`,
      { fix: 'Expected a top-level "issues" list of records with title, body, labels and milestone' },
    );
  }

  return result.data.map((entry, index) => {
    const record = IssueRecordSchema.safeParse(entry);
    if (record.success) return toIssueSpec(record.data);
    return {
      title: salvageTitle(entry),
      body: '',
      labels: [],
      malformed: describeIssues(record.error.issues, ['issues', String(index)]),
    };
  });
}

/**
 * Read and parse an issue document from disk.
 */
export async function loadIssueDocument(filePath: string): Promise<IssueSpec[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    throw new SeederError(ExitCode.FILE_ERROR, `Failed to read issue document: ${filePath}`, {
      cause: err,
      fix: 'Pass the document path as an argument or with --file',
    });
  }
  return parseIssueDocument(text, filePath);
}

/** Counts shown by the validate command. */
export interface DocumentStats {
  issues: number;
  /** 1-based positions of records without a title */
  untitled: number[];
  /** Problems of records that could not be read, one entry per record */
  malformed: string[];
  milestones: string[];
  labels: string[];
}

/** Distinct milestones and labels in first-seen order. */
export function summarizeIssues(issues: IssueSpec[]): DocumentStats {
  const milestones = new Set<string>();
  const labels = new Set<string>();
  const untitled: number[] = [];
  const malformed: string[] = [];
  issues.forEach((issue, index) => {
    if (issue.malformed !== undefined) {
      malformed.push(issue.malformed);
      return;
    }
    if (!issue.title.trim()) untitled.push(index + 1);
    if (issue.milestone) milestones.add(issue.milestone);
    for (const label of issue.labels) labels.add(label);
  });
  return {
    issues: issues.length,
    untitled,
    malformed,
    milestones: [...milestones],
    labels: [...labels],
  };
}
