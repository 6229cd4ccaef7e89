/**
 * Human-readable run banner and summary.
 */

import type { RunResult } from '../../types/issues.js';

const RULE = '='.repeat(60);

export interface BannerInfo {
  target: string;
  dryRun: boolean;
  count: number;
}

export function formatRunBanner(info: BannerInfo): string[] {
  return [
    '',
    RULE,
    'GitHub Issue Bulk Creator',
    RULE,
    `Repository: ${info.target}`,
    `Mode: ${info.dryRun ? 'DRY RUN' : 'LIVE'}`,
    RULE,
    '',
    `Found ${info.count} issues to create`,
  ];
}

export function formatRunSummary(result: RunResult): string[] {
  const lines = [
    '',
    RULE,
    'Summary',
    RULE,
    `Total issues: ${result.total}`,
    `✓ Created: ${result.created}`,
    `✗ Failed: ${result.failed}`,
  ];
  if (result.dryRun) {
    lines.push('');
    lines.push('This was a DRY RUN. No issues were actually created.');
    lines.push('Run without --dry-run to create issues.');
  }
  lines.push(RULE);
  return lines;
}
