/**
 * Tests for run banner and summary formatting.
 */

import { describe, it, expect } from 'vitest';
import { formatRunBanner, formatRunSummary } from '../report.js';

const RULE = '='.repeat(60);

describe('formatRunBanner', () => {
  it('names the target, the mode and the issue count', () => {
    expect(formatRunBanner({ target: 'octo/demo', dryRun: false, count: 3 })).toEqual([
      '',
      RULE,
      'GitHub Issue Bulk Creator',
      RULE,
      'Repository: octo/demo',
      'Mode: LIVE',
      RULE,
      '',
      'Found 3 issues to create',
    ]);
  });

  it('marks dry runs', () => {
    expect(formatRunBanner({ target: 'octo/demo', dryRun: true, count: 1 })).toContain('Mode: DRY RUN');
  });
});

describe('formatRunSummary', () => {
  it('adds the dry-run reminder only for dry runs', () => {
    const live = formatRunSummary({ total: 2, created: 1, failed: 1, dryRun: false, outcomes: [] });
    const dry = formatRunSummary({ total: 2, created: 2, failed: 0, dryRun: true, outcomes: [] });

    expect(live).toEqual(['', RULE, 'Summary', RULE, 'Total issues: 2', '✓ Created: 1', '✗ Failed: 1', RULE]);
    expect(dry).toEqual([
      '',
      RULE,
      'Summary',
      RULE,
      'Total issues: 2',
      '✓ Created: 2',
      '✗ Failed: 0',
      '',
      'This was a DRY RUN. No issues were actually created.',
      'Run without --dry-run to create issues.',
      RULE,
    ]);
  });
});
