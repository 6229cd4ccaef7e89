/**
 * Issue module - YAML document loading, gh backend and batch creation.
 */

export {
  parseIssueDocument,
  loadIssueDocument,
  summarizeIssues,
  IssueRecordSchema,
  IssueDocumentSchema,
} from './document.js';
export type { DocumentStats } from './document.js';

export { ok, fail } from './backend.js';
export type { BackendResult, IssueBackend } from './backend.js';

export { GhCliBackend } from './gh-backend.js';
export type { GhCliBackendOptions } from './gh-backend.js';

export { IssueCreator, DRY_RUN_MILESTONE_NUMBER, DEFAULT_LABEL_COLOR } from './creator.js';
export type { IssueCreatorOptions } from './creator.js';

export { formatRunBanner, formatRunSummary } from './report.js';
export type { BannerInfo } from './report.js';

export { runSeeder } from './run.js';
export type { RunOptions, RunDeps } from './run.js';
