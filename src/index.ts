/**
 * issue-seeder - bulk GitHub issue creation from YAML.
 */

// Types
export { ExitCode } from './types/exit-codes.js';
export type { IssueSpec, IssueOutcome, IssueStatus, RunResult, IssueSubmission } from './types/issues.js';
export type { SeederConfig, LoggingConfig, LogLevel, ConfigOverrides } from './types/config.js';

// Core
export { SeederError, toSeederError } from './core/errors.js';
export { formatSuccess, formatError, formatHumanError } from './core/output.js';
export { loadConfig, PROJECT_CONFIG_FILE } from './core/config.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';

// Issues
export {
  parseIssueDocument,
  loadIssueDocument,
  summarizeIssues,
  GhCliBackend,
  IssueCreator,
  DRY_RUN_MILESTONE_NUMBER,
  DEFAULT_LABEL_COLOR,
  runSeeder,
  ok,
  fail,
} from './core/issues/index.js';
export type {
  BackendResult,
  IssueBackend,
  GhCliBackendOptions,
  IssueCreatorOptions,
  RunOptions,
  RunDeps,
} from './core/issues/index.js';
