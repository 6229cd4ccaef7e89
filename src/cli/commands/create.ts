/**
 * CLI create command - bulk-create GitHub issues from a YAML document.
 * This is the default command: `issue-seeder --dry-run` runs `create`.
 */

import { Command } from 'commander';
import { loadConfig } from '../../core/config.js';
import { GhCliBackend } from '../../core/issues/gh-backend.js';
import { runSeeder } from '../../core/issues/run.js';
import { closeLogger, initLogger } from '../../core/logger.js';
import { formatSuccess } from '../../core/output.js';
import { exitWithError, flagOption, stringOption } from '../options.js';

/**
 * Register the create command.
 */
export function registerCreateCommand(program: Command): void {
  program
    .command('create', { isDefault: true })
    .description('Create GitHub issues, milestones and labels from a YAML file')
    .argument('[file]', 'Path to the YAML issue document (default: issues.yaml)')
    .option('-f, --file <path>', 'Path to the YAML issue document')
    .option('-r, --repo <repo>', 'Target repository as owner/repo or host/owner/repo (default: repository of the current directory)')
    .option('--dry-run', 'Preview what would be created without making changes')
    .option('--label-color <hex>', 'Colour for labels that have to be created (default: 0366d6)')
    .option('--log-level <level>', 'Diagnostic log level (trace|debug|info|warn|error|fatal|silent)')
    .option('--json', 'Print the run result as JSON (progress goes to stderr)')
    .action(async (file: string | undefined, opts: Record<string, unknown>) => {
      await handleCreate(file, opts);
    });
}

/**
 * Resolve configuration, run the batch and report.
 * Per-issue failures never change the exit status.
 */
async function handleCreate(fileArg: string | undefined, opts: Record<string, unknown>): Promise<void> {
  const json = flagOption(opts, 'json');
  const write = json
    ? (line: string) => { process.stderr.write(`${line}\n`); }
    : (line: string) => { console.log(line); };

  try {
    const config = await loadConfig({
      repo: stringOption(opts, 'repo'),
      file: fileArg ?? stringOption(opts, 'file'),
      labelColor: stringOption(opts, 'labelColor'),
      logLevel: stringOption(opts, 'logLevel'),
    });
    initLogger(config.logging);

    const backend = new GhCliBackend({ repo: config.repo });
    const result = await runSeeder(
      { file: config.file, dryRun: flagOption(opts, 'dryRun'), labelColor: config.labelColor },
      { backend, write },
    );

    if (json) {
      console.log(formatSuccess(result, 'issues.create'));
    }
    closeLogger();
  } catch (err) {
    exitWithError(err, json, 'issues.create');
  }
}
