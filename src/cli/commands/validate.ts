/**
 * CLI validate command - check a YAML issue document without touching GitHub.
 */

import { Command } from 'commander';
import { loadConfig } from '../../core/config.js';
import { SeederError } from '../../core/errors.js';
import { loadIssueDocument, summarizeIssues } from '../../core/issues/document.js';
import { formatSuccess } from '../../core/output.js';
import { ExitCode } from '../../types/exit-codes.js';
import { exitWithError, flagOption, stringOption } from '../options.js';

/**
 * Register the validate command.
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Parse and check a YAML issue document (no GitHub calls)')
    .argument('[file]', 'Path to the YAML issue document (default: issues.yaml)')
    .option('-f, --file <path>', 'Path to the YAML issue document')
    .option('--json', 'Print the result as JSON')
    .action(async (file: string | undefined, opts: Record<string, unknown>) => {
      await handleValidate(file, opts);
    });
}

async function handleValidate(fileArg: string | undefined, opts: Record<string, unknown>): Promise<void> {
  const json = flagOption(opts, 'json');
  try {
    const config = await loadConfig({ file: fileArg ?? stringOption(opts, 'file') });
    const issues = await loadIssueDocument(config.file);
    const stats = summarizeIssues(issues);

    if (stats.malformed.length > 0) {
      throw new SeederError(ExitCode.VALIDATION_ERROR, `${config.file}: ${stats.malformed.join('; ')}`, {
        fix: 'Records take a text title and body, a list of labels and a text milestone',
      });
    }
    if (stats.untitled.length > 0) {
      throw new SeederError(
        ExitCode.VALIDATION_ERROR,
        `${config.file}: issue(s) ${stats.untitled.join(', ')} have no title`,
        { fix: 'Give every issue record a non-empty title' },
      );
    }

    if (json) {
      console.log(formatSuccess({ file: config.file, ...stats }, 'issues.validate'));
      return;
    }
    console.log(`✓ ${config.file}: ${stats.issues} issues`);
    console.log(`  Milestones (${stats.milestones.length}): ${stats.milestones.join(', ') || '(none)'}`);
    console.log(`  Labels (${stats.labels.length}): ${stats.labels.join(', ') || '(none)'}`);
  } catch (err) {
    exitWithError(err, json, 'issues.validate');
  }
}
