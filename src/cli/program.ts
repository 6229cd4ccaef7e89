/**
 * Commander program definition, kept apart from the entry point so tests
 * can build it without parsing process.argv.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { registerCreateCommand } from './commands/create.js';
import { registerValidateCommand } from './commands/validate.js';

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  try {
    // src/cli/program.ts and dist/cli/program.js both sit two levels below the root
    const moduleRoot = join(dirname(fileURLToPath(import.meta.url)), '..', '..');
    const pkg: unknown = JSON.parse(readFileSync(join(moduleRoot, 'package.json'), 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('issue-seeder')
    .description('Bulk-create GitHub issues, milestones and labels from a YAML file via the GitHub CLI')
    .version(getPackageVersion());

  registerCreateCommand(program);
  registerValidateCommand(program);

  return program;
}
