#!/usr/bin/env node
/**
 * issue-seeder CLI entry point.
 */

import { createProgram } from './program.js';

const MINIMUM_NODE_MAJOR = 20;

// Startup guard: fail fast if Node.js version is below minimum
const nodeMajor = Number(process.versions.node.split('.')[0]);
if (nodeMajor < MINIMUM_NODE_MAJOR) {
  process.stderr.write(
    `\nError: issue-seeder requires Node.js v${MINIMUM_NODE_MAJOR}+ but found v${process.versions.node}\n\n`,
  );
  process.exit(1);
}

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  });
