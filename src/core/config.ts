/**
 * Configuration engine for issue-seeder.
 *
 * Resolution priority: CLI flags > Environment vars > Project config > Defaults
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { ConfigOverrides, SeederConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import { SeederError } from './errors.js';
import { DEFAULT_LABEL_COLOR } from './issues/creator.js';

/** Project config file name, looked up in the working directory. */
export const PROJECT_CONFIG_FILE = '.issue-seeder.json';

/** Default configuration values. */
const DEFAULTS: SeederConfig = {
  file: 'issues.yaml',
  labelColor: DEFAULT_LABEL_COLOR,
  logging: {
    level: 'warn',
  },
};

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'ISSUE_SEEDER_REPO': 'repo',
  'ISSUE_SEEDER_FILE': 'file',
  'ISSUE_SEEDER_LABEL_COLOR': 'labelColor',
  'ISSUE_SEEDER_LOG_LEVEL': 'logging.level',
  'ISSUE_SEEDER_LOG_FILE': 'logging.filePath',
};

// ── Schema ───────────────────────────────────────────────────────────

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

/** Six hex digits; a leading '#' is accepted and dropped. */
export const LabelColorSchema = z
  .string()
  .transform((value) => value.trim().replace(/^#/, '').toLowerCase())
  .pipe(z.string().regex(/^[0-9a-f]{6}$/, 'must be six hex digits, e.g. 0366d6'));

/** owner/repo, or host/owner/repo for GitHub Enterprise hosts */
export const RepoSchema = z
  .string()
  .trim()
  .regex(/^(?:[\w.-]+\/)?[\w.-]+\/[\w.-]+$/, 'must be in owner/repo or host/owner/repo form');

const SeederConfigSchema = z.object({
  repo: RepoSchema.optional(),
  file: z.string().min(1),
  labelColor: LabelColorSchema,
  logging: z.object({
    level: LogLevelSchema,
    filePath: z.string().min(1).optional(),
  }),
});

// ── Helpers ──────────────────────────────────────────────────────────

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current: Record<string, unknown> = obj;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (!isPlainObject(next)) {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    } else {
      current = next;
    }
  }
  const leaf = parts[parts.length - 1];
  if (leaf !== undefined) current[leaf] = value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else if (sourceVal !== undefined) {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Read the project config file. Returns null if it does not exist.
 */
async function readProjectConfig(cwd: string): Promise<Record<string, unknown> | null> {
  const filePath = join(cwd, PROJECT_CONFIG_FILE);
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw new SeederError(ExitCode.FILE_ERROR, `Failed to read: ${filePath}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new SeederError(ExitCode.CONFIG_ERROR, `Invalid JSON in: ${filePath}`, { cause: err });
  }
  if (!isPlainObject(parsed)) {
    throw new SeederError(ExitCode.CONFIG_ERROR, `Expected a JSON object in: ${filePath}`);
  }
  return parsed;
}

/** Turn CLI overrides into a partial config object (undefined keys dropped by deepMerge). */
function overridesToConfig(overrides: ConfigOverrides): Record<string, unknown> {
  return {
    repo: overrides.repo,
    file: overrides.file,
    labelColor: overrides.labelColor,
    logging: { level: overrides.logLevel },
  };
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < project config < environment vars < CLI overrides
 */
export async function loadConfig(
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd(),
): Promise<SeederConfig> {
  // Start with defaults
  let merged: Record<string, unknown> = JSON.parse(JSON.stringify(DEFAULTS));

  // Layer 1: Project config
  const projectConfig = await readProjectConfig(cwd);
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  // Layer 2: Environment variables (empty values are ignored)
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined && envValue.trim() !== '') {
      setNestedValue(merged, configPath, envValue);
    }
  }

  // Layer 3: CLI flags
  merged = deepMerge(merged, overridesToConfig(overrides));

  const result = SeederConfigSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SeederError(ExitCode.CONFIG_ERROR, `Invalid configuration: ${details}`, {
      fix: `Check ${PROJECT_CONFIG_FILE}, ISSUE_SEEDER_* environment variables and command-line flags`,
    });
  }
  return result.data;
}
