/**
 * Configuration type definitions for issue-seeder.
 * Resolved by cascade: defaults < project file < environment < CLI flags.
 */

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'warn') */
  level: LogLevel;
  /** Log file path relative to the working directory; stderr when unset */
  filePath?: string;
}

/** Full resolved configuration. */
export interface SeederConfig {
  /** Target repository as [host/]owner/repo; the current repository when unset */
  repo?: string;
  /** Path to the YAML issue document */
  file: string;
  /** Colour (6 hex digits, no '#') for labels created by the tool */
  labelColor: string;
  logging: LoggingConfig;
}

/** Values a CLI invocation may override. */
export interface ConfigOverrides {
  repo?: string;
  file?: string;
  labelColor?: string;
  /** Validated against LogLevel when the config is resolved */
  logLevel?: string;
}
