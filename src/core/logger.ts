/**
 * Centralized pino logger factory.
 *
 * Singleton pattern. Custom formatters for uppercase level labels and ISO
 * timestamps. Context via child loggers (getLogger('subsystem')).
 *
 * stdout carries the run report, so diagnostics go to a log file when one
 * is configured and to stderr otherwise.
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;

function baseOptions(level: string): pino.LoggerOptions {
  return {
    level,
    formatters: {
      level: (label: string) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param config - Logging section of the resolved configuration
 * @param cwd    - Base directory for a relative log file path
 */
export function initLogger(config: LoggingConfig, cwd: string = process.cwd()): pino.Logger {
  let destination: pino.DestinationStream;
  if (config.filePath) {
    const dest = resolve(cwd, config.filePath);
    mkdirSync(dirname(dest), { recursive: true });
    // sync: process.exit may follow the last write directly
    destination = pino.destination({ dest, sync: true });
  } else {
    destination = pino.destination({ fd: 2, sync: true });
  }

  rootLogger = pino(baseOptions(config.level), destination);
  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a warn-level stderr logger so
 * early startup code and tests never crash.
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    return pino(baseOptions('warn'), pino.destination(2)).child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/** Flush and drop the root logger. */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
