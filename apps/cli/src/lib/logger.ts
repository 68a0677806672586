/**
 * CLI logging on consola
 *
 * Human-facing messages and forwarded core log entries go to stderr, so
 * stdout carries only command results.
 */

import { createConsola, type ConsolaInstance } from 'consola';
import { Chalk, type ChalkInstance } from 'chalk';
import { configureLogger, type LogEntry } from '@autoheal/core';
import { getEnvironment, shouldUseColors } from './environment.js';
import type { CliIO } from './io.js';
import type { CliSettings, Verbosity } from './settings.js';

const CONSOLA_LEVELS: Record<Verbosity, number> = {
  quiet: 1,
  normal: 3,
  verbose: 4,
};

export interface LoggerOptions {
  verbosity?: Verbosity;
  colors?: boolean;
}

export function createLogger(options: LoggerOptions = {}): ConsolaInstance {
  return createConsola({
    level: CONSOLA_LEVELS[options.verbosity ?? 'normal'],
    stdout: process.stderr,
    stderr: process.stderr,
    formatOptions: {
      colors: options.colors ?? false,
      date: false,
    },
  });
}

/**
 * One line for a core log entry: `[component] message {context}`
 */
export function formatCoreEntry(entry: LogEntry, paint: ChalkInstance): string {
  const context = entry.context && Object.keys(entry.context).length > 0 ? ` ${paint.dim(JSON.stringify(entry.context))}` : '';
  const error = entry.error ? `: ${entry.error.message}` : '';
  return `${paint.dim(`[${entry.component}]`)} ${entry.message}${error}${context}`;
}

/**
 * Route the core's structured logger through the CLI logger, or as JSON lines
 * on stderr when AUTOHEAL_LOG_JSON is set.
 */
export function forwardCoreLogs(logger: ConsolaInstance, settings: Pick<CliSettings, 'logLevel' | 'logJson'>, io: CliIO, paint: ChalkInstance): void {
  configureLogger({
    level: settings.logLevel,
    enableConsole: false,
    onLog: (entry) => {
      if (settings.logJson) {
        io.stderr(`${JSON.stringify(entry)}\n`);
        return;
      }
      logger[entry.level](formatCoreEntry(entry, paint));
    },
  });
}

export interface CommandLogging {
  logger: ConsolaInstance;
  paint: ChalkInstance;
}

/**
 * Color instance for command output; JSON output is never colored
 */
export function paintFor(io: Pick<CliIO, 'env' | 'stdoutIsTTY'>, json: boolean): ChalkInstance {
  const colors = !json && shouldUseColors(io.env, io.stdoutIsTTY);
  return new Chalk({ level: colors ? 1 : 0 });
}

/**
 * Logger and color instance for one command run
 */
export function setupLogging(settings: CliSettings, io: CliIO): CommandLogging {
  const environment = getEnvironment(io.env, io.stdoutIsTTY);
  const paint = paintFor(io, settings.json);
  const logger = createLogger({ verbosity: settings.verbosity, colors: paint.level > 0 });

  forwardCoreLogs(logger, settings, io, paint);
  logger.debug(`Environment: ${environment.isCI ? `CI (${environment.ciName ?? 'unknown'})` : 'local'}`);
  return { logger, paint };
}
