/**
 * Command options and settings resolution
 *
 * Precedence: command-line flag, then AUTOHEAL_* environment variable, then
 * the rule document's engine_config, then built-in defaults. The last two are
 * applied by the core when a value is left undefined here.
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { loadSettings, type RuntimeSettings } from '@repo/shared-config';
import type { LogLevel } from '@autoheal/core';
import { CliError } from './errors.js';
import type { CliIO } from './io.js';

export const cliOptionsSchema = z.object({
  projectDir: z.string().min(1).optional(),
  logFile: z.string().min(1).optional(),
  input: z.string().optional(),
  rulesDir: z.string().min(1).optional(),
  timeout: z.number().int().positive().optional(),
  commit: z.boolean().default(true),
  dryRun: z.boolean().default(false),
  checkTools: z.boolean().default(false),
  json: z.boolean().default(false),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export type Verbosity = 'quiet' | 'normal' | 'verbose';

export interface CliSettings {
  projectDir: string;
  /** Undefined selects the built-in rules */
  rulesDir?: string;
  /** Undefined defers to engine_config.timeout_seconds */
  timeoutMs?: number;
  /** Undefined defers to git_config.create_commit */
  createCommit?: boolean;
  dryRun: boolean;
  json: boolean;
  verbosity: Verbosity;
  logLevel: LogLevel;
  logJson: boolean;
}

/**
 * Validate raw commander option values
 */
export function parseOptions(raw: Record<string, unknown>): CliOptions {
  const parsed = cliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new CliError(`Invalid options: ${issues.join(', ')}`, 'INVALID_INPUT');
  }
  return parsed.data;
}

function environmentSettings(env: NodeJS.ProcessEnv): RuntimeSettings {
  try {
    return loadSettings(env);
  } catch (error) {
    throw new CliError(error instanceof Error ? error.message : String(error), 'CONFIG_INVALID', { cause: error });
  }
}

export function resolveSettings(options: CliOptions, io: Pick<CliIO, 'cwd' | 'env'>): CliSettings {
  const env = environmentSettings(io.env);

  const timeoutSeconds = options.timeout ?? env.AUTOHEAL_TIMEOUT_SECONDS;
  const rulesDir = options.rulesDir ?? env.AUTOHEAL_RULES_DIR;

  return {
    projectDir: resolve(io.cwd, options.projectDir ?? '.'),
    rulesDir: rulesDir === undefined ? undefined : resolve(io.cwd, rulesDir),
    timeoutMs: timeoutSeconds === undefined ? undefined : timeoutSeconds * 1000,
    createCommit: options.commit ? undefined : false,
    dryRun: options.dryRun,
    json: options.json,
    verbosity: options.verbose ? 'verbose' : options.quiet ? 'quiet' : 'normal',
    logLevel: options.verbose ? 'debug' : env.AUTOHEAL_LOG_LEVEL,
    logJson: env.AUTOHEAL_LOG_JSON,
  };
}
