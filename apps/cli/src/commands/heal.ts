/**
 * heal command - fix the failure in a CI log and record the result
 *
 * Always exits 0: the status file carries the outcome for the pipeline.
 */

import { resolve } from 'node:path';
import { Healer, fixSummary, writeStatusFile, type HealResult } from '@autoheal/core';
import type { HealStatus } from '@repo/shared-types';
import { wrapError } from '../lib/errors.js';
import { readFailureText } from '../lib/input.js';
import type { CliIO } from '../lib/io.js';
import { paintFor, setupLogging } from '../lib/logger.js';
import { resolveSettings, type CliOptions } from '../lib/settings.js';
import { renderCliError, renderHealResult, type HealView } from '../ui/render.js';

function toJson(view: HealView): string {
  const body = {
    ...view.status,
    fix: view.descriptor ? fixSummary(view.descriptor) : null,
    outcome: view.outcome,
    statusFile: view.statusFile,
  };
  return `${JSON.stringify(body, null, 2)}\n`;
}

async function run(options: CliOptions, io: CliIO): Promise<HealResult> {
  const settings = resolveSettings(options, io);
  const { logger } = setupLogging(settings, io);

  const failureText = await readFailureText(options, io);
  logger.debug(`Read ${failureText.length} characters of failure output`);

  const healer = new Healer({
    projectDir: settings.projectDir,
    rulesDir: settings.rulesDir,
    createCommit: settings.createCommit,
    timeoutMs: settings.timeoutMs,
    dryRun: settings.dryRun,
  });
  return healer.heal(failureText);
}

/**
 * Setup failures (bad input, unreadable rules) still produce a status file
 */
export async function healCommand(options: CliOptions, io: CliIO): Promise<number> {
  let view: HealView;

  try {
    view = await run(options, io);
  } catch (error) {
    const cliError = wrapError(error);
    io.stderr(renderCliError(cliError, paintFor(io, false)));

    const projectDir = resolve(io.cwd, options.projectDir ?? '.');
    const status: HealStatus = { healed: false, rollback: false, error: `Engine error: ${cliError.message}` };
    view = { status, descriptor: null, outcome: null, statusFile: await writeStatusFile(projectDir, status) };
  }

  io.stdout(options.json ? toJson(view) : renderHealResult(view, paintFor(io, false)));
  return 0;
}
