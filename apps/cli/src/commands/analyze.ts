/**
 * analyze command - show which fix a failure log would get, without applying it
 */

import { Healer, fixSummary } from '@autoheal/core';
import { readFailureText } from '../lib/input.js';
import type { CliIO } from '../lib/io.js';
import { setupLogging } from '../lib/logger.js';
import { resolveSettings, type CliOptions } from '../lib/settings.js';
import { renderFix } from '../ui/render.js';

export async function analyzeCommand(options: CliOptions, io: CliIO): Promise<number> {
  const settings = resolveSettings(options, io);
  const { paint } = setupLogging(settings, io);

  const failureText = await readFailureText(options, io);
  const healer = new Healer({ projectDir: settings.projectDir, rulesDir: settings.rulesDir });
  const descriptor = healer.analyze(failureText);

  io.stdout(settings.json ? `${JSON.stringify(fixSummary(descriptor), null, 2)}\n` : renderFix(descriptor, paint));
  return 0;
}
