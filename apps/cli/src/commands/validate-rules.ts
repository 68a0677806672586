/**
 * validate-rules command - report rule document problems
 *
 * With --check-tools the workflows also check the project directory, the git
 * repository and every fix tool on PATH.
 */

import {
  DependencyWorkflow,
  FormattingWorkflow,
  RULE_FILES,
  loadRuleSet,
  rulesPath,
  type PatternMatcher,
  type RuleKind,
} from '@autoheal/core';
import type { CliIO } from '../lib/io.js';
import { setupLogging } from '../lib/logger.js';
import { resolveSettings, type CliOptions, type CliSettings } from '../lib/settings.js';
import { renderRuleReport, type RuleReport } from '../ui/render.js';

const RULE_KINDS = Object.keys(RULE_FILES).filter((kind): kind is RuleKind => kind in RULE_FILES);

async function problemsFor(kind: RuleKind, matcher: PatternMatcher, settings: CliSettings, checkTools: boolean): Promise<string[]> {
  if (!checkTools) {
    return matcher.validate();
  }
  const options = { projectDir: settings.projectDir, matcher, timeoutMs: settings.timeoutMs };
  const workflow = kind === 'formatting' ? new FormattingWorkflow(options) : new DependencyWorkflow(options);
  return workflow.validateConfiguration({ checkTools: true });
}

export async function validateRulesCommand(options: CliOptions, io: CliIO): Promise<number> {
  const settings = resolveSettings(options, io);
  const { logger, paint } = setupLogging(settings, io);

  const rules = loadRuleSet(settings.rulesDir);
  const reports: RuleReport[] = [];
  for (const kind of RULE_KINDS) {
    const path = rulesPath(kind, settings.rulesDir);
    const matcher = rules[kind];
    reports.push({ kind, path, rules: matcher.ruleCount, problems: await problemsFor(kind, matcher, settings, options.checkTools) });
  }

  const problems = reports.reduce((total, report) => total + report.problems.length, 0);
  io.stdout(settings.json ? `${JSON.stringify(reports, null, 2)}\n` : renderRuleReport(reports, paint));

  if (problems > 0) {
    logger.error(`${problems} rule problem${problems === 1 ? '' : 's'} found`);
    return 1;
  }
  logger.success('All rules valid');
  return 0;
}
