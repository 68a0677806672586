/**
 * Human-readable output for command results
 */

import type { ChalkInstance } from 'chalk';
import type { HealStatus, WorkflowOutcome } from '@repo/shared-types';
import { describeFix, type FixDescriptor } from '@autoheal/core';
import type { CliError } from '../lib/errors.js';

export const symbols = {
  success: '✓',
  error: '✖',
  rollback: '↺',
  bullet: '•',
} as const;

export interface HealView {
  status: HealStatus;
  descriptor: FixDescriptor | null;
  outcome: WorkflowOutcome | null;
  statusFile: string;
}

export function renderFix(descriptor: FixDescriptor, paint: ChalkInstance): string {
  if (descriptor.kind === 'noop') {
    return `${paint.yellow(symbols.bullet)} ${descriptor.reason}\n`;
  }

  const { match } = descriptor;
  const lines = [`${paint.cyan(symbols.bullet)} ${paint.bold(describeFix(descriptor))}`];
  if (match.handler) {
    lines.push(`  ${match.handler.action}: ${match.handler.message}`);
  } else if (match.fixCommand !== null) {
    lines.push(`  command: ${match.fixCommand}`);
  }
  for (const [name, value] of Object.entries(match.captures)) {
    lines.push(`  ${name}: ${value}`);
  }
  return `${lines.join('\n')}\n`;
}

export function renderHealResult(view: HealView, paint: ChalkInstance): string {
  const { status, outcome } = view;
  const lines: string[] = [];

  if (status.healed) {
    lines.push(`${paint.green(symbols.success)} Healed`);
  } else if (status.rollback) {
    lines.push(`${paint.yellow(symbols.rollback)} Rolled back`);
  } else {
    lines.push(`${paint.red(symbols.error)} Not healed`);
  }

  if (view.descriptor && view.descriptor.kind !== 'noop') {
    lines.push(`  fix: ${describeFix(view.descriptor)}`);
  }
  if (outcome) {
    lines.push(`  ${outcome.message.split('\n').join('\n  ')}`);
    for (const file of outcome.filesFixed) {
      lines.push(`  ${symbols.bullet} ${file}`);
    }
  }
  if (status.error !== '' && status.error !== outcome?.message) {
    lines.push(`  ${paint.red(status.error)}`);
  }
  lines.push(paint.dim(`  status: ${view.statusFile}`));
  return `${lines.join('\n')}\n`;
}

export interface RuleReport {
  kind: string;
  path: string;
  rules: number;
  problems: string[];
}

export function renderRuleReport(reports: readonly RuleReport[], paint: ChalkInstance): string {
  const lines: string[] = [];
  for (const report of reports) {
    const mark = report.problems.length === 0 ? paint.green(symbols.success) : paint.red(symbols.error);
    lines.push(`${mark} ${report.kind}: ${report.rules} rules (${report.path})`);
    for (const problem of report.problems) {
      lines.push(`  ${symbols.bullet} ${problem}`);
    }
  }
  return `${lines.join('\n')}\n`;
}

export function renderCliError(error: CliError, paint: ChalkInstance): string {
  const lines = [`${paint.red(symbols.error)} ${error.message}`];
  for (const suggestion of error.suggestions) {
    lines.push(`  ${paint.dim(symbols.bullet)} ${suggestion}`);
  }
  return `${lines.join('\n')}\n`;
}
