/**
 * Fix descriptors
 *
 * What the selection engine hands to the supervisor. Each variant carries
 * exactly what its apply path needs.
 */

import type { MatchOutcome, RuleSeverity } from '@repo/shared-types';
import type { DependencyWorkflow } from '../workflows/dependency-workflow.js';
import type { FormattingWorkflow } from '../workflows/formatting-workflow.js';

interface WorkflowFix<K extends string, W> {
  kind: K;
  workflow: W;
  match: MatchOutcome;
  ruleId: string;
  tool: string;
  severity: RuleSeverity;
}

export type FormattingFix = WorkflowFix<'formatting', FormattingWorkflow>;
export type DependencyFix = WorkflowFix<'dependency', DependencyWorkflow>;

export interface NoopFix {
  kind: 'noop';
  reason: string;
}

export type FixDescriptor = FormattingFix | DependencyFix | NoopFix;

export const NO_FIX_REASON = 'No applicable fix found';

export function formattingFix(workflow: FormattingWorkflow, match: MatchOutcome): FormattingFix {
  return { kind: 'formatting', workflow, match, ruleId: match.ruleId, tool: match.tool, severity: match.severity };
}

export function dependencyFix(workflow: DependencyWorkflow, match: MatchOutcome): DependencyFix {
  return { kind: 'dependency', workflow, match, ruleId: match.ruleId, tool: match.tool, severity: match.severity };
}

export function noopFix(reason: string = NO_FIX_REASON): NoopFix {
  return { kind: 'noop', reason };
}

/**
 * One-line summary, e.g. `formatting ruff_fixable_errors (ruff, high)`
 */
export function describeFix(descriptor: FixDescriptor): string {
  if (descriptor.kind === 'noop') {
    return `noop (${descriptor.reason})`;
  }
  return `${descriptor.kind} ${descriptor.ruleId} (${descriptor.tool}, ${descriptor.severity})`;
}

/**
 * Plain-data view for printing; leaves out the workflow instance
 */
export function fixSummary(descriptor: FixDescriptor): Record<string, unknown> {
  if (descriptor.kind === 'noop') {
    return { kind: 'noop', reason: descriptor.reason };
  }
  const { match } = descriptor;
  return {
    kind: descriptor.kind,
    ruleId: descriptor.ruleId,
    tool: descriptor.tool,
    severity: descriptor.severity,
    fixCommand: match.fixCommand,
    captures: match.captures,
    ...(match.handler ? { handler: match.handler } : {}),
  };
}
