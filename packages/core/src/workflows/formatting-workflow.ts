/**
 * Formatting Workflow
 *
 * Formatter fixes (ruff, black, isort, prettier, eslint). A formatter that
 * exits non-zero may still have rewritten files, so the run goes on to
 * verification instead of failing.
 */

import type { ExecutionResult, MatchOutcome, WorkflowErrorKind } from '@repo/shared-types';
import { SyntaxVerificationError } from '../utils/errors.js';
import { FixWorkflow, type AppliedFix } from './base-workflow.js';

const messageOf = (error: unknown) => (error instanceof Error ? error.message : String(error));

export class FormattingWorkflow extends FixWorkflow {
  readonly kind = 'formatting' as const;
  protected readonly noMatchMessage = 'No fixable formatting issues detected';

  protected async checkExecution(match: MatchOutcome, result: ExecutionResult): Promise<void> {
    if (result.exitCode !== 0) {
      this.logger.warn('Fix command exited non-zero, continuing to verification', {
        tool: match.tool,
        exitCode: result.exitCode,
        stderr: result.stderr.trim().slice(0, 500),
      });
    }
  }

  protected describeSuccess(fix: AppliedFix): string {
    return fix.commit
      ? `Successfully fixed and committed ${fix.match.tool} formatting issues`
      : `Successfully applied ${fix.match.tool} formatting fixes`;
  }

  protected describeEmptyCommit(fix: AppliedFix): { success: boolean; message: string } {
    return { success: false, message: `Fix applied but commit failed: ${fix.commit?.error ?? 'No changes detected'}` };
  }

  protected describeFailure(error: unknown, kind: WorkflowErrorKind): string {
    switch (kind) {
      case 'verification':
        return error instanceof SyntaxVerificationError
          ? `Syntax errors detected after formatting fix: ${error.failures.length} files`
          : messageOf(error);
      case 'validation':
      case 'execution':
      case 'timeout':
        return `Failed to execute formatting command: ${messageOf(error)}`;
      case 'git':
        return messageOf(error);
      case 'internal':
        return `Unexpected workflow error: ${messageOf(error)}`;
    }
  }
}
