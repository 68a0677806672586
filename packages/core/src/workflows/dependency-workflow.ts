/**
 * Dependency Workflow
 *
 * Lock file and environment fixes (pixi, npm). Unlike formatters, an install
 * that exits non-zero has failed, and an install that exits 0 must leave a
 * fresh lock file behind.
 */

import type { ExecutionResult, MatchOutcome, WorkflowErrorKind } from '@repo/shared-types';
import { tokenizeCommand } from '../executor/command-line.js';
import { ExecutionError, LockfileVerificationError } from '../utils/errors.js';
import { FixWorkflow, type AppliedFix, type FixWorkflowOptions } from './base-workflow.js';
import { LockfileVerifier, lockfileSpecFor } from './lockfile-verifier.js';

const messageOf = (error: unknown) => (error instanceof Error ? error.message : String(error));

export class DependencyWorkflow extends FixWorkflow {
  readonly kind = 'dependency' as const;
  protected readonly noMatchMessage = 'No dependency issues detected';
  private readonly lockfiles: LockfileVerifier;

  constructor(options: FixWorkflowOptions) {
    super(options);
    this.lockfiles = new LockfileVerifier(this.executor, this.projectDir, this.logger.child('lockfile'));
  }

  protected async checkExecution(match: MatchOutcome, result: ExecutionResult): Promise<void> {
    if (result.exitCode !== 0) {
      throw new ExecutionError(`Failed to execute ${result.command}: ${result.stderr.trim()}`, {
        component: 'DependencyWorkflow',
        operation: 'checkExecution',
        command: result.command,
      });
    }

    const spec = lockfileSpecFor(tokenizeCommand(result.command));
    if (spec) {
      this.logger.debug('Verifying lock file', { ruleId: match.ruleId, lockfile: spec.lockfile });
      await this.lockfiles.verify(spec);
    }
  }

  protected describeSuccess(fix: AppliedFix): string {
    return fix.commit
      ? `Successfully executed: ${fix.command}\nChanges committed: ${fix.commit.message}`
      : `Successfully executed: ${fix.command}`;
  }

  /**
   * An install that leaves the tracked tree unchanged is still a success
   */
  protected describeEmptyCommit(fix: AppliedFix): { success: boolean; message: string } {
    return { success: true, message: `Successfully executed: ${fix.command}\nNo changes to commit` };
  }

  protected describeFailure(error: unknown, kind: WorkflowErrorKind): string {
    if (error instanceof LockfileVerificationError) {
      return `Fix verification failed: ${messageOf(error)}`;
    }
    switch (kind) {
      case 'verification':
        return `Fix verification failed: ${messageOf(error)}`;
      case 'internal':
        return `Unexpected workflow error: ${messageOf(error)}`;
      default:
        return messageOf(error);
    }
  }
}
