/**
 * Atomic Committer
 *
 * Verify → stage → commit as one unit. Any failure restores the working tree
 * (staged and unstaged changes) before the error propagates.
 */

import type { CommitOutcome, GitStatusSummary, SyntaxCheckOutcome } from '@repo/shared-types';
import { GitOperationError, SyntaxVerificationError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { summarizeStatus, type GitClient } from './git-client.js';
import type { SyntaxVerifier } from './syntax-verifier.js';

/** Written by the supervisor; never part of a fix commit */
export const BACKUP_DIR_NAME = '.autoheal-backup';
export const STATUS_FILE_NAME = '.autoheal-status';

const NEVER_STAGED = [BACKUP_DIR_NAME, STATUS_FILE_NAME] as const;

export interface AtomicCommitterOptions {
  git: GitClient;
  verifier: SyntaxVerifier;
  /** Prepended to every commit message */
  commitPrefix?: string;
  now?: () => Date;
  logger?: Logger;
}

export interface AtomicCommitOptions {
  author?: string | null;
  includeFileCount?: boolean;
  verifySyntax?: boolean;
}

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Local time as YYYY-MM-DD HH:mm:ss
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function fileCountSuffix(count: number): string {
  return count === 1 ? ' (1 file)' : ` (${count} files)`;
}

export class AtomicCommitter {
  private readonly git: GitClient;
  private readonly verifier: SyntaxVerifier;
  private readonly commitPrefix: string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: AtomicCommitterOptions) {
    this.git = options.git;
    this.verifier = options.verifier;
    this.commitPrefix = options.commitPrefix ?? '';
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? getLogger('committer');
  }

  async isRepository(): Promise<boolean> {
    return this.git.isRepository();
  }

  async statusSummary(): Promise<GitStatusSummary> {
    return summarizeStatus(await this.git.status());
  }

  /**
   * Modified, added and renamed paths. Deletions and untracked files are left out.
   */
  async changedFiles(): Promise<string[]> {
    const changes = await this.git.status();
    return changes
      .filter((change) => change.kind === 'modified' || change.kind === 'added' || change.kind === 'renamed')
      .map((change) => change.path);
  }

  async verifyChangedFiles(): Promise<SyntaxCheckOutcome[]> {
    const files = await this.changedFiles();
    this.logger.debug('Verifying changed files', { count: files.length });
    return this.verifier.verifyFiles(files);
  }

  async restoreAll(): Promise<void> {
    this.logger.info('Restoring working tree');
    await this.git.restoreAll();
  }

  renderMessage(template: string, tool: string, fileCount: number, includeFileCount: boolean): string {
    const message = template.replace(/\{tool\}/g, tool).replace(/\{timestamp\}/g, formatTimestamp(this.now()));
    const prefixed = this.commitPrefix && !message.startsWith(this.commitPrefix) ? `${this.commitPrefix}${message}` : message;
    return includeFileCount ? `${prefixed}${fileCountSuffix(fileCount)}` : prefixed;
  }

  /**
   * Verify changed files, stage everything and commit. Returns a "No files to
   * commit" outcome when nothing is staged. Throws SyntaxVerificationError or
   * GitOperationError after restoring the tree.
   */
  async atomicCommit(messageTemplate: string, toolName: string, options: AtomicCommitOptions = {}): Promise<CommitOutcome> {
    const { author = null, includeFileCount = true, verifySyntax = true } = options;

    try {
      if (verifySyntax) {
        const outcomes = await this.verifyChangedFiles();
        const failures = outcomes.filter((outcome) => !outcome.valid);
        if (failures.length > 0) {
          throw new SyntaxVerificationError(`Syntax errors found in ${failures.length} files`, {
            component: 'Committer',
            operation: 'atomicCommit',
            failures,
          });
        }
      }

      await this.git.stageAll(NEVER_STAGED);
      const files = await this.git.stagedFiles();

      if (files.length === 0) {
        this.logger.info('Nothing staged after fix');
        return { success: false, commitHash: null, message: 'No files to commit', files: [], error: 'No changes detected' };
      }

      const message = this.renderMessage(messageTemplate, toolName, files.length, includeFileCount);
      await this.git.commit(message, author);
      const commitHash = await this.git.headCommit();

      this.logger.info('Committed fix', { commitHash, files: files.length });
      return { success: true, commitHash, message, files };
    } catch (error) {
      await this.restoreAfterFailure(error);

      if (error instanceof SyntaxVerificationError || error instanceof GitOperationError) {
        throw error;
      }
      throw new GitOperationError(`Atomic commit failed: ${error instanceof Error ? error.message : String(error)}`, {
        operation: 'atomicCommit',
        args: [],
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private async restoreAfterFailure(reason: unknown): Promise<void> {
    this.logger.warn('Commit unit failed, restoring working tree', {
      reason: reason instanceof Error ? reason.message : String(reason),
    });
    try {
      await this.git.restoreAll();
    } catch (restoreError) {
      this.logger.error('Restore after failed commit did not complete', restoreError instanceof Error ? restoreError : undefined);
    }
  }
}
