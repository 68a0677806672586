/**
 * Git access for the commit unit
 *
 * Uses execFile with argument arrays; nothing goes through a shell.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { GitStatusSummary } from '@repo/shared-types';
import { GitOperationError } from '../utils/errors.js';

const execFileAsync = promisify(execFile);

// ============================================================================
// Types
// ============================================================================

export type GitChangeKind = 'modified' | 'added' | 'deleted' | 'renamed' | 'untracked';

export interface GitFileChange {
  /** Path relative to the repository root */
  path: string;
  kind: GitChangeKind;
  /** Original path of a rename */
  from?: string;
}

export interface GitClient {
  readonly cwd: string;
  isRepository(): Promise<boolean>;
  status(): Promise<GitFileChange[]>;
  /** Stage every change except the given paths */
  stageAll(exclude: readonly string[]): Promise<void>;
  stagedFiles(): Promise<string[]>;
  commit(message: string, author?: string | null): Promise<void>;
  /** Short hash of HEAD */
  headCommit(): Promise<string>;
  /** Discard staged and unstaged changes to tracked files */
  restoreAll(): Promise<void>;
}

// ============================================================================
// Porcelain parsing
// ============================================================================

function classify(code: string): GitChangeKind | null {
  const index = code.charAt(0);
  const worktree = code.charAt(1);

  if (code === '??') return 'untracked';
  if (code === '!!') return null;
  if (index === 'D' || worktree === 'D') return 'deleted';
  if (index === 'R' || index === 'C') return 'renamed';
  if (index === 'A') return 'added';
  if ('MTU'.includes(index) || 'MTU'.includes(worktree)) return 'modified';
  return null;
}

/**
 * Parse `git status --porcelain -z` output
 */
export function parsePorcelainStatus(output: string): GitFileChange[] {
  const entries = output.split('\0');
  const changes: GitFileChange[] = [];

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    if (entry === undefined || entry.length < 4) continue;

    const code = entry.slice(0, 2);
    const path = entry.slice(3);
    const kind = classify(code);

    if (code.charAt(0) === 'R' || code.charAt(0) === 'C') {
      // the source path follows as its own entry
      const from = entries[i + 1];
      i++;
      if (kind) changes.push(from === undefined ? { path, kind } : { path, kind, from });
      continue;
    }

    if (kind) changes.push({ path, kind });
  }

  return changes;
}

export function summarizeStatus(changes: readonly GitFileChange[]): GitStatusSummary {
  const summary: GitStatusSummary = { modified: 0, added: 0, deleted: 0, renamed: 0, untracked: 0 };
  for (const change of changes) {
    summary[change.kind]++;
  }
  return summary;
}

// ============================================================================
// CLI client
// ============================================================================

export class CliGitClient implements GitClient {
  constructor(readonly cwd: string) {}

  async isRepository(): Promise<boolean> {
    try {
      const output = await this.git(['rev-parse', '--is-inside-work-tree'], 'isRepository');
      return output.trim() === 'true';
    } catch (error) {
      if (error instanceof GitOperationError) return false;
      throw error;
    }
  }

  async status(): Promise<GitFileChange[]> {
    const output = await this.git(['status', '--porcelain', '-z'], 'status');
    return parsePorcelainStatus(output);
  }

  async stageAll(exclude: readonly string[]): Promise<void> {
    const pathspecs = exclude.map((path) => `:(exclude)${path}`);
    await this.git(['add', '-A', '--', '.', ...pathspecs], 'stage');
  }

  async stagedFiles(): Promise<string[]> {
    const output = await this.git(['diff', '--cached', '--name-only', '-z'], 'stagedFiles');
    return output.split('\0').filter((path) => path.length > 0);
  }

  async commit(message: string, author?: string | null): Promise<void> {
    const args = ['commit', '-m', message];
    if (author) {
      args.push(`--author=${author}`);
    }
    await this.git(args, 'commit', 'Commit failed');
  }

  async headCommit(): Promise<string> {
    const output = await this.git(['rev-parse', '--short', 'HEAD'], 'headCommit');
    return output.trim();
  }

  async restoreAll(): Promise<void> {
    await this.git(['restore', '--staged', '.'], 'restore', 'Failed to restore changes');
    await this.git(['restore', '.'], 'restore', 'Failed to restore changes');
  }

  private async git(args: string[], operation: string, prefix = 'Git operation failed'): Promise<string> {
    try {
      const { stdout } = await execFileAsync('git', args, {
        cwd: this.cwd,
        encoding: 'utf-8',
        maxBuffer: 64 * 1024 * 1024,
      });
      return stdout;
    } catch (error) {
      const stderr = error instanceof Error && 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
      const detail = stderr || (error instanceof Error ? error.message : String(error));
      throw new GitOperationError(`${prefix}: ${detail}`, {
        operation,
        args,
        stderr,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}
