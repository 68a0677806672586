/**
 * Verification and commit result types
 */

export interface SyntaxCheckOutcome {
  /** Path relative to the working directory */
  filePath: string;
  valid: boolean;
  error?: string;
  /** 1-based line, when the parser reports one */
  line?: number;
  /** 1-based column, when the parser reports one */
  column?: number;
}

export interface CommitOutcome {
  success: boolean;
  commitHash: string | null;
  /** Final commit message (or the reason nothing was committed) */
  message: string;
  files: string[];
  error?: string;
}

export interface GitStatusSummary {
  modified: number;
  added: number;
  deleted: number;
  renamed: number;
  untracked: number;
}
