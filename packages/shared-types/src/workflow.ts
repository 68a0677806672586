/**
 * Workflow and healing result types
 */

import type { CommitOutcome } from './verification.js';

export type WorkflowErrorKind = 'validation' | 'execution' | 'timeout' | 'verification' | 'git' | 'internal';

/**
 * Result of one workflow invocation.
 *
 * INVARIANT: filesFixed is empty whenever no fix command ran.
 */
export interface WorkflowOutcome {
  success: boolean;
  message: string;
  ruleId?: string;
  tool?: string;
  /** Command that was executed, if any */
  command?: string;
  filesFixed: string[];
  commit?: CommitOutcome;
  durationMs: number;
  error?: string;
  errorKind?: WorkflowErrorKind;
  /** A fix command ran and the workflow could not restore the tree after it */
  changesPending?: boolean;
}

/**
 * Terminal record of a full healing run
 */
export interface HealStatus {
  healed: boolean;
  rollback: boolean;
  /** Empty on full success */
  error: string;
}
