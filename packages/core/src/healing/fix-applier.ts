/**
 * Fix Applier
 *
 * Supervises one fix: back up, apply, then release the backup or roll back.
 *
 *   start → backedUp → applied → done
 *   start → backedUp → rolledBack → done
 *
 * Every stage reports a result instead of throwing, so each exit path is
 * explicit. Rollback drops the backup marker and restores the tree through
 * the restorer only when the fix may have left changes behind; without a
 * backup it does nothing.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { HealStatus, WorkflowOutcome } from '@repo/shared-types';
import { BACKUP_DIR_NAME } from '../verification/atomic-committer.js';
import { RollbackError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { describeFix, type FixDescriptor } from './fix-descriptor.js';

export const BACKUP_MARKER_FILE = 'backup.txt';

export type SupervisorState = 'start' | 'backedUp' | 'applied' | 'rolledBack' | 'done';

/**
 * Anything that can put the working tree back to HEAD
 */
export interface Restorer {
  restoreAll(): Promise<void>;
}

export interface FixApplierOptions {
  projectDir: string;
  /** Defaults to the committer of the descriptor's workflow */
  restorer?: Restorer;
  /** Treat an unsuccessful workflow outcome as a rollback trigger (default: true) */
  failOnUnsuccessfulOutcome?: boolean;
  dryRun?: boolean;
  now?: () => Date;
  logger?: Logger;
}

export interface SupervisedRun {
  status: HealStatus;
  /** Null for noop descriptors and failed backups */
  outcome: WorkflowOutcome | null;
}

type StageResult =
  | { ok: true; outcome: WorkflowOutcome | null }
  | { ok: false; error: string; outcome: WorkflowOutcome | null; restore: boolean };

interface Backup {
  restorer: Restorer | null;
  marker: boolean;
}

const messageOf = (error: unknown) => (error instanceof Error ? error.message : String(error));

export class FixApplier {
  readonly projectDir: string;
  private readonly restorer: Restorer | null;
  private readonly failOnUnsuccessfulOutcome: boolean;
  private readonly dryRun: boolean;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private backupState: Backup | null = null;
  private current: SupervisorState = 'start';

  constructor(options: FixApplierOptions) {
    this.projectDir = resolve(options.projectDir);
    this.restorer = options.restorer ?? null;
    this.failOnUnsuccessfulOutcome = options.failOnUnsuccessfulOutcome ?? true;
    this.dryRun = options.dryRun ?? false;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? getLogger('supervisor');
  }

  get state(): SupervisorState {
    return this.current;
  }

  get markerPath(): string {
    return join(this.projectDir, BACKUP_DIR_NAME, BACKUP_MARKER_FILE);
  }

  get hasBackup(): boolean {
    return this.backupState !== null;
  }

  async run(descriptor: FixDescriptor): Promise<SupervisedRun> {
    this.current = 'start';
    this.logger.info('Supervising fix', { fix: describeFix(descriptor) });

    try {
      await this.backup(descriptor);
    } catch (error) {
      this.logger.error('Backup failed', error instanceof Error ? error : undefined);
      this.current = 'done';
      return { status: { healed: false, rollback: false, error: `Backup failed: ${messageOf(error)}` }, outcome: null };
    }

    const applied = await this.apply(descriptor);

    if (applied.ok) {
      this.current = 'applied';
      await this.release();
      this.current = 'done';
      const { outcome } = applied;
      const healed = outcome !== null && outcome.success;
      const error = outcome === null || healed ? '' : outcome.message;
      return { status: { healed, rollback: false, error }, outcome };
    }

    const error = `Rollback triggered: ${applied.error}`;
    try {
      await this.rollback({ restore: applied.restore });
    } catch (rollbackError) {
      this.logger.error('Rollback failed', rollbackError instanceof Error ? rollbackError : undefined);
      this.current = 'done';
      return {
        status: { healed: false, rollback: false, error: `${error}; ${messageOf(rollbackError)}` },
        outcome: applied.outcome,
      };
    }

    this.current = 'done';
    return { status: { healed: false, rollback: true, error }, outcome: applied.outcome };
  }

  /**
   * Arm the rollback and, unless the engine config turns it off, write the
   * backup marker.
   */
  async backup(descriptor: FixDescriptor): Promise<void> {
    const restorer = this.restorer ?? (descriptor.kind === 'noop' ? null : descriptor.workflow.committer);
    const writeMarker = descriptor.kind === 'noop' || descriptor.workflow.matcher.engineConfig.backupBeforeFix;

    if (writeMarker) {
      await mkdir(join(this.projectDir, BACKUP_DIR_NAME), { recursive: true });
      await writeFile(this.markerPath, `timestamp=${this.now().toISOString()}\nfix=${describeFix(descriptor)}\n`, 'utf-8');
    }

    this.backupState = { restorer, marker: writeMarker };
    this.current = 'backedUp';
    this.logger.debug('Backup taken', { marker: writeMarker });
  }

  /**
   * Drop the marker and, unless `restore` is false, restore the working tree.
   * Safe to call repeatedly.
   */
  async rollback(options: { restore?: boolean } = {}): Promise<void> {
    const restore = options.restore ?? true;
    const backup = this.backupState;
    if (!backup) {
      this.logger.debug('No backup to roll back');
      return;
    }

    this.logger.warn('Rolling back fix');
    if (backup.restorer && restore) {
      try {
        await backup.restorer.restoreAll();
      } catch (error) {
        throw new RollbackError(`Rollback failed: ${messageOf(error)}`, {
          operation: 'rollback',
          cause: error instanceof Error ? error : undefined,
        });
      }
    }

    await this.removeMarker(backup);
    this.backupState = null;
    this.current = 'rolledBack';
  }

  private async apply(descriptor: FixDescriptor): Promise<StageResult> {
    try {
      switch (descriptor.kind) {
        case 'noop':
          this.logger.info('Nothing to apply', { reason: descriptor.reason });
          return { ok: true, outcome: null };
        case 'formatting':
          return this.judge(await descriptor.workflow.apply(descriptor.match, { dryRun: this.dryRun }));
        case 'dependency':
          return this.judge(await descriptor.workflow.apply(descriptor.match, { dryRun: this.dryRun }));
      }
    } catch (error) {
      this.logger.error('Fix application threw', error instanceof Error ? error : undefined);
      // The workflow may have died after its fix command wrote files
      const restore = descriptor.kind !== 'noop' && descriptor.match.fixCommand !== null && !this.dryRun;
      return { ok: false, error: messageOf(error), outcome: null, restore };
    }
  }

  private judge(outcome: WorkflowOutcome): StageResult {
    if (!outcome.success && this.failOnUnsuccessfulOutcome) {
      return { ok: false, error: outcome.message, outcome, restore: outcome.changesPending === true };
    }
    return { ok: true, outcome };
  }

  private async release(): Promise<void> {
    const backup = this.backupState;
    this.backupState = null;
    if (backup) {
      await this.removeMarker(backup);
    }
  }

  private async removeMarker(backup: Backup): Promise<void> {
    if (!backup.marker) return;
    try {
      await rm(join(this.projectDir, BACKUP_DIR_NAME), { recursive: true, force: true });
    } catch (error) {
      this.logger.warn('Could not remove backup marker', { path: this.markerPath, error: messageOf(error) });
    }
  }
}
