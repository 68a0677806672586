/**
 * Tests for FixApplier
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { MatchOutcome, WorkflowOutcome } from '@repo/shared-types';
import { FakeGitClient } from '../../__tests__/helpers/fake-git.js';
import {
  FORMAT_FAILURE,
  nodeCommand,
  testWorkflows,
  writeFileCode,
  type TestWorkflows,
} from '../../__tests__/helpers/workflows.js';
import { FormattingWorkflow } from '../../workflows/formatting-workflow.js';
import { FixApplier } from '../fix-applier.js';
import { dependencyFix, formattingFix, noopFix, type FormattingFix } from '../fix-descriptor.js';

const ORIGINAL = 'export const a = 1\n';
const FIXED_NOW = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

class ThrowingWorkflow extends FormattingWorkflow {
  override async apply(_match: MatchOutcome): Promise<WorkflowOutcome> {
    throw new Error('workflow exploded');
  }
}

describe('FixApplier', () => {
  let dir: string;
  let git: FakeGitClient;

  function fixFor(workflows: TestWorkflows): FormattingFix {
    const match = workflows.formatting.match(FORMAT_FAILURE);
    if (!match) throw new Error('formatting rule did not match');
    return formattingFix(workflows.formatting, match);
  }

  const applierFor = (options: { failOnUnsuccessfulOutcome?: boolean } = {}) =>
    new FixApplier({ projectDir: dir, now: () => FIXED_NOW, ...options });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'applier-'));
    git = new FakeGitClient(dir, { 'src/app.ts': ORIGINAL });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('applies a fix and releases the backup', async () => {
    const applier = applierFor();
    const descriptor = fixFor(testWorkflows(dir, git, nodeCommand(writeFileCode('src/app.ts', 'export const a = 2\n'))));

    const run = await applier.run(descriptor);

    expect(run.status).toEqual({ healed: true, rollback: false, error: '' });
    expect(run.outcome?.filesFixed).toEqual(['src/app.ts']);
    expect(applier.state).toBe('done');
    expect(applier.hasBackup).toBe(false);
    expect(existsSync(join(dir, '.autoheal-backup'))).toBe(false);
    expect(git.commits).toHaveLength(1);
  });

  it('writes the backup marker before the fix runs', async () => {
    const copyMarker = 'require("fs").copyFileSync(".autoheal-backup/backup.txt","marker-copy.txt")';
    const descriptor = fixFor(testWorkflows(dir, git, nodeCommand(copyMarker), { createCommit: false }));

    const run = await applierFor().run(descriptor);

    expect(run.status.healed).toBe(true);
    expect(readFileSync(join(dir, 'marker-copy.txt'), 'utf-8')).toBe(
      'timestamp=2024-01-02T03:04:05.000Z\nfix=formatting prettier_check_failed (prettier, low)\n'
    );
  });

  it('skips the marker when backups are turned off', async () => {
    const recordMarker = 'require("fs").writeFileSync("marker.txt",String(require("fs").existsSync(".autoheal-backup")))';
    const workflows = testWorkflows(dir, git, nodeCommand(recordMarker), {
      createCommit: false,
      engineConfig: { backup_before_fix: false },
    });

    await applierFor().run(fixFor(workflows));

    expect(readFileSync(join(dir, 'marker.txt'), 'utf-8')).toBe('false');
  });

  it('rolls back a fix that fails verification', async () => {
    const applier = applierFor();
    const descriptor = fixFor(testWorkflows(dir, git, nodeCommand(writeFileCode('src/app.ts', 'export const a = (\n'))));

    const run = await applier.run(descriptor);

    expect(run.status).toEqual({
      healed: false,
      rollback: true,
      error: 'Rollback triggered: Syntax errors detected after formatting fix: 1 files',
    });
    expect(run.outcome?.errorKind).toBe('verification');
    expect(applier.state).toBe('done');
    expect(git.read('src/app.ts')).toBe(ORIGINAL);
    expect(existsSync(join(dir, '.autoheal-backup'))).toBe(false);
    expect(git.commits).toEqual([]);
  });

  it('keeps an unsuccessful outcome when told not to fail on it', async () => {
    const descriptor = fixFor(testWorkflows(dir, git, nodeCommand('0')));

    const run = await applierFor({ failOnUnsuccessfulOutcome: false }).run(descriptor);

    expect(run.status).toEqual({
      healed: false,
      rollback: false,
      error: 'Fix applied but commit failed: No changes detected',
    });
    expect(git.calls).not.toContain('restoreAll');
  });

  it('rolls back when the workflow throws', async () => {
    const workflows = testWorkflows(dir, git, nodeCommand('0'));
    const throwing = new ThrowingWorkflow({ projectDir: dir, matcher: workflows.formatting.matcher, git });
    const match = throwing.match(FORMAT_FAILURE);
    if (!match) throw new Error('formatting rule did not match');
    const restorer = { restoreAll: vi.fn(async () => undefined) };

    const run = await new FixApplier({ projectDir: dir, restorer }).run(formattingFix(throwing, match));

    expect(run.status).toEqual({ healed: false, rollback: true, error: 'Rollback triggered: workflow exploded' });
    expect(run.outcome).toBeNull();
    expect(restorer.restoreAll).toHaveBeenCalledTimes(1);
  });

  it('reports a rollback that cannot restore the tree', async () => {
    const workflows = testWorkflows(dir, git, nodeCommand('0'));
    const throwing = new ThrowingWorkflow({ projectDir: dir, matcher: workflows.formatting.matcher, git });
    const match = throwing.match(FORMAT_FAILURE);
    if (!match) throw new Error('formatting rule did not match');
    const restorer = { restoreAll: vi.fn(async () => Promise.reject(new Error('disk full'))) };

    const run = await new FixApplier({ projectDir: dir, restorer }).run(formattingFix(throwing, match));

    expect(run.status).toEqual({
      healed: false,
      rollback: false,
      error: 'Rollback triggered: workflow exploded; Rollback failed: disk full',
    });
  });

  it('leaves uncommitted work alone when a notify handler fails the fix', async () => {
    writeFileSync(join(dir, 'src/app.ts'), 'user work in progress\n');
    const workflows = testWorkflows(dir, git, nodeCommand('0'));
    const match = workflows.dependency.match('npm ERR! ERESOLVE unable to resolve dependency tree');
    if (!match) throw new Error('dependency rule did not match');

    const run = await applierFor().run(dependencyFix(workflows.dependency, match));

    expect(run.status).toEqual({
      healed: false,
      rollback: true,
      error:
        'Rollback triggered: npm could not resolve the dependency tree. Align the conflicting peer dependencies in package.json.',
    });
    expect(git.calls).not.toContain('restoreAll');
    expect(readFileSync(join(dir, 'src/app.ts'), 'utf-8')).toBe('user work in progress\n');
    expect(existsSync(join(dir, '.autoheal-backup'))).toBe(false);
  });

  it('restores the tree when the workflow could not restore it itself', async () => {
    const workflows = testWorkflows(dir, git, nodeCommand(writeFileCode('src/app.ts', 'export const a = (\n')));
    git.failRestore = true;
    const restorer = { restoreAll: vi.fn(async () => undefined) };

    const run = await new FixApplier({ projectDir: dir, restorer }).run(fixFor(workflows));

    expect(run.status.rollback).toBe(true);
    expect(run.outcome?.changesPending).toBe(true);
    expect(restorer.restoreAll).toHaveBeenCalledTimes(1);
  });

  it('does nothing for a noop descriptor', async () => {
    const run = await applierFor().run(noopFix('nothing matched'));

    expect(run).toEqual({ status: { healed: false, rollback: false, error: '' }, outcome: null });
    expect(existsSync(join(dir, '.autoheal-backup'))).toBe(false);
  });

  describe('rollback', () => {
    it('is a no-op without a backup', async () => {
      const restorer = { restoreAll: vi.fn(async () => undefined) };
      const applier = new FixApplier({ projectDir: dir, restorer });

      await expect(applier.rollback()).resolves.toBeUndefined();
      expect(restorer.restoreAll).not.toHaveBeenCalled();
    });

    it('restores once however often it is called', async () => {
      const restorer = { restoreAll: vi.fn(async () => undefined) };
      const applier = new FixApplier({ projectDir: dir, restorer });
      await applier.backup(fixFor(testWorkflows(dir, git, nodeCommand('0'))));
      expect(existsSync(applier.markerPath)).toBe(true);

      await applier.rollback();
      await applier.rollback();

      expect(restorer.restoreAll).toHaveBeenCalledTimes(1);
      expect(applier.state).toBe('rolledBack');
      expect(existsSync(applier.markerPath)).toBe(false);
    });
  });
});
