/**
 * Tests for DependencyWorkflow
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { parseRuleDocument } from '@repo/shared-config';
import { CommandExecutor } from '../../executor/command-executor.js';
import { joinCommand } from '../../executor/command-line.js';
import { PatternMatcher } from '../../patterns/pattern-matcher.js';
import { loadMatcher, rulesPath } from '../../patterns/rule-loader.js';
import { AtomicCommitter } from '../../verification/atomic-committer.js';
import { SyntaxVerifier } from '../../verification/syntax-verifier.js';
import { FakeGitClient } from '../../__tests__/helpers/fake-git.js';
import { DependencyWorkflow } from '../dependency-workflow.js';

const NODE = basename(process.execPath);
const LOCK_OUTDATED = 'Error: lock file deps.lock is not up to date';

const nodeCommand = (code: string) => joinCommand([process.execPath, '-e', code]);

function matcherFor(fixCommand: string): PatternMatcher {
  const document = parseRuleDocument(
    {
      version: '1.0',
      patterns: {
        node: [
          {
            id: 'deps_lock_outdated',
            name: 'Lock outdated',
            pattern: 'lock file (\\S+) is not up to date',
            description: '',
            fix_command: fixCommand,
            tool: 'node',
            severity: 'high',
            requires_git_commit: true,
            commit_message_template: 'fix(deps): refresh {lockfile}',
            capture_groups: [{ index: 1, name: 'lockfile' }],
          },
        ],
      },
    },
    'dependency-test.yml'
  );
  return new PatternMatcher([document]);
}

describe('DependencyWorkflow', () => {
  let dir: string;
  let git: FakeGitClient;
  let executor: CommandExecutor;

  function workflowFor(matcher: PatternMatcher): DependencyWorkflow {
    const verifier = new SyntaxVerifier({ projectDir: dir, executor });
    return new DependencyWorkflow({
      projectDir: dir,
      matcher,
      executor,
      git,
      committer: new AtomicCommitter({ git, verifier }),
    });
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'dependency-'));
    git = new FakeGitClient(dir, { 'deps.lock': 'v1\n' });
    executor = new CommandExecutor({ workingDirectory: dir, allowedTools: [NODE], timeoutMs: 20_000 });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reports when nothing matches', async () => {
    const outcome = await workflowFor(matcherFor(nodeCommand('0'))).process('everything installed');

    expect(outcome.success).toBe(false);
    expect(outcome.message).toBe('No dependency issues detected');
  });

  it('runs the install and commits the refreshed lock file', async () => {
    const command = nodeCommand('require("fs").writeFileSync("deps.lock","v2")');

    const outcome = await workflowFor(matcherFor(command)).process(LOCK_OUTDATED);

    expect(outcome.success).toBe(true);
    expect(outcome.message).toBe(`Successfully executed: ${command}\nChanges committed: fix(deps): refresh deps.lock (1 file)`);
    expect(outcome.filesFixed).toEqual(['deps.lock']);
    expect(git.commits.map((commit) => commit.message)).toEqual(['fix(deps): refresh deps.lock (1 file)']);
  });

  it('treats an install that changes nothing as a success', async () => {
    const command = nodeCommand('0');

    const outcome = await workflowFor(matcherFor(command)).process(LOCK_OUTDATED);

    expect(outcome.success).toBe(true);
    expect(outcome.message).toBe(`Successfully executed: ${command}\nNo changes to commit`);
    expect(outcome.filesFixed).toEqual([]);
    expect(outcome.errorKind).toBeUndefined();
  });

  it('fails on a non-zero exit and restores the tree', async () => {
    const command = nodeCommand('require("fs").writeFileSync("deps.lock","half"),process.stderr.write("resolve failed"),process.exit(3)');
    const workflow = workflowFor(matcherFor(command));

    const outcome = await workflow.process(LOCK_OUTDATED);

    expect(outcome.success).toBe(false);
    expect(outcome.errorKind).toBe('execution');
    expect(outcome.message).toBe(`Failed to execute ${command}: resolve failed`);
    expect(outcome.filesFixed).toEqual([]);
    expect(workflow.state).toBe('failed');
    expect(git.calls).toContain('restoreAll');
    expect(git.read('deps.lock')).toBe('v1\n');
  });

  it('fails as an execution error when the install leaves no lock file', async () => {
    const binDir = mkdtempSync(join(tmpdir(), 'dependency-bin-'));
    try {
      const npm = join(binDir, 'npm');
      symlinkSync(process.execPath, npm);
      writeFileSync(join(dir, 'install'), 'require("fs").writeFileSync("deps.lock", "v2")\n');
      executor = new CommandExecutor({ workingDirectory: dir, allowedTools: ['npm'], timeoutMs: 20_000 });

      const outcome = await workflowFor(matcherFor(joinCommand([npm, 'install']))).process(LOCK_OUTDATED);

      expect(outcome.success).toBe(false);
      expect(outcome.errorKind).toBe('execution');
      expect(outcome.message).toBe('Fix verification failed: package-lock.json file not found after install');
      expect(git.calls).toContain('restoreAll');
      expect(git.read('deps.lock')).toBe('v1\n');
    } finally {
      rmSync(binDir, { recursive: true, force: true });
    }
  });

  describe('custom handlers', () => {
    it('answers a missing module with an install suggestion and no side effects', async () => {
      const workflow = workflowFor(loadMatcher([rulesPath('dependency')]));

      const outcome = await workflow.process("ModuleNotFoundError: No module named 'cv2'");

      expect(outcome).toMatchObject({
        success: true,
        ruleId: 'module_not_found_error',
        message: "Module 'cv2' is not installed. Add it with: pixi add opencv",
        filesFixed: [],
      });
      expect(outcome.command).toBeUndefined();
      expect(git.calls).toEqual([]);
    });

    it('reports a conflict as a failure', async () => {
      const workflow = workflowFor(loadMatcher([rulesPath('dependency')]));

      const outcome = await workflow.process('Conflict detected in package resolution');

      expect(outcome.success).toBe(false);
      expect(outcome.ruleId).toBe('pixi_conflict_detected');
      expect(outcome.message).toBe(
        'Dependency conflict detected in package resolution. Relax the version constraints in the manifest and re-run pixi install.'
      );
      expect(outcome.error).toBe(outcome.message);
      expect(git.calls).toEqual([]);
      expect(workflow.state).toBe('failed');
    });
  });
});
