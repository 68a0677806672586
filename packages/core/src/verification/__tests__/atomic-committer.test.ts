/**
 * Tests for AtomicCommitter
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { spawnSync, execFileSync } from 'node:child_process';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AtomicCommitter, fileCountSuffix, formatTimestamp } from '../atomic-committer.js';
import { CliGitClient } from '../git-client.js';
import { SyntaxVerifier } from '../syntax-verifier.js';
import { CommandExecutor } from '../../executor/command-executor.js';
import { GitOperationError, SyntaxVerificationError } from '../../utils/errors.js';
import { FakeGitClient } from '../../__tests__/helpers/fake-git.js';

const hasGit = spawnSync('git', ['--version']).status === 0;
const FIXED_NOW = new Date(2024, 2, 5, 9, 7, 3);

function committerFor(git: FakeGitClient | CliGitClient, dir: string, commitPrefix?: string): AtomicCommitter {
  const verifier = new SyntaxVerifier({ projectDir: dir, executor: new CommandExecutor({ workingDirectory: dir }) });
  return new AtomicCommitter({ git, verifier, commitPrefix, now: () => FIXED_NOW });
}

describe('formatTimestamp', () => {
  it('formats local time', () => {
    expect(formatTimestamp(FIXED_NOW)).toBe('2024-03-05 09:07:03');
  });
});

describe('fileCountSuffix', () => {
  it('uses the singular for one file', () => {
    expect(fileCountSuffix(1)).toBe(' (1 file)');
    expect(fileCountSuffix(3)).toBe(' (3 files)');
  });
});

describe('AtomicCommitter', () => {
  let dir: string;
  let git: FakeGitClient;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'committer-'));
    git = new FakeGitClient(dir, { 'src/app.ts': 'export const a = 1;\n', 'config.json': '{}' });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('commits verified changes with a rendered message', async () => {
    git.write('src/app.ts', 'export const a = 2;\n');
    git.write('config.json', '{"b": 1}');

    const outcome = await committerFor(git, dir).atomicCommit('fix(format): apply {tool} at {timestamp}', 'prettier', {
      author: 'Bot <bot@example.test>',
    });

    expect(outcome).toEqual({
      success: true,
      commitHash: 'c0ffee1',
      message: 'fix(format): apply prettier at 2024-03-05 09:07:03 (2 files)',
      files: ['config.json', 'src/app.ts'],
    });
    expect(git.commits).toEqual([
      {
        message: 'fix(format): apply prettier at 2024-03-05 09:07:03 (2 files)',
        author: 'Bot <bot@example.test>',
        files: ['config.json', 'src/app.ts'],
      },
    ]);
  });

  it('can leave out the file count and add a prefix', async () => {
    git.write('src/app.ts', 'export const a = 3;\n');

    const outcome = await committerFor(git, dir, '[autoheal] ').atomicCommit('style: {tool}', 'black', {
      includeFileCount: false,
    });

    expect(outcome.message).toBe('[autoheal] style: black');
  });

  it('reports when there is nothing to commit', async () => {
    const outcome = await committerFor(git, dir).atomicCommit('fix: {tool}', 'ruff');

    expect(outcome).toEqual({
      success: false,
      commitHash: null,
      message: 'No files to commit',
      files: [],
      error: 'No changes detected',
    });
    expect(git.commits).toEqual([]);
  });

  it('never stages the backup marker or status file', async () => {
    git.write('src/app.ts', 'export const a = 4;\n');
    git.write('.autoheal-backup/backup.txt', 'marker');
    git.write('.autoheal-status', 'healed=false');

    const outcome = await committerFor(git, dir).atomicCommit('fix: {tool}', 'ruff');

    expect(outcome.files).toEqual(['src/app.ts']);
  });

  it('restores the tree and raises on a syntax failure', async () => {
    git.write('src/app.ts', 'export const a = ;\n');

    const error = await committerFor(git, dir)
      .atomicCommit('fix: {tool}', 'prettier')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SyntaxVerificationError);
    if (!(error instanceof SyntaxVerificationError)) return;
    expect(error.message).toBe('Syntax errors found in 1 files');
    expect(error.failures.map((f) => f.filePath)).toEqual(['src/app.ts']);
    expect(git.read('src/app.ts')).toBe('export const a = 1;\n');
    expect(await git.stagedFiles()).toEqual([]);
    expect(git.calls).not.toContain('stageAll');
  });

  it('skips verification when asked', async () => {
    git.write('src/app.ts', 'export const a = ;\n');

    const outcome = await committerFor(git, dir).atomicCommit('fix: {tool}', 'prettier', { verifySyntax: false });

    expect(outcome.success).toBe(true);
  });

  it('restores the tree when the commit fails', async () => {
    git.write('src/app.ts', 'export const a = 5;\n');
    git.failCommit = 'hook rejected';

    await expect(committerFor(git, dir).atomicCommit('fix: {tool}', 'ruff')).rejects.toThrow(GitOperationError);
    expect(git.read('src/app.ts')).toBe('export const a = 1;\n');
    expect(git.calls.at(-1)).toBe('restoreAll');
  });

  it('lists modified files and summarizes status', async () => {
    git.write('src/app.ts', 'export const a = 6;\n');
    git.write('notes.txt', 'untracked');
    git.remove('config.json');
    const committer = committerFor(git, dir);

    expect(await committer.changedFiles()).toEqual(['src/app.ts']);
    expect(await committer.statusSummary()).toEqual({ modified: 1, added: 0, deleted: 1, renamed: 0, untracked: 1 });
  });
});

describe.skipIf(!hasGit)('AtomicCommitter with git', () => {
  let dir: string;
  const run = (...args: string[]) => execFileSync('git', args, { cwd: dir, encoding: 'utf-8' });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'committer-git-'));
    run('init', '-q');
    run('config', 'user.name', 'Test User');
    run('config', 'user.email', 'test@example.test');
    run('config', 'commit.gpgsign', 'false');
    writeFileSync(join(dir, 'app.js'), 'module.exports = 1;\n');
    run('add', '.');
    run('commit', '-q', '-m', 'initial');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('leaves nothing staged after a syntax failure', async () => {
    writeFileSync(join(dir, 'app.js'), 'module.exports = ;\n');
    const committer = committerFor(new CliGitClient(dir), dir);

    await expect(committer.atomicCommit('fix: {tool}', 'eslint')).rejects.toThrow(SyntaxVerificationError);

    expect(run('diff', '--cached', '--name-only')).toBe('');
    expect(run('status', '--porcelain')).toBe('');
    expect(readFileSync(join(dir, 'app.js'), 'utf-8')).toBe('module.exports = 1;\n');
  });

  it('commits a valid change', async () => {
    writeFileSync(join(dir, 'app.js'), 'module.exports = 2;\n');
    const committer = committerFor(new CliGitClient(dir), dir);

    const outcome = await committer.atomicCommit('fix(lint): apply {tool}', 'eslint');

    expect(outcome.success).toBe(true);
    expect(outcome.files).toEqual(['app.js']);
    expect(run('log', '-1', '--format=%s').trim()).toBe('fix(lint): apply eslint (1 file)');
    expect(run('rev-parse', '--short', 'HEAD').trim()).toBe(outcome.commitHash);
  });
});
