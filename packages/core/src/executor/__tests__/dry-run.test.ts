import { describe, it, expect } from 'vitest';
import { toDryRunArgv } from '../dry-run.js';

describe('toDryRunArgv', () => {
  it('adds check and diff to black', () => {
    expect(toDryRunArgv(['black', '.'])).toEqual(['black', '.', '--check', '--diff']);
    expect(toDryRunArgv(['black', '--check', '.'])).toEqual(['black', '--check', '.', '--diff']);
  });

  it('adds check-only and diff to isort', () => {
    expect(toDryRunArgv(['isort', '.'])).toEqual(['isort', '.', '--check-only', '--diff']);
  });

  it('turns ruff check --fix into --no-fix', () => {
    expect(toDryRunArgv(['ruff', 'check', '--fix', '.'])).toEqual(['ruff', 'check', '.', '--no-fix']);
  });

  it('makes ruff format report only', () => {
    expect(toDryRunArgv(['ruff', 'format', '.'])).toEqual(['ruff', 'format', '.', '--check', '--diff']);
  });

  it('turns prettier --write into --check', () => {
    expect(toDryRunArgv(['prettier', '--write', 'src'])).toEqual(['prettier', '--check', 'src']);
    expect(toDryRunArgv(['prettier', 'src'])).toEqual(['prettier', 'src', '--check']);
  });

  it('drops --fix from eslint', () => {
    expect(toDryRunArgv(['eslint', '--fix', 'src'])).toEqual(['eslint', 'src']);
  });

  it('swaps in-place edits for a diff or a check', () => {
    expect(toDryRunArgv(['autopep8', '--in-place', '-r', '.'])).toEqual(['autopep8', '-r', '.', '--diff']);
    expect(toDryRunArgv(['yapf', '-i', '-r', '.'])).toEqual(['yapf', '-r', '.', '--diff']);
    expect(toDryRunArgv(['autoflake', '--in-place', 'app.py'])).toEqual(['autoflake', 'app.py', '--check']);
    expect(toDryRunArgv(['docformatter', '-i', 'app.py'])).toEqual(['docformatter', 'app.py', '--check']);
    expect(toDryRunArgv(['rustfmt', 'src/main.rs'])).toEqual(['rustfmt', 'src/main.rs', '--check']);
  });

  it('locks pixi install and dry-runs npm install', () => {
    expect(toDryRunArgv(['pixi', 'install'])).toEqual(['pixi', 'install', '--locked']);
    expect(toDryRunArgv(['pixi', 'install', '--frozen'])).toEqual(['pixi', 'install', '--frozen']);
    expect(toDryRunArgv(['npm', 'install'])).toEqual(['npm', 'install', '--dry-run']);
  });

  it('has no rewrite for commands that only write', () => {
    expect(toDryRunArgv(['pyupgrade', '--py38-plus', 'app.py'])).toBeNull();
    expect(toDryRunArgv(['npm', 'run', 'lint'])).toBeNull();
    expect(toDryRunArgv(['pixi', 'add', 'numpy'])).toBeNull();
    expect(toDryRunArgv(['node', 'fix.js'])).toBeNull();
    expect(toDryRunArgv([])).toBeNull();
  });
});
