import { describe, it, expect } from 'vitest';
import {
  ExecutionError,
  GitOperationError,
  LockfileVerificationError,
  SyntaxVerificationError,
  ValidationError,
  errorKindOf,
} from '../errors.js';

describe('errorKindOf', () => {
  it('classes a stale or missing lock file as an execution failure', () => {
    const error = new LockfileVerificationError('pixi.lock file not found after install', { lockfile: 'pixi.lock' });

    expect(errorKindOf(error)).toBe('execution');
  });

  it('maps each error family onto its kind', () => {
    expect(errorKindOf(new ValidationError('bad', { component: 'Test', operation: 'check' }))).toBe('validation');
    expect(errorKindOf(new ExecutionError('failed', { component: 'Test', operation: 'run', command: 'ruff' }))).toBe(
      'execution'
    );
    expect(errorKindOf(new SyntaxVerificationError('broken', { component: 'Test', operation: 'verify', failures: [] }))).toBe(
      'verification'
    );
    expect(errorKindOf(new GitOperationError('locked', { operation: 'commit', args: ['commit'] }))).toBe('git');
    expect(errorKindOf(new Error('boom'))).toBe('internal');
  });
});
