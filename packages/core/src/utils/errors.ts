/**
 * Custom Error Classes
 *
 * Provides structured error handling with error codes, context, and recovery hints.
 */

import type { ExecutionResult, SyntaxCheckOutcome, WorkflowErrorKind } from '@repo/shared-types';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'EXECUTION_FAILED'
  | 'TIMEOUT'
  | 'SYNTAX_INVALID'
  | 'LOCKFILE_STALE'
  | 'GIT_FAILED'
  | 'CONFIG_INVALID'
  | 'ROLLBACK_FAILED'
  | 'INTERNAL_ERROR';

export interface ErrorContext {
  code: ErrorCode;
  component: string;
  operation: string;
  details?: Record<string, unknown>;
  recoveryHint?: string;
  retryable?: boolean;
}

/**
 * Base error class for all engine errors
 */
export class AutoHealError extends Error {
  public readonly code: ErrorCode;
  public readonly component: string;
  public readonly operation: string;
  public readonly details: Record<string, unknown>;
  public readonly recoveryHint?: string;
  public readonly retryable: boolean;
  public readonly timestamp: Date;
  public readonly cause?: Error;

  constructor(message: string, context: ErrorContext, cause?: Error) {
    super(message);
    this.name = 'AutoHealError';
    this.code = context.code;
    this.component = context.component;
    this.operation = context.operation;
    this.details = context.details ?? {};
    this.recoveryHint = context.recoveryHint;
    this.retryable = context.retryable ?? false;
    this.timestamp = new Date();
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AutoHealError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      component: this.component,
      operation: this.operation,
      details: this.details,
      recoveryHint: this.recoveryHint,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.component}.${this.operation}: ${this.message}`;
  }
}

/**
 * Rejected input: a command that breaks the execution policy, a malformed
 * template, an unparseable command line
 */
export class ValidationError extends AutoHealError {
  public readonly field?: string;
  public readonly value?: unknown;
  public readonly constraints?: string[];

  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      field?: string;
      value?: unknown;
      constraints?: string[];
      recoveryHint?: string;
    }
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      component: options.component,
      operation: options.operation,
      details: { field: options.field, constraints: options.constraints },
      recoveryHint: options.recoveryHint ?? `Check the ${options.field ?? 'input'} value`,
      retryable: false,
    });
    this.name = 'ValidationError';
    this.field = options.field;
    this.value = options.value;
    this.constraints = options.constraints;
  }
}

/**
 * A process could not be started
 */
export class ExecutionError extends AutoHealError {
  public readonly command: string;

  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      command: string;
      recoveryHint?: string;
      cause?: Error;
    }
  ) {
    super(
      message,
      {
        code: 'EXECUTION_FAILED',
        component: options.component,
        operation: options.operation,
        details: { command: options.command },
        recoveryHint: options.recoveryHint ?? 'Check that the tool is installed and on PATH',
        retryable: false,
      },
      options.cause
    );
    this.name = 'ExecutionError';
    this.command = options.command;
  }
}

/**
 * Timeout error. Carries whatever output the process produced before it was killed.
 */
export class TimeoutError extends AutoHealError {
  public readonly timeoutMs: number;
  public readonly elapsed: number;
  public readonly result: ExecutionResult;

  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      timeoutMs: number;
      elapsed: number;
      result: ExecutionResult;
    }
  ) {
    super(message, {
      code: 'TIMEOUT',
      component: options.component,
      operation: options.operation,
      details: { timeoutMs: options.timeoutMs, elapsed: options.elapsed, command: options.result.command },
      recoveryHint: 'Consider increasing timeout or optimizing the operation',
      retryable: true,
    });
    this.name = 'TimeoutError';
    this.timeoutMs = options.timeoutMs;
    this.elapsed = options.elapsed;
    this.result = options.result;
  }
}

/**
 * One or more changed files no longer parse
 */
export class SyntaxVerificationError extends AutoHealError {
  public readonly failures: SyntaxCheckOutcome[];

  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      failures: SyntaxCheckOutcome[];
    }
  ) {
    super(message, {
      code: 'SYNTAX_INVALID',
      component: options.component,
      operation: options.operation,
      details: { files: options.failures.map((failure) => failure.filePath) },
      recoveryHint: 'Inspect the formatter output; the working tree was restored',
      retryable: false,
    });
    this.name = 'SyntaxVerificationError';
    this.failures = options.failures;
  }
}

/**
 * A dependency fix ran but its lock file is missing or older than the manifest
 */
export class LockfileVerificationError extends AutoHealError {
  public readonly lockfile: string;

  constructor(message: string, options: { lockfile: string; details?: Record<string, unknown> }) {
    super(message, {
      code: 'LOCKFILE_STALE',
      component: 'LockfileVerifier',
      operation: 'verify',
      details: { lockfile: options.lockfile, ...options.details },
      recoveryHint: 'Regenerate the lock file locally and commit it',
      retryable: false,
    });
    this.name = 'LockfileVerificationError';
    this.lockfile = options.lockfile;
  }
}

/**
 * A git command failed
 */
export class GitOperationError extends AutoHealError {
  public readonly args: string[];
  public readonly stderr?: string;

  constructor(
    message: string,
    options: {
      operation: string;
      args: string[];
      stderr?: string;
      recoveryHint?: string;
      cause?: Error;
    }
  ) {
    super(
      message,
      {
        code: 'GIT_FAILED',
        component: 'Git',
        operation: options.operation,
        details: { args: options.args, stderr: options.stderr },
        recoveryHint: options.recoveryHint ?? 'Check that the directory is a git repository with a configured identity',
        retryable: false,
      },
      options.cause
    );
    this.name = 'GitOperationError';
    this.args = options.args;
    this.stderr = options.stderr;
  }
}

/**
 * Configuration error
 */
export class ConfigError extends AutoHealError {
  public readonly configKey?: string;

  constructor(
    message: string,
    options: {
      component: string;
      configKey?: string;
      recoveryHint?: string;
      cause?: Error;
    }
  ) {
    super(
      message,
      {
        code: 'CONFIG_INVALID',
        component: options.component,
        operation: 'configure',
        details: { configKey: options.configKey },
        recoveryHint: options.recoveryHint ?? 'Check configuration values',
        retryable: false,
      },
      options.cause
    );
    this.name = 'ConfigError';
    this.configKey = options.configKey;
  }
}

/**
 * The working tree could not be put back after a failed fix
 */
export class RollbackError extends AutoHealError {
  constructor(message: string, options: { operation: string; cause?: Error }) {
    super(
      message,
      {
        code: 'ROLLBACK_FAILED',
        component: 'Supervisor',
        operation: options.operation,
        recoveryHint: 'Run `git restore --staged . && git restore .` by hand',
        retryable: false,
      },
      options.cause
    );
    this.name = 'RollbackError';
  }
}

/**
 * Check if an error is an AutoHealError
 */
export function isAutoHealError(error: unknown): error is AutoHealError {
  return error instanceof AutoHealError;
}

/**
 * Map an error onto the kind reported in a workflow outcome
 */
export function errorKindOf(error: unknown): WorkflowErrorKind {
  if (error instanceof ValidationError || error instanceof ConfigError) return 'validation';
  if (error instanceof TimeoutError) return 'timeout';
  // A lock file left stale by an install means the install itself failed
  if (error instanceof ExecutionError || error instanceof LockfileVerificationError) return 'execution';
  if (error instanceof SyntaxVerificationError) return 'verification';
  if (error instanceof GitOperationError) return 'git';
  return 'internal';
}
