/**
 * CLI errors with actionable suggestions
 */

import { isAutoHealError } from '@autoheal/core';

export type CliErrorCode = 'CONFIG_INVALID' | 'FILE_NOT_FOUND' | 'FILE_READ_ERROR' | 'INVALID_INPUT' | 'UNKNOWN_ERROR';

const DEFAULT_SUGGESTIONS: Record<CliErrorCode, string[]> = {
  CONFIG_INVALID: ['Check the AUTOHEAL_* environment variables'],
  FILE_NOT_FOUND: ['Check the path passed to --log-file'],
  FILE_READ_ERROR: ['Check that the file is readable'],
  INVALID_INPUT: ['Pass --log-file <path>, --input <text>, or pipe the failure log on stdin'],
  UNKNOWN_ERROR: [],
};

export class CliError extends Error {
  readonly code: CliErrorCode;
  readonly suggestions: string[];
  readonly exitCode: number;

  constructor(message: string, code: CliErrorCode, options: { suggestions?: string[]; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CliError';
    this.code = code;
    this.suggestions = options.suggestions ?? DEFAULT_SUGGESTIONS[code];
    this.exitCode = 1;
  }
}

export function isCliError(error: unknown): error is CliError {
  return error instanceof CliError;
}

/**
 * Normalize anything thrown into a CliError; core errors keep their recovery hint
 */
export function wrapError(error: unknown): CliError {
  if (isCliError(error)) {
    return error;
  }
  if (isAutoHealError(error)) {
    return new CliError(error.message, 'UNKNOWN_ERROR', {
      suggestions: error.recoveryHint ? [error.recoveryHint] : [],
      cause: error,
    });
  }
  return new CliError(error instanceof Error ? error.message : String(error), 'UNKNOWN_ERROR', { cause: error });
}
