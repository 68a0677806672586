/**
 * Failure text sources: inline, log file, or stdin
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { CliError } from './errors.js';
import type { CliIO } from './io.js';

export interface InputOptions {
  input?: string;
  logFile?: string;
}

function errnoCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export async function readFailureText(options: InputOptions, io: Pick<CliIO, 'cwd' | 'stdinIsTTY' | 'readStdin'>): Promise<string> {
  if (options.input !== undefined) {
    return options.input;
  }

  if (options.logFile !== undefined) {
    const path = resolve(io.cwd, options.logFile);
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        throw new CliError(`Log file not found: ${path}`, 'FILE_NOT_FOUND', { cause: error });
      }
      throw new CliError(`Could not read log file: ${path}`, 'FILE_READ_ERROR', { cause: error });
    }
  }

  if (io.stdinIsTTY) {
    throw new CliError('No failure log given', 'INVALID_INPUT');
  }
  return io.readStdin();
}
