/**
 * Status file
 *
 * `.autoheal-status` in the project directory, one `key=value` per line:
 *
 *   healed=true
 *   rollback=false
 *   error=
 */

import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { HealStatus } from '@repo/shared-types';
import { STATUS_FILE_NAME } from '../verification/atomic-committer.js';

/**
 * Collapse line breaks so the error stays on its line
 */
export function flattenError(error: string): string {
  return error.replace(/\s*[\r\n]+\s*/g, ' ').trim();
}

export function formatStatus(status: HealStatus): string {
  return `healed=${status.healed}\nrollback=${status.rollback}\nerror=${flattenError(status.error)}\n`;
}

export function parseStatus(text: string): HealStatus {
  const values = new Map<string, string>();
  for (const line of text.split('\n')) {
    const separator = line.indexOf('=');
    if (separator > 0) {
      values.set(line.slice(0, separator).trim(), line.slice(separator + 1));
    }
  }
  return {
    healed: values.get('healed') === 'true',
    rollback: values.get('rollback') === 'true',
    error: values.get('error') ?? '',
  };
}

export function statusFilePath(projectDir: string): string {
  return join(projectDir, STATUS_FILE_NAME);
}

export async function writeStatusFile(projectDir: string, status: HealStatus): Promise<string> {
  const path = statusFilePath(projectDir);
  await writeFile(path, formatStatus(status), 'utf-8');
  return path;
}

export async function readStatusFile(projectDir: string): Promise<HealStatus> {
  return parseStatus(await readFile(statusFilePath(projectDir), 'utf-8'));
}
