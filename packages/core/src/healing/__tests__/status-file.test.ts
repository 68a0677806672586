/**
 * Tests for the status file
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { flattenError, formatStatus, parseStatus, readStatusFile, writeStatusFile } from '../status-file.js';

describe('status file', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('formats one key per line', () => {
    expect(formatStatus({ healed: true, rollback: false, error: '' })).toBe('healed=true\nrollback=false\nerror=\n');
  });

  it('keeps a multi-line error on one line', () => {
    expect(flattenError('Rollback triggered: Failed to execute pixi install:\n  solve error\r\n')).toBe(
      'Rollback triggered: Failed to execute pixi install: solve error'
    );
    expect(formatStatus({ healed: false, rollback: true, error: 'a\nb' })).toBe('healed=false\nrollback=true\nerror=a b\n');
  });

  it('parses what it writes, including = inside the error', () => {
    expect(parseStatus('healed=false\nrollback=true\nerror=exit=2 seen\n')).toEqual({
      healed: false,
      rollback: true,
      error: 'exit=2 seen',
    });
  });

  it('writes .autoheal-status in the project directory', async () => {
    dir = mkdtempSync(join(tmpdir(), 'status-'));

    const path = await writeStatusFile(dir, { healed: false, rollback: false, error: 'No applicable fix found' });

    expect(path).toBe(join(dir, '.autoheal-status'));
    expect(readFileSync(path, 'utf-8')).toBe('healed=false\nrollback=false\nerror=No applicable fix found\n');
    expect(await readStatusFile(dir)).toEqual({ healed: false, rollback: false, error: 'No applicable fix found' });
  });
});
