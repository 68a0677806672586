/**
 * In-memory CliIO for command tests
 */

import type { CliIO } from '../../src/lib/io.js';

export interface FakeIO extends CliIO {
  out: string[];
  err: string[];
}

export function fakeIO(cwd: string, options: { env?: NodeJS.ProcessEnv; stdin?: string } = {}): FakeIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    cwd,
    env: { NO_COLOR: '1', ...options.env },
    stdinIsTTY: options.stdin === undefined,
    stdoutIsTTY: false,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
    readStdin: async () => options.stdin ?? '',
    out,
    err,
  };
}
