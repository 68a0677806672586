import { describe, it, expect, afterEach } from 'vitest';
import { Chalk } from 'chalk';
import { configureLogger, getLogger, type LogEntry } from '@autoheal/core';
import { createLogger, formatCoreEntry, forwardCoreLogs, paintFor } from '../../src/lib/logger.js';
import { fakeIO } from '../helpers/io.js';

const plain = new Chalk({ level: 0 });

const entry = (overrides: Partial<LogEntry> = {}): LogEntry => ({
  timestamp: '2024-01-02T03:04:05.000Z',
  level: 'info',
  component: 'autoheal.healer',
  message: 'Healing run finished',
  ...overrides,
});

describe('formatCoreEntry', () => {
  it('prefixes the component', () => {
    expect(formatCoreEntry(entry(), plain)).toBe('[autoheal.healer] Healing run finished');
  });

  it('appends the error message and context', () => {
    const line = formatCoreEntry(
      entry({ level: 'error', context: { ruleId: 'ruff_fixable_errors' }, error: { name: 'Error', message: 'boom' } }),
      plain
    );

    expect(line).toBe('[autoheal.healer] Healing run finished: boom {"ruleId":"ruff_fixable_errors"}');
  });

  it('leaves out an empty context', () => {
    expect(formatCoreEntry(entry({ context: {} }), plain)).toBe('[autoheal.healer] Healing run finished');
  });
});

describe('forwardCoreLogs', () => {
  afterEach(() => {
    configureLogger({ enableConsole: false });
  });

  it('writes JSON lines to stderr when asked to', () => {
    const io = fakeIO('/tmp');
    forwardCoreLogs(createLogger({ verbosity: 'quiet' }), { logLevel: 'warn', logJson: true }, io, plain);

    getLogger('executor').info('ignored');
    getLogger('executor').warn('Command timed out', { timeoutMs: 1000 });

    expect(io.err).toHaveLength(1);
    expect(JSON.parse(io.err[0] ?? '')).toMatchObject({
      level: 'warn',
      component: 'autoheal.executor',
      message: 'Command timed out',
      context: { timeoutMs: 1000 },
    });
  });
});

describe('paintFor', () => {
  it('never colors JSON output', () => {
    expect(paintFor({ env: { FORCE_COLOR: '1' }, stdoutIsTTY: true }, true).level).toBe(0);
  });

  it('colors when forced', () => {
    expect(paintFor({ env: { FORCE_COLOR: '1' }, stdoutIsTTY: false }, false).level).toBe(1);
  });
});
