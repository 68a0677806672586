import { describe, it, expect } from 'vitest';
import { CliError } from '../../src/lib/errors.js';
import { parseOptions, resolveSettings } from '../../src/lib/settings.js';

const io = (env: NodeJS.ProcessEnv = {}) => ({ cwd: '/work/repo', env });

describe('parseOptions', () => {
  it('fills in defaults', () => {
    expect(parseOptions({})).toEqual({
      commit: true,
      dryRun: false,
      checkTools: false,
      json: false,
      verbose: false,
      quiet: false,
    });
  });

  it('drops options it does not know', () => {
    expect(parseOptions({ version: true, quiet: true })).not.toHaveProperty('version');
  });

  it('rejects a timeout that is not a positive integer', () => {
    expect(() => parseOptions({ timeout: -5 })).toThrow(CliError);
    expect(() => parseOptions({ timeout: Number.NaN })).toThrow(/^Invalid options: timeout: /);
  });
});

describe('resolveSettings', () => {
  it('uses defaults with nothing set', () => {
    expect(resolveSettings(parseOptions({}), io())).toEqual({
      projectDir: '/work/repo',
      rulesDir: undefined,
      timeoutMs: undefined,
      createCommit: undefined,
      dryRun: false,
      json: false,
      verbosity: 'normal',
      logLevel: 'info',
      logJson: false,
    });
  });

  it('reads the environment', () => {
    const settings = resolveSettings(
      parseOptions({}),
      io({
        AUTOHEAL_TIMEOUT_SECONDS: '45',
        AUTOHEAL_RULES_DIR: 'config/rules',
        AUTOHEAL_LOG_LEVEL: 'warn',
        AUTOHEAL_LOG_JSON: 'true',
      })
    );

    expect(settings.timeoutMs).toBe(45_000);
    expect(settings.rulesDir).toBe('/work/repo/config/rules');
    expect(settings.logLevel).toBe('warn');
    expect(settings.logJson).toBe(true);
  });

  it('lets flags win over the environment', () => {
    const settings = resolveSettings(
      parseOptions({ timeout: 10, rulesDir: '/opt/rules', verbose: true, projectDir: 'sub' }),
      io({ AUTOHEAL_TIMEOUT_SECONDS: '45', AUTOHEAL_RULES_DIR: 'config/rules', AUTOHEAL_LOG_LEVEL: 'warn' })
    );

    expect(settings.timeoutMs).toBe(10_000);
    expect(settings.rulesDir).toBe('/opt/rules');
    expect(settings.logLevel).toBe('debug');
    expect(settings.verbosity).toBe('verbose');
    expect(settings.projectDir).toBe('/work/repo/sub');
  });

  it('only overrides commits when --no-commit is given', () => {
    expect(resolveSettings(parseOptions({ commit: false }), io()).createCommit).toBe(false);
    expect(resolveSettings(parseOptions({ commit: true }), io()).createCommit).toBeUndefined();
  });

  it('reports a bad environment as a configuration error', () => {
    try {
      resolveSettings(parseOptions({}), io({ AUTOHEAL_LOG_LEVEL: 'loud' }));
      expect.unreachable('resolveSettings should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(CliError);
      expect(error).toMatchObject({ code: 'CONFIG_INVALID', exitCode: 1 });
    }
  });
});
