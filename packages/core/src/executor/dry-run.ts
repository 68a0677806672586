/**
 * Dry-run rewrites: the same tool invocation, reporting instead of writing
 */

import { basename } from 'node:path';

function withFlags(argv: readonly string[], ...flags: string[]): string[] {
  const result = [...argv];
  for (const flag of flags) {
    if (!result.includes(flag)) {
      result.push(flag);
    }
  }
  return result;
}

function without(argv: readonly string[], ...flags: string[]): string[] {
  return argv.filter((arg) => !flags.includes(arg));
}

const IN_PLACE = ['--in-place', '-i'];

/**
 * Rewrite argv for a dry run. Returns null when the tool has no mode that
 * leaves files untouched, so the command must not run at all.
 */
export function toDryRunArgv(argv: readonly string[]): string[] | null {
  const executable = argv[0];
  if (executable === undefined) {
    return null;
  }

  const subcommand = argv[1];

  switch (basename(executable)) {
    case 'black':
      return withFlags(argv, '--check', '--diff');
    case 'isort':
      return withFlags(argv, '--check-only', '--diff');
    case 'ruff':
      return subcommand === 'format' ? withFlags(argv, '--check', '--diff') : withFlags(without(argv, '--fix'), '--no-fix');
    case 'prettier': {
      const rewritten = argv.map((arg) => (arg === '--write' || arg === '-w' ? '--check' : arg));
      return withFlags(rewritten, '--check');
    }
    case 'eslint':
      return without(argv, '--fix');
    case 'autopep8':
    case 'yapf':
      return withFlags(without(argv, ...IN_PLACE), '--diff');
    case 'autoflake':
    case 'docformatter':
      return withFlags(without(argv, ...IN_PLACE), '--check');
    case 'rustfmt':
      return withFlags(argv, '--check');
    case 'pixi':
      if (subcommand !== 'install') return null;
      return argv.includes('--frozen') ? [...argv] : withFlags(argv, '--locked');
    case 'npm':
      return subcommand === 'install' || subcommand === 'i' || subcommand === 'ci' ? withFlags(argv, '--dry-run') : null;
    default:
      // pyupgrade and unknown tools only ever rewrite in place
      return null;
  }
}
