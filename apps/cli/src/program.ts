/**
 * Command wiring for the autoheal binary
 */

import { Command, CommanderError } from 'commander';
import { analyzeCommand, healCommand, validateRulesCommand } from './commands/index.js';
import { wrapError } from './lib/errors.js';
import type { CliIO } from './lib/io.js';
import { paintFor } from './lib/logger.js';
import { parseOptions, type CliOptions } from './lib/settings.js';
import { CLI_VERSION } from './lib/version.js';
import { renderCliError } from './ui/render.js';

type CommandHandler = (options: CliOptions, io: CliIO) => Promise<number>;

const parseSeconds = (value: string): number => Number(value);

function withProjectOptions(command: Command): Command {
  return command
    .option('-p, --project-dir <dir>', 'project to heal (default: current directory)')
    .option('-r, --rules-dir <dir>', 'directory holding formatting.yml and dependencies.yml');
}

function withInputOptions(command: Command): Command {
  return command
    .option('-l, --log-file <path>', 'read the failure log from a file')
    .option('-i, --input <text>', 'failure log text; stdin is read when neither is given');
}

/**
 * Build the program. `report` receives the exit code of whichever command ran.
 */
export function createProgram(io: CliIO, report: (exitCode: number) => void): Command {
  const program = new Command();

  program
    .name('autoheal')
    .description('Detect, fix, verify and commit recoverable CI failures')
    .version(CLI_VERSION)
    .option('-v, --verbose', 'show debug output')
    .option('-q, --quiet', 'only show errors')
    .option('--json', 'print machine-readable output')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });

  const bind = (handler: CommandHandler) => async (_options: unknown, command: Command) => {
    report(await handler(parseOptions(command.optsWithGlobals()), io));
  };

  withInputOptions(withProjectOptions(program.command('heal').description('Apply the fix for a CI failure and write .autoheal-status')))
    .option('-t, --timeout <seconds>', 'fix command timeout', parseSeconds)
    .option('--no-commit', 'leave the fix uncommitted')
    .option('--dry-run', 'preview the fix without changing files')
    .action(bind(healCommand));

  withInputOptions(withProjectOptions(program.command('analyze').description('Show the fix a CI failure would get')))
    .action(bind(analyzeCommand));

  withProjectOptions(program.command('validate-rules').description('Check rule documents for problems'))
    .option('--check-tools', 'also check the project, git and every fix tool')
    .action(bind(validateRulesCommand));

  return program;
}

/**
 * Run one invocation and return its exit code
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const cliError = wrapError(error);
    io.stderr(renderCliError(cliError, paintFor(io, false)));
    return cliError.exitCode;
  }
  return exitCode;
}

export type { CliIO } from './lib/io.js';
export { processIO } from './lib/io.js';
