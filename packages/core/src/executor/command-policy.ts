/**
 * Command Policy
 *
 * Decides whether a command string may be executed: no shell metacharacters
 * or destructive commands, and an executable from the allow-list.
 */

import { basename } from 'node:path';
import { ValidationError } from '../utils/errors.js';
import { tokenizeCommand } from './command-line.js';

export const DANGEROUS_PATTERNS = [
  'rm ',
  'sudo ',
  'chmod +x',
  '&&',
  '||',
  ';',
  '|',
  '>',
  '>>',
  '<',
  'curl',
  'wget',
  'ssh',
  'scp',
  'rsync',
  '$(',
  '`',
] as const;

export const DEFAULT_ALLOWED_TOOLS = [
  'ruff',
  'black',
  'isort',
  'autopep8',
  'yapf',
  'pyupgrade',
  'autoflake',
  'docformatter',
  'prettier',
  'eslint',
  'rustfmt',
  'pixi',
  'npm',
] as const;

export class CommandPolicy {
  readonly allowedTools: ReadonlySet<string>;

  constructor(allowedTools: Iterable<string> = DEFAULT_ALLOWED_TOOLS) {
    this.allowedTools = new Set(allowedTools);
  }

  /**
   * Validate a command and return its argv. Throws ValidationError when the
   * command is rejected.
   */
  check(command: string): string[] {
    const lowered = command.toLowerCase();
    for (const pattern of DANGEROUS_PATTERNS) {
      if (lowered.includes(pattern)) {
        throw new ValidationError(`Dangerous command pattern detected: ${pattern}`, {
          component: 'Executor',
          operation: 'validate',
          field: 'command',
          value: command,
          constraints: [`must not contain "${pattern}"`],
          recoveryHint: 'Fix commands run a single tool without shell syntax',
        });
      }
    }

    const argv = tokenizeCommand(command);
    const executable = argv[0];
    if (executable === undefined) {
      throw new ValidationError('Empty command', {
        component: 'Executor',
        operation: 'validate',
        field: 'command',
        value: command,
      });
    }

    const tool = basename(executable);
    if (!this.allowedTools.has(tool)) {
      throw new ValidationError(`Command not in allowlist: ${tool}`, {
        component: 'Executor',
        operation: 'validate',
        field: 'command',
        value: command,
        constraints: [`one of: ${[...this.allowedTools].join(', ')}`],
        recoveryHint: 'Add the tool to the executor allow-list if it is safe to run',
      });
    }

    return argv;
  }

  isAllowed(tool: string): boolean {
    return this.allowedTools.has(tool);
  }
}
