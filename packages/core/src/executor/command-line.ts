/**
 * Command-line tokenizing and quoting (POSIX shell rules, no expansion)
 */

import { ValidationError } from '../utils/errors.js';

const SAFE_ARGUMENT = /^[\w@%+=:,./-]+$/;

/**
 * Split a command line into argv. Quotes group words and are removed;
 * nothing is expanded. Throws ValidationError on an unterminated quote
 * or a trailing escape.
 */
export function tokenizeCommand(command: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < command.length; i++) {
    const char = command.charAt(i);

    if (quote === "'") {
      if (char === "'") {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = null;
      } else if (char === '\\' && i + 1 < command.length && '"\\$`\n'.includes(command.charAt(i + 1))) {
        i++;
        current += command.charAt(i);
      } else {
        current += char;
      }
      continue;
    }

    if (char === "'" || char === '"') {
      quote = char;
      inToken = true;
    } else if (char === '\\') {
      if (i + 1 >= command.length) {
        throw new ValidationError('No escaped character', {
          component: 'Executor',
          operation: 'tokenize',
          field: 'command',
          value: command,
        });
      }
      i++;
      current += command.charAt(i);
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (quote !== null) {
    throw new ValidationError('No closing quotation', {
      component: 'Executor',
      operation: 'tokenize',
      field: 'command',
      value: command,
    });
  }

  if (inToken) {
    tokens.push(current);
  }

  return tokens;
}

/**
 * Quote a single argument so that tokenizeCommand reads it back unchanged
 */
export function quoteArgument(arg: string): string {
  if (arg === '') {
    return "''";
  }
  if (SAFE_ARGUMENT.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

export function joinCommand(argv: readonly string[]): string {
  return argv.map(quoteArgument).join(' ');
}
