/**
 * Syntax checkers per file type
 *
 * JavaScript and TypeScript go through @babel/parser, JSON through JSON.parse,
 * YAML through js-yaml, Python through the interpreter's own compiler.
 */

import { extname } from 'node:path';
import { parse, type ParserPlugin } from '@babel/parser';
import * as yaml from 'js-yaml';
import type { SyntaxCheckOutcome } from '@repo/shared-types';
import type { CommandExecutor } from '../executor/command-executor.js';
import { isAutoHealError } from '../utils/errors.js';

export interface SyntaxChecker {
  readonly name: string;
  readonly extensions: readonly string[];
  /** `content` is the file read as UTF-8 */
  check(filePath: string, absolutePath: string, content: string): Promise<SyntaxCheckOutcome>;
}

function invalid(filePath: string, error: string, line?: number, column?: number): SyntaxCheckOutcome {
  const outcome: SyntaxCheckOutcome = { filePath, valid: false, error };
  if (line !== undefined) outcome.line = line;
  if (column !== undefined) outcome.column = column;
  return outcome;
}

// ============================================================================
// JavaScript / TypeScript
// ============================================================================

function babelPlugins(ext: string): ParserPlugin[] {
  switch (ext) {
    case '.ts':
    case '.mts':
    case '.cts':
      return ['typescript', 'decorators-legacy'];
    case '.tsx':
      return ['typescript', 'jsx', 'decorators-legacy'];
    default:
      return ['jsx'];
  }
}

export const babelChecker: SyntaxChecker = {
  name: 'babel',
  extensions: ['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx', '.mts', '.cts'],
  async check(filePath, _absolutePath, content) {
    const ext = extname(filePath).toLowerCase();
    try {
      parse(content, {
        sourceType: ext === '.mjs' || ext === '.mts' ? 'module' : 'unambiguous',
        allowReturnOutsideFunction: ext === '.cjs' || ext === '.cts',
        plugins: babelPlugins(ext),
        errorRecovery: false,
      });
      return { filePath, valid: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      // babel appends "(line:column)" with a 0-based column
      const position = message.match(/\((\d+):(\d+)\)$/);
      if (position?.[1] !== undefined && position[2] !== undefined) {
        return invalid(filePath, message, Number(position[1]), Number(position[2]) + 1);
      }
      return invalid(filePath, message);
    }
  },
};

// ============================================================================
// JSON
// ============================================================================

function lineAndColumn(content: string, offset: number): { line: number; column: number } {
  const before = content.slice(0, offset);
  const lines = before.split('\n');
  return { line: lines.length, column: (lines[lines.length - 1]?.length ?? 0) + 1 };
}

export const jsonChecker: SyntaxChecker = {
  name: 'json',
  extensions: ['.json'],
  async check(filePath, _absolutePath, content) {
    try {
      JSON.parse(content);
      return { filePath, valid: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const explicit = message.match(/line (\d+) column (\d+)/);
      if (explicit?.[1] !== undefined && explicit[2] !== undefined) {
        return invalid(filePath, message, Number(explicit[1]), Number(explicit[2]));
      }
      const offset = message.match(/position (\d+)/);
      if (offset?.[1] !== undefined) {
        const { line, column } = lineAndColumn(content, Number(offset[1]));
        return invalid(filePath, message, line, column);
      }
      return invalid(filePath, message);
    }
  },
};

// ============================================================================
// YAML
// ============================================================================

export const yamlChecker: SyntaxChecker = {
  name: 'yaml',
  extensions: ['.yml', '.yaml'],
  async check(filePath, _absolutePath, content) {
    try {
      yaml.loadAll(content);
      return { filePath, valid: true };
    } catch (error) {
      if (error instanceof yaml.YAMLException) {
        return invalid(filePath, error.reason || error.message, error.mark.line + 1, error.mark.column + 1);
      }
      return invalid(filePath, error instanceof Error ? error.message : String(error));
    }
  },
};

// ============================================================================
// Python
// ============================================================================

const PYTHON_COMPILE_SCRIPT =
  "import sys; compile(open(sys.argv[1], encoding='utf-8').read(), sys.argv[1], 'exec', dont_inherit=True)";

/**
 * Python files are compiled by the interpreter, spawned through the executor.
 * An interpreter that cannot be started makes the file invalid: a fix is
 * never committed unverified.
 */
export function createPythonChecker(executor: CommandExecutor, interpreter = 'python3'): SyntaxChecker {
  return {
    name: 'python',
    extensions: ['.py', '.pyi'],
    async check(filePath, absolutePath) {
      try {
        const result = await executor.run([interpreter, '-c', PYTHON_COMPILE_SCRIPT, absolutePath], {
          timeoutMs: 60_000,
        });
        if (result.exitCode === 0) {
          return { filePath, valid: true };
        }

        const lines = result.stderr.trim().split('\n');
        const summary = lines[lines.length - 1]?.trim() || `exit code ${result.exitCode}`;
        // the last "line N" belongs to the compiled file, not the -c wrapper
        const lineNumber = [...result.stderr.matchAll(/line (\d+)/g)].pop()?.[1];
        return invalid(filePath, summary, lineNumber === undefined ? undefined : Number(lineNumber));
      } catch (error) {
        if (isAutoHealError(error)) {
          return invalid(filePath, `Python syntax check unavailable: ${error.message}`);
        }
        throw error;
      }
    },
  };
}
