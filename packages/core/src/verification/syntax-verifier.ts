/**
 * Syntax Verifier
 *
 * Picks a checker by file extension and checks files relative to a project
 * directory. Files without a checker, outside the allowed extensions or
 * under an excluded path are reported valid.
 */

import { readFile, stat } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import type { SyntaxCheckOutcome } from '@repo/shared-types';
import { DEFAULT_EXCLUDE_PATHS, DEFAULT_SOURCE_EXTENSIONS } from '@repo/shared-config';
import type { CommandExecutor } from '../executor/command-executor.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { babelChecker, createPythonChecker, jsonChecker, yamlChecker, type SyntaxChecker } from './syntax-checkers.js';

export interface SyntaxVerifierOptions {
  projectDir: string;
  executor: CommandExecutor;
  allowedExtensions?: readonly string[];
  excludePaths?: readonly string[];
  /** Larger files are not parsed */
  maxFileSizeMb?: number;
  pythonInterpreter?: string;
  /** Replaces the built-in checkers */
  checkers?: readonly SyntaxChecker[];
  logger?: Logger;
}

export class SyntaxVerifier {
  readonly projectDir: string;
  private readonly checkers = new Map<string, SyntaxChecker>();
  private readonly allowedExtensions: ReadonlySet<string>;
  private readonly excludePaths: readonly string[];
  private readonly maxFileBytes: number;
  private readonly logger: Logger;

  constructor(options: SyntaxVerifierOptions) {
    this.projectDir = resolve(options.projectDir);
    this.allowedExtensions = new Set(options.allowedExtensions ?? DEFAULT_SOURCE_EXTENSIONS);
    this.excludePaths = options.excludePaths ?? DEFAULT_EXCLUDE_PATHS;
    this.maxFileBytes = (options.maxFileSizeMb ?? 50) * 1024 * 1024;
    this.logger = options.logger ?? getLogger('verifier');

    const checkers = options.checkers ?? [
      babelChecker,
      jsonChecker,
      yamlChecker,
      createPythonChecker(options.executor, options.pythonInterpreter),
    ];
    for (const checker of checkers) {
      for (const ext of checker.extensions) {
        this.checkers.set(ext, checker);
      }
    }
  }

  isExcluded(filePath: string): boolean {
    const normalized = filePath.replace(/\\/g, '/');
    return this.excludePaths.some(
      (excluded) => normalized.startsWith(excluded) || normalized.includes(`/${excluded}`)
    );
  }

  /**
   * Checker that applies to a path, if any
   */
  checkerFor(filePath: string): SyntaxChecker | undefined {
    if (this.isExcluded(filePath)) return undefined;
    const ext = extname(filePath).toLowerCase();
    if (!this.allowedExtensions.has(ext)) return undefined;
    return this.checkers.get(ext);
  }

  async verifyFile(filePath: string): Promise<SyntaxCheckOutcome> {
    const checker = this.checkerFor(filePath);
    if (!checker) {
      return { filePath, valid: true };
    }

    const absolutePath = resolve(this.projectDir, filePath);
    let content: string;
    try {
      const info = await stat(absolutePath);
      if (info.size > this.maxFileBytes) {
        this.logger.warn('File too large to verify, skipping', { filePath, size: info.size });
        return { filePath, valid: true };
      }
      content = await readFile(absolutePath, 'utf-8');
    } catch (error) {
      return {
        filePath,
        valid: false,
        error: `Cannot read file: ${error instanceof Error ? error.message : String(error)}`,
      };
    }

    const outcome = await checker.check(filePath, absolutePath, content);
    if (!outcome.valid) {
      this.logger.warn('Syntax check failed', { filePath, checker: checker.name, error: outcome.error, line: outcome.line });
    }
    return outcome;
  }

  /**
   * Check files one after another, in order
   */
  async verifyFiles(filePaths: readonly string[]): Promise<SyntaxCheckOutcome[]> {
    const outcomes: SyntaxCheckOutcome[] = [];
    for (const filePath of filePaths) {
      outcomes.push(await this.verifyFile(filePath));
    }
    return outcomes;
  }
}
