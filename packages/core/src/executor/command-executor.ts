/**
 * Sandboxed Command Executor
 *
 * Runs one tool invocation per call: argv passed directly (no shell), its own
 * process group, a wall-clock timeout and a byte ceiling per output stream.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { statSync } from 'node:fs';
import { homedir } from 'node:os';
import { basename, join, resolve } from 'node:path';
import {
  STDERR_TRUNCATION_MARKER,
  STDOUT_TRUNCATION_MARKER,
  type ExecutionResult,
  type ToolInfo,
} from '@repo/shared-types';
import { ExecutionError, TimeoutError, ValidationError, isAutoHealError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { joinCommand, tokenizeCommand } from './command-line.js';
import { CommandPolicy, DEFAULT_ALLOWED_TOOLS } from './command-policy.js';
import { toDryRunArgv } from './dry-run.js';
import { BoundedOutput } from './output-buffer.js';

// ============================================================================
// Types
// ============================================================================

export interface CommandExecutorOptions {
  /** Default wall-clock limit per command (default: 300000) */
  timeoutMs?: number;
  /** Per-stream output ceiling in bytes (default: 10 MiB) */
  maxOutputBytes?: number;
  /** Wait between SIGTERM and SIGKILL on timeout (default: 1000) */
  killGraceMs?: number;
  allowedTools?: Iterable<string>;
  /** Default working directory (default: process.cwd()) */
  workingDirectory?: string;
  logger?: Logger;
}

export interface ExecuteOptions {
  timeoutMs?: number;
  workingDirectory?: string;
  env?: Record<string, string>;
  /** Apply the dangerous-pattern check and the allow-list (default: true) */
  enforceAllowlist?: boolean;
}

export const DEFAULT_TIMEOUT_MS = 300_000;
export const DEFAULT_MAX_OUTPUT_BYTES = 10 * 1024 * 1024;
export const DEFAULT_KILL_GRACE_MS = 1000;

/**
 * Environment hints per tool. They keep runs quiet and non-interactive.
 */
function toolEnvironment(tool: string): Record<string, string> {
  switch (tool) {
    case 'black':
      return { BLACK_EXPERIMENTAL_STRING_PROCESSING: '1' };
    case 'ruff':
      return { RUFF_CACHE_DIR: join(homedir(), '.cache', 'ruff') };
    case 'isort':
      return { ISORT_QUIET: '1' };
    case 'prettier':
    case 'eslint':
      return { CI: 'true', FORCE_COLOR: '0' };
    case 'npm':
      return { npm_config_fund: 'false', npm_config_audit: 'false', npm_config_yes: 'true' };
    default:
      return {};
  }
}

const sleep = (ms: number) => new Promise<void>((resolveSleep) => setTimeout(resolveSleep, ms));

/**
 * Send a signal to a whole process group. Returns false when the group is gone.
 */
function signalGroup(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(process.platform === 'win32' ? pid : -pid, signal);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ESRCH') {
      return false;
    }
    throw error;
  }
}

// ============================================================================
// Executor
// ============================================================================

export class CommandExecutor {
  readonly policy: CommandPolicy;
  readonly workingDirectory: string;
  private readonly timeoutMs: number;
  private readonly maxOutputBytes: number;
  private readonly killGraceMs: number;
  private readonly logger: Logger;

  constructor(options: CommandExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.policy = new CommandPolicy(options.allowedTools ?? DEFAULT_ALLOWED_TOOLS);
    this.workingDirectory = resolve(options.workingDirectory ?? process.cwd());
    this.logger = options.logger ?? getLogger('executor');
  }

  /**
   * Execute a command string. A non-zero exit is a normal result; rejects with
   * ValidationError, ExecutionError or TimeoutError.
   */
  async execute(command: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const argv = options.enforceAllowlist === false ? tokenizeCommand(command) : this.policy.check(command);
    return this.spawnArgv(argv, command, options);
  }

  /**
   * Execute an argv without the command policy. For internal helpers such as
   * interpreter-based syntax checks; never for rule-supplied commands.
   */
  async run(argv: readonly string[], options: Omit<ExecuteOptions, 'enforceAllowlist'> = {}): Promise<ExecutionResult> {
    return this.spawnArgv(argv, joinCommand(argv), options);
  }

  /**
   * Execute a fix command with the tool's environment hints
   */
  async executeForTool(tool: string, command: string, options: Omit<ExecuteOptions, 'enforceAllowlist'> = {}): Promise<ExecutionResult> {
    return this.execute(command, {
      ...options,
      env: { ...toolEnvironment(tool), ...options.env },
      enforceAllowlist: true,
    });
  }

  /**
   * Execute the reporting-only variant of a command. Throws ValidationError,
   * without running anything, for tools that have no such variant.
   */
  async dryRun(command: string, options: Omit<ExecuteOptions, 'enforceAllowlist'> = {}): Promise<ExecutionResult> {
    const argv = this.policy.check(command);
    const dryRunArgv = toDryRunArgv(argv);
    if (dryRunArgv === null) {
      throw new ValidationError(`No dry-run mode for ${basename(argv[0] ?? command)}`, {
        component: 'Executor',
        operation: 'dryRun',
        field: 'command',
        value: command,
      });
    }
    const rewritten = joinCommand(dryRunArgv);
    this.logger.debug('Dry run', { command, rewritten });
    return this.execute(rewritten, { ...options, enforceAllowlist: true });
  }

  /**
   * Report whether an allowed tool is installed, with its version
   */
  async toolInfo(tool: string): Promise<ToolInfo> {
    if (!this.policy.isAllowed(tool)) {
      return { tool, available: false, error: `Command not in allowlist: ${tool}` };
    }

    try {
      const result = await this.execute(`${tool} --version`, { timeoutMs: Math.min(this.timeoutMs, 30_000) });
      if (result.exitCode !== 0) {
        return { tool, available: false, error: result.stderr.trim() || `exit code ${result.exitCode}` };
      }
      const version = result.stdout
        .split('\n')
        .map((line) => line.trim())
        .find((line) => line.length > 0);
      return version === undefined ? { tool, available: true } : { tool, available: true, version };
    } catch (error) {
      if (isAutoHealError(error)) {
        return { tool, available: false, error: error.message };
      }
      throw error;
    }
  }

  private assertDirectory(directory: string, command: string): void {
    let isDirectory = false;
    try {
      isDirectory = statSync(directory).isDirectory();
    } catch (error) {
      throw new ExecutionError(`Working directory does not exist: ${directory}`, {
        component: 'Executor',
        operation: 'execute',
        command,
        cause: error instanceof Error ? error : undefined,
      });
    }
    if (!isDirectory) {
      throw new ExecutionError(`Working directory is not a directory: ${directory}`, {
        component: 'Executor',
        operation: 'execute',
        command,
      });
    }
  }

  private spawnArgv(argv: readonly string[], command: string, options: ExecuteOptions): Promise<ExecutionResult> {
    const [file, ...args] = argv;
    if (file === undefined) {
      return Promise.reject(
        new ExecutionError('Empty command', { component: 'Executor', operation: 'execute', command })
      );
    }

    const cwd = resolve(this.workingDirectory, options.workingDirectory ?? '.');
    try {
      this.assertDirectory(cwd, command);
    } catch (error) {
      return Promise.reject(error);
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    this.logger.debug('Executing command', { command, cwd, timeoutMs });

    return new Promise<ExecutionResult>((resolveRun, rejectRun) => {
      const start = performance.now();
      const stdout = new BoundedOutput(this.maxOutputBytes, STDOUT_TRUNCATION_MARKER);
      const stderr = new BoundedOutput(this.maxOutputBytes, STDERR_TRUNCATION_MARKER);
      let settled = false;
      let timedOut = false;
      let termination: Promise<void> = Promise.resolve();
      let markClosed: () => void = () => undefined;
      const closed = new Promise<void>((resolveClosed) => {
        markClosed = resolveClosed;
      });

      let child: ChildProcess;
      try {
        child = spawn(file, args, {
          cwd,
          env: { ...process.env, ...options.env },
          stdio: ['ignore', 'pipe', 'pipe'],
          detached: process.platform !== 'win32',
        });
      } catch (error) {
        rejectRun(this.startFailure(error, command));
        return;
      }

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      const timer = setTimeout(() => {
        timedOut = true;
        termination = this.terminate(child, closed, command);
      }, timeoutMs);

      child.on('error', (error) => {
        clearTimeout(timer);
        markClosed();
        if (settled) return;
        settled = true;
        rejectRun(this.startFailure(error, command));
      });

      child.on('close', (code) => {
        clearTimeout(timer);
        markClosed();
        if (settled) return;
        settled = true;

        const result: ExecutionResult = {
          command,
          exitCode: code ?? -1,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          stdoutTruncated: stdout.isTruncated,
          stderrTruncated: stderr.isTruncated,
          durationMs: Math.round(performance.now() - start),
          timedOut,
          workingDirectory: cwd,
        };

        if (!timedOut) {
          this.logger.debug('Command finished', { command, exitCode: result.exitCode, durationMs: result.durationMs });
          resolveRun(result);
          return;
        }

        void termination.then(() => {
          this.logger.warn('Command timed out', { command, timeoutMs });
          rejectRun(
            new TimeoutError(`Command timed out after ${timeoutMs / 1000} seconds: ${command}`, {
              component: 'Executor',
              operation: 'execute',
              timeoutMs,
              elapsed: result.durationMs,
              result,
            })
          );
        });
      });
    });
  }

  /**
   * SIGTERM the process group, wait for exit up to the grace interval, then
   * SIGKILL whatever is left of the group
   */
  private async terminate(child: ChildProcess, closed: Promise<void>, command: string): Promise<void> {
    const pid = child.pid;
    if (pid === undefined) {
      return;
    }

    this.logger.debug('Terminating process group', { pid, command });
    try {
      if (!signalGroup(pid, 'SIGTERM')) {
        return;
      }

      await Promise.race([closed, sleep(this.killGraceMs)]);

      if (signalGroup(pid, 'SIGKILL')) {
        this.logger.debug('Process group killed', { pid });
      }
    } catch (error) {
      this.logger.error('Failed to terminate process group', error instanceof Error ? error : undefined, { pid, command });
    }
  }

  private startFailure(error: unknown, command: string): ExecutionError {
    const cause = error instanceof Error ? error : undefined;
    const code = cause && 'code' in cause ? cause.code : undefined;

    if (code === 'ENOENT') {
      return new ExecutionError(`Command not found: ${command}`, {
        component: 'Executor',
        operation: 'execute',
        command,
        cause,
      });
    }
    if (code === 'EACCES' || code === 'EPERM') {
      return new ExecutionError(`Permission denied executing command: ${command}`, {
        component: 'Executor',
        operation: 'execute',
        command,
        cause,
      });
    }
    return new ExecutionError(`Unexpected error executing command: ${cause?.message ?? String(error)}`, {
      component: 'Executor',
      operation: 'execute',
      command,
      cause,
    });
  }
}
