/**
 * Fix Workflow
 *
 * Drives one match through execute → verify → commit. Subclasses decide how a
 * command result is judged and how outcomes are worded; the base class owns
 * the state machine, the error boundary and the restore-on-failure rule.
 *
 * States: idle → matched → executed → committed → done, or failed.
 */

import { existsSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import type {
  CommitOutcome,
  ExecutionResult,
  GitStatusSummary,
  MatchOutcome,
  WorkflowErrorKind,
  WorkflowOutcome,
} from '@repo/shared-types';
import type { EngineConfig, GitConfig } from '@repo/shared-config';
import { CommandExecutor } from '../executor/command-executor.js';
import type { PatternMatcher } from '../patterns/pattern-matcher.js';
import { renderTemplate } from '../patterns/template.js';
import { AtomicCommitter } from '../verification/atomic-committer.js';
import { CliGitClient, type GitClient } from '../verification/git-client.js';
import { SyntaxVerifier } from '../verification/syntax-verifier.js';
import { ValidationError, errorKindOf } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export type WorkflowKind = 'formatting' | 'dependency';

export type WorkflowState = 'idle' | 'matched' | 'executed' | 'committed' | 'done' | 'failed';

export interface FixWorkflowOptions {
  projectDir: string;
  matcher: PatternMatcher;
  /** Built from the matcher's engine config when omitted */
  executor?: CommandExecutor;
  /** Built on the git CLI when omitted */
  committer?: AtomicCommitter;
  /** Used for the default committer and for status() */
  git?: GitClient;
  /** Overrides git_config.create_commit */
  createCommit?: boolean;
  /** Overrides engine_config.timeout_seconds */
  timeoutMs?: number;
  logger?: Logger;
}

export interface ProcessOptions {
  dryRun?: boolean;
}

export interface ValidateConfigurationOptions {
  /** Ask every fix tool for its version (default: false) */
  checkTools?: boolean;
}

export interface WorkflowStatus {
  kind: WorkflowKind;
  workingDirectory: string;
  isGitRepository: boolean;
  availablePatterns: number;
  supportedTools: string[];
  gitStatus: GitStatusSummary | null;
  engineConfig: EngineConfig;
  gitConfig: GitConfig;
}

/**
 * What a successful run produced, handed to the subclass for wording
 */
export interface AppliedFix {
  match: MatchOutcome;
  command: string;
  result: ExecutionResult;
  commit: CommitOutcome | null;
  files: string[];
}

// ============================================================================
// Base Workflow
// ============================================================================

export abstract class FixWorkflow {
  abstract readonly kind: WorkflowKind;

  readonly projectDir: string;
  readonly matcher: PatternMatcher;
  readonly executor: CommandExecutor;
  readonly committer: AtomicCommitter;
  protected readonly logger: Logger;
  private readonly git: GitClient;
  private readonly createCommit: boolean;
  private current: WorkflowState = 'idle';

  constructor(options: FixWorkflowOptions) {
    this.projectDir = resolve(options.projectDir);
    this.matcher = options.matcher;
    this.logger = options.logger ?? getLogger('workflow');

    const engine = this.matcher.engineConfig;
    const gitConfig = this.matcher.gitConfig;
    this.createCommit = options.createCommit ?? gitConfig.createCommit;

    this.executor =
      options.executor ??
      new CommandExecutor({
        timeoutMs: options.timeoutMs ?? engine.timeoutSeconds * 1000,
        maxOutputBytes: engine.maxOutputBytes,
        killGraceMs: engine.killGraceMs,
        workingDirectory: this.projectDir,
        logger: this.logger.child('executor'),
      });

    this.git = options.git ?? new CliGitClient(this.projectDir);
    this.committer =
      options.committer ??
      new AtomicCommitter({
        git: this.git,
        verifier: new SyntaxVerifier({
          projectDir: this.projectDir,
          executor: this.executor,
          allowedExtensions: engine.allowedFileExtensions,
          excludePaths: engine.excludePaths,
          maxFileSizeMb: engine.maxFileSizeMb,
          logger: this.logger.child('verifier'),
        }),
        commitPrefix: gitConfig.commitPrefix,
        logger: this.logger.child('committer'),
      });
  }

  get state(): WorkflowState {
    return this.current;
  }

  /** Message for input that matches no rule */
  protected abstract readonly noMatchMessage: string;

  /**
   * Judge a finished fix command. Throw to fail the run; the tree is restored.
   */
  protected abstract checkExecution(match: MatchOutcome, result: ExecutionResult): Promise<void>;

  protected abstract describeSuccess(fix: AppliedFix): string;

  /**
   * Outcome for a commit step that found nothing to commit
   */
  protected abstract describeEmptyCommit(fix: AppliedFix): { success: boolean; message: string };

  protected abstract describeFailure(error: unknown, kind: WorkflowErrorKind, match: MatchOutcome): string;

  match(output: string): MatchOutcome | null {
    return this.matcher.match(output);
  }

  /**
   * Match tool output and apply the fix for the first matching rule
   */
  async process(output: string, options: ProcessOptions = {}): Promise<WorkflowOutcome> {
    const startTime = performance.now();
    this.transition('idle');

    const found = this.match(output);
    if (!found) {
      this.logger.info(this.noMatchMessage);
      this.transition('done');
      return { success: false, message: this.noMatchMessage, filesFixed: [], durationMs: performance.now() - startTime };
    }

    return this.apply(found, options);
  }

  /**
   * Process several outputs one after another
   */
  async processMany(outputs: readonly string[], options: ProcessOptions = {}): Promise<WorkflowOutcome[]> {
    const outcomes: WorkflowOutcome[] = [];
    for (const [index, output] of outputs.entries()) {
      this.logger.info('Processing output', { index: index + 1, total: outputs.length });
      outcomes.push(await this.process(output, options));
    }
    return outcomes;
  }

  /**
   * Apply the fix for an existing match
   */
  async apply(match: MatchOutcome, options: ProcessOptions = {}): Promise<WorkflowOutcome> {
    const startTime = performance.now();
    const base = { ruleId: match.ruleId, tool: match.tool };
    this.transition('matched', { ruleId: match.ruleId });

    if (match.handler) {
      const success = match.handler.action === 'suggest';
      this.logger.info('Custom handler resolved', { handler: match.handler.name, action: match.handler.action });
      this.transition(success ? 'done' : 'failed');
      return {
        ...base,
        success,
        message: match.handler.message,
        filesFixed: [],
        durationMs: performance.now() - startTime,
        ...(success ? {} : { error: match.handler.message }),
      };
    }

    let commandRan = false;
    try {
      const command = match.fixCommand;
      if (command === null) {
        throw new ValidationError(`Pattern ${match.ruleId} has no fix command`, {
          component: 'Workflow',
          operation: 'apply',
          field: 'fix_command',
        });
      }

      if (options.dryRun) {
        const result = await this.executor.dryRun(command);
        this.logger.info('Dry run finished', { command: result.command, exitCode: result.exitCode });
        this.transition('done');
        return {
          ...base,
          success: true,
          message: `Dry run completed for ${match.tool}`,
          command: result.command,
          filesFixed: [],
          durationMs: performance.now() - startTime,
        };
      }

      const result = await this.logger.timed(`${match.tool} fix command`, () => this.executor.executeForTool(match.tool, command), {
        ruleId: match.ruleId,
      });
      commandRan = true;
      this.transition('executed', { exitCode: result.exitCode, durationMs: Math.round(result.durationMs) });
      await this.checkExecution(match, result);

      let commit: CommitOutcome | null = null;
      let files: string[];
      if (this.createCommit && match.rule.requiresCommit) {
        const gitConfig = this.matcher.gitConfig;
        commit = await this.committer.atomicCommit(renderTemplate(match.rule.commitMessageTemplate, match.captures), match.tool, {
          author: gitConfig.commitAuthor,
          includeFileCount: gitConfig.includeFileCount,
          verifySyntax: this.matcher.engineConfig.verifySyntaxAfterFix,
        });
        files = commit.files;
      } else {
        files = await this.committer.changedFiles();
      }

      const fix: AppliedFix = { match, command, result, commit, files };
      if (commit && !commit.success) {
        const { success, message } = this.describeEmptyCommit(fix);
        this.transition(success ? 'done' : 'failed');
        return {
          ...base,
          success,
          message,
          command,
          filesFixed: [],
          commit,
          durationMs: performance.now() - startTime,
          ...(success ? {} : { error: commit.error ?? commit.message, errorKind: 'git' as const }),
        };
      }

      if (commit) {
        this.transition('committed', { commitHash: commit.commitHash });
      }
      this.transition('done');
      return {
        ...base,
        success: true,
        message: this.describeSuccess(fix),
        command,
        filesFixed: files,
        ...(commit ? { commit } : {}),
        durationMs: performance.now() - startTime,
      };
    } catch (error) {
      const kind = errorKindOf(error);
      const message = this.describeFailure(error, kind, match);
      this.logger.error(message, error instanceof Error ? error : undefined, { ruleId: match.ruleId, errorKind: kind });

      // A timed-out command may have written part of its changes
      const changesPending = (commandRan || kind === 'timeout') && !(await this.restoreQuietly());
      this.transition('failed');
      return {
        ...base,
        success: false,
        message,
        ...(match.fixCommand === null ? {} : { command: match.fixCommand }),
        filesFixed: [],
        durationMs: performance.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
        errorKind: kind,
        ...(changesPending ? { changesPending } : {}),
      };
    }
  }

  async status(): Promise<WorkflowStatus> {
    const isGitRepository = await this.git.isRepository();
    return {
      kind: this.kind,
      workingDirectory: this.projectDir,
      isGitRepository,
      availablePatterns: this.matcher.ruleCount,
      supportedTools: this.matcher.tools(),
      gitStatus: isGitRepository ? await this.committer.statusSummary() : null,
      engineConfig: this.matcher.engineConfig,
      gitConfig: this.matcher.gitConfig,
    };
  }

  /**
   * Problems that would stop this workflow from running. Empty when ready.
   */
  async validateConfiguration(options: ValidateConfigurationOptions = {}): Promise<string[]> {
    const errors = this.matcher.validate();

    if (!existsSync(this.projectDir) || !statSync(this.projectDir).isDirectory()) {
      errors.push(`Working directory does not exist: ${this.projectDir}`);
      return errors;
    }

    if (!(await this.git.isRepository())) {
      errors.push('Working directory is not a git repository');
    }

    if (options.checkTools) {
      const tools = [...new Set(this.matcher.rules.filter((rule) => rule.fixCommand !== null).map((rule) => rule.tool))];
      for (const tool of tools) {
        const info = await this.executor.toolInfo(tool);
        if (!info.available) {
          errors.push(`Tool '${tool}' is not available: ${info.error ?? 'Unknown error'}`);
        }
      }
    }

    return errors;
  }

  private async restoreQuietly(): Promise<boolean> {
    try {
      await this.committer.restoreAll();
      return true;
    } catch (error) {
      this.logger.error('Failed to restore working tree after workflow failure', error instanceof Error ? error : undefined);
      return false;
    }
  }

  private transition(next: WorkflowState, context?: Record<string, unknown>): void {
    if (next !== this.current) {
      this.logger.debug(`${this.kind} workflow: ${this.current} → ${next}`, context);
    }
    this.current = next;
  }
}
