/**
 * Healer
 *
 * Front door for a full run: pick a fix for the failure log, supervise it and
 * record the result in the status file.
 */

import { resolve } from 'node:path';
import type { HealStatus, WorkflowOutcome } from '@repo/shared-types';
import { loadRuleSet, type RuleSet } from '../patterns/rule-loader.js';
import { CliGitClient, type GitClient } from '../verification/git-client.js';
import { DependencyWorkflow } from '../workflows/dependency-workflow.js';
import { FormattingWorkflow } from '../workflows/formatting-workflow.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { FixApplier, type Restorer } from './fix-applier.js';
import { NO_FIX_REASON, type FixDescriptor } from './fix-descriptor.js';
import { SelectionEngine } from './selection-engine.js';
import { writeStatusFile } from './status-file.js';

export interface HealerOptions {
  projectDir: string;
  /** Directory holding formatting.yml and dependencies.yml */
  rulesDir?: string;
  formatting?: FormattingWorkflow;
  dependency?: DependencyWorkflow;
  git?: GitClient;
  restorer?: Restorer;
  createCommit?: boolean;
  timeoutMs?: number;
  dryRun?: boolean;
  failOnUnsuccessfulOutcome?: boolean;
  logger?: Logger;
}

export interface HealResult {
  status: HealStatus;
  descriptor: FixDescriptor | null;
  outcome: WorkflowOutcome | null;
  statusFile: string;
}

export class Healer {
  readonly projectDir: string;
  readonly engine: SelectionEngine;
  private readonly options: HealerOptions;
  private readonly logger: Logger;

  /**
   * Loads the built-in (or `rulesDir`) rule documents for any workflow not
   * passed in. Throws ConfigError when a document cannot be loaded.
   */
  constructor(options: HealerOptions) {
    this.projectDir = resolve(options.projectDir);
    this.options = options;
    this.logger = options.logger ?? getLogger('healer');

    const git = options.git ?? new CliGitClient(this.projectDir);
    const shared = {
      projectDir: this.projectDir,
      git,
      createCommit: options.createCommit,
      timeoutMs: options.timeoutMs,
    };

    let rules: RuleSet | null = null;
    const ruleSet = (): RuleSet => {
      rules = rules ?? loadRuleSet(options.rulesDir, { logger: this.logger.child('patterns') });
      return rules;
    };

    const formatting =
      options.formatting ??
      new FormattingWorkflow({
        ...shared,
        matcher: ruleSet().formatting,
        logger: this.logger.child('formatting'),
      });
    const dependency =
      options.dependency ??
      new DependencyWorkflow({
        ...shared,
        matcher: ruleSet().dependency,
        logger: this.logger.child('dependency'),
      });

    this.engine = new SelectionEngine({ formatting, dependency, logger: this.logger.child('selection') });
  }

  analyze(failureText: string): FixDescriptor {
    return this.engine.analyze(failureText);
  }

  /**
   * Run the pipeline once. The status file is written on every path; only a
   * failure to write it rejects.
   */
  async heal(failureText: string): Promise<HealResult> {
    let result: Omit<HealResult, 'statusFile'>;

    try {
      const descriptor = this.analyze(failureText);
      if (descriptor.kind === 'noop') {
        result = { status: { healed: false, rollback: false, error: NO_FIX_REASON }, descriptor, outcome: null };
      } else {
        const applier = new FixApplier({
          projectDir: this.projectDir,
          restorer: this.options.restorer,
          dryRun: this.options.dryRun,
          failOnUnsuccessfulOutcome: this.options.failOnUnsuccessfulOutcome,
          logger: this.logger.child('supervisor'),
        });
        const run = await applier.run(descriptor);
        result = { ...run, descriptor };
      }
    } catch (error) {
      this.logger.error('Healing run failed', error instanceof Error ? error : undefined);
      result = {
        status: { healed: false, rollback: false, error: `Engine error: ${error instanceof Error ? error.message : String(error)}` },
        descriptor: null,
        outcome: null,
      };
    }

    const statusFile = await writeStatusFile(this.projectDir, result.status);
    this.logger.info('Healing run finished', { ...result.status, statusFile });
    return { ...result, statusFile };
  }
}
