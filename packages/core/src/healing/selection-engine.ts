/**
 * Selection Engine
 *
 * Picks at most one fix for a failure log: formatting rules are tried
 * first, then dependency rules.
 */

import type { DependencyWorkflow } from '../workflows/dependency-workflow.js';
import type { FormattingWorkflow } from '../workflows/formatting-workflow.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { dependencyFix, describeFix, formattingFix, noopFix, type FixDescriptor } from './fix-descriptor.js';

export interface SelectionEngineOptions {
  formatting: FormattingWorkflow;
  dependency: DependencyWorkflow;
  logger?: Logger;
}

export class SelectionEngine {
  readonly formatting: FormattingWorkflow;
  readonly dependency: DependencyWorkflow;
  private readonly logger: Logger;

  constructor(options: SelectionEngineOptions) {
    this.formatting = options.formatting;
    this.dependency = options.dependency;
    this.logger = options.logger ?? getLogger('selection');
  }

  analyze(failureText: string): FixDescriptor {
    const descriptor = this.select(failureText);
    this.logger.info('Fix selected', { fix: describeFix(descriptor) });
    return descriptor;
  }

  private select(failureText: string): FixDescriptor {
    const formatting = this.formatting.match(failureText);
    if (formatting) {
      return formattingFix(this.formatting, formatting);
    }

    const dependency = this.dependency.match(failureText);
    if (dependency) {
      return dependencyFix(this.dependency, dependency);
    }

    return noopFix();
  }
}
