/**
 * Custom Handlers
 *
 * Rules without a fix command name a handler declared in their document's
 * `custom_handlers` table. Each declared handler selects a registered
 * strategy by its `action`.
 */

import type { HandlerAction, PatternRule } from '@repo/shared-types';
import type { CustomHandlerConfig } from '@repo/shared-config';
import { renderTemplate } from './template.js';

export interface HandlerContext {
  rule: PatternRule;
  captures: Readonly<Record<string, string>>;
  config: CustomHandlerConfig;
}

export interface HandlerStrategy {
  readonly action: HandlerAction;
  /** Fields the strategy adds on top of the captures */
  readonly providedFields: readonly string[];
  /** Render the handler message for one match */
  render(context: HandlerContext): string;
}

/**
 * Advisory message, e.g. which package to add for a missing module.
 * Derives `package_name` from `module_name`: the top-level module, mapped
 * through `package_aliases` when listed there.
 */
export const suggestStrategy: HandlerStrategy = {
  action: 'suggest',
  providedFields: ['package_name'],
  render({ captures, config }) {
    const values: Record<string, string> = { ...captures };
    const moduleName = captures.module_name;
    if (moduleName !== undefined) {
      const topLevel = moduleName.split('.')[0] ?? moduleName;
      values.package_name = config.package_aliases[topLevel] ?? topLevel;
    }
    return renderTemplate(config.message_template, values);
  },
};

/**
 * Message for a problem that needs a human
 */
export const notifyStrategy: HandlerStrategy = {
  action: 'notify',
  providedFields: [],
  render({ captures, config }) {
    return renderTemplate(config.message_template, captures);
  },
};

export class HandlerRegistry {
  private readonly strategies = new Map<HandlerAction, HandlerStrategy>();

  constructor(strategies: readonly HandlerStrategy[] = [suggestStrategy, notifyStrategy]) {
    for (const strategy of strategies) {
      this.register(strategy);
    }
  }

  register(strategy: HandlerStrategy): void {
    this.strategies.set(strategy.action, strategy);
  }

  get(action: HandlerAction): HandlerStrategy | undefined {
    return this.strategies.get(action);
  }

  has(action: HandlerAction): boolean {
    return this.strategies.has(action);
  }
}
