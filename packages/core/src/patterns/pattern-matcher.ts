/**
 * Pattern Matcher
 *
 * Owns the rules of one or more rule documents and maps tool output to the
 * first matching rule. Rule problems are collected at construction and
 * reported by `validate()`; problem rules never match.
 */

import type { MatchOutcome, PatternRule, ResolvedHandler } from '@repo/shared-types';
import {
  engineConfigSchema,
  gitConfigSchema,
  type CustomHandlerConfig,
  type EngineConfig,
  type GitConfig,
  type LoadedRuleDocument,
} from '@repo/shared-config';
import { getLogger, type Logger } from '../utils/logger.js';
import { HandlerRegistry } from './handlers.js';
import { renderTemplate, templateFields } from './template.js';

export const MATCH_FLAGS = 'ims';

/** Filled in when the commit is made */
const COMMIT_FIELDS: readonly string[] = ['tool', 'timestamp'];

export interface PatternMatcherOptions {
  handlers?: HandlerRegistry;
  logger?: Logger;
  /** IDs already taken by other matchers; shared so IDs stay unique across them */
  ruleIds?: Set<string>;
}

interface CompiledRule {
  rule: PatternRule;
  regex: RegExp;
  handler: { name: string; config: CustomHandlerConfig } | null;
}

/**
 * Number of capturing groups in a regular expression
 */
function groupCount(regex: RegExp): number {
  const emptyMatch = new RegExp(`${regex.source}|`, regex.flags.replace(/[gy]/g, '')).exec('');
  return emptyMatch ? emptyMatch.length - 1 : 0;
}

export class PatternMatcher {
  readonly engineConfig: EngineConfig;
  readonly gitConfig: GitConfig;
  private readonly compiled: CompiledRule[] = [];
  private readonly errors: string[] = [];
  private readonly handlers: HandlerRegistry;
  private readonly logger: Logger;

  /**
   * Engine and git configuration come from the first document; defaults apply
   * when there is none.
   */
  constructor(
    readonly documents: readonly LoadedRuleDocument[],
    options: PatternMatcherOptions = {}
  ) {
    this.handlers = options.handlers ?? new HandlerRegistry();
    this.logger = options.logger ?? getLogger('patterns');
    this.engineConfig = documents[0]?.engine ?? engineConfigSchema.parse({});
    this.gitConfig = documents[0]?.git ?? gitConfigSchema.parse({});

    const seen = options.ruleIds ?? new Set<string>();
    for (const document of documents) {
      this.errors.push(...document.errors);
      for (const group of document.groups) {
        for (const rule of group.rules) {
          if (seen.has(rule.id)) {
            this.errors.push(`Duplicate pattern ID: ${rule.id}`);
            continue;
          }
          seen.add(rule.id);

          const compiled = this.compile(rule, document);
          if (compiled) {
            this.compiled.push(compiled);
          }
        }
      }
    }

    if (this.errors.length > 0) {
      this.logger.warn('Rule problems found; affected rules are disabled', { count: this.errors.length });
    }
    this.logger.debug('Rules loaded', { rules: this.compiled.length, documents: documents.length });
  }

  /**
   * Usable rules in match order
   */
  get rules(): PatternRule[] {
    return this.compiled.map((entry) => entry.rule);
  }

  get ruleCount(): number {
    return this.compiled.length;
  }

  /**
   * Problems found in the loaded documents. Never throws.
   */
  validate(): string[] {
    return [...this.errors];
  }

  /**
   * First rule, in load order, whose pattern matches the text
   */
  match(text: string): MatchOutcome | null {
    return this.matchWhere(text, () => true);
  }

  /**
   * First matching rule for one tool
   */
  matchTool(text: string, tool: string): MatchOutcome | null {
    return this.matchWhere(text, (rule) => rule.tool === tool);
  }

  rulesForTool(tool: string): PatternRule[] {
    return this.rules.filter((rule) => rule.tool === tool);
  }

  /**
   * Distinct tools, in the order they first appear
   */
  tools(): string[] {
    return [...new Set(this.rules.map((rule) => rule.tool))];
  }

  private matchWhere(text: string, accept: (rule: PatternRule) => boolean): MatchOutcome | null {
    for (const entry of this.compiled) {
      if (!accept(entry.rule)) continue;

      const found = entry.regex.exec(text);
      if (!found) continue;

      const outcome = this.toOutcome(entry, found, text);
      this.logger.debug('Pattern matched', { ruleId: outcome.ruleId, captures: outcome.captures });
      return outcome;
    }
    return null;
  }

  private toOutcome(entry: CompiledRule, found: RegExpExecArray, text: string): MatchOutcome {
    const { rule } = entry;
    const groups = Array.from(found, (value) => value ?? '');
    const captures: Record<string, string> = {};
    for (const spec of rule.captureGroups) {
      captures[spec.name] = groups[spec.index] ?? '';
    }

    let handler: ResolvedHandler | null = null;
    if (entry.handler) {
      const strategy = this.handlers.get(entry.handler.config.action);
      if (strategy) {
        handler = {
          name: entry.handler.name,
          action: strategy.action,
          message: strategy.render({ rule, captures, config: entry.handler.config }),
        };
      }
    }

    return {
      ruleId: rule.id,
      tool: rule.tool,
      category: rule.category,
      severity: rule.severity,
      fixCommand: rule.fixCommand === null ? null : renderTemplate(rule.fixCommand, captures),
      captures,
      groups,
      input: text,
      rule,
      handler,
    };
  }

  private compile(rule: PatternRule, document: LoadedRuleDocument): CompiledRule | null {
    let regex: RegExp;
    try {
      regex = new RegExp(rule.pattern, MATCH_FLAGS);
    } catch (error) {
      this.errors.push(
        `Invalid regex in pattern ${rule.id}: ${error instanceof Error ? error.message : String(error)}`
      );
      return null;
    }

    const problems: string[] = [];
    const available = groupCount(regex);
    for (const spec of rule.captureGroups) {
      if (spec.index > available) {
        problems.push(
          `Pattern ${rule.id} capture group ${spec.name} uses index ${spec.index} but the regex has ${available} group(s)`
        );
      }
    }

    const captureNames = rule.captureGroups.map((spec) => spec.name);
    if (rule.fixCommand !== null) {
      for (const field of templateFields(rule.fixCommand)) {
        if (!captureNames.includes(field)) {
          problems.push(`Pattern ${rule.id} fix_command references unknown field: ${field}`);
        }
      }
    }

    for (const field of templateFields(rule.commitMessageTemplate)) {
      if (!captureNames.includes(field) && !COMMIT_FIELDS.includes(field)) {
        problems.push(`Pattern ${rule.id} commit_message_template references unknown field: ${field}`);
      }
    }

    let handler: CompiledRule['handler'] = null;
    if (rule.customHandler !== null) {
      const config = document.handlers[rule.customHandler];
      const strategy = config ? this.handlers.get(config.action) : undefined;
      if (!config) {
        problems.push(`Pattern ${rule.id} references unknown handler: ${rule.customHandler}`);
      } else if (!strategy) {
        problems.push(`Handler ${rule.customHandler} uses unregistered action: ${config.action}`);
      } else {
        const known = [...captureNames, ...strategy.providedFields];
        for (const field of templateFields(config.message_template)) {
          if (!known.includes(field)) {
            problems.push(`Handler ${rule.customHandler} message references unknown field: ${field}`);
          }
        }
        handler = { name: rule.customHandler, config };
      }
    }

    if (problems.length > 0) {
      this.errors.push(...problems);
      return null;
    }

    return { rule, regex, handler };
  }
}
