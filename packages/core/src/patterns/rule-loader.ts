/**
 * Built-in rule documents and matcher construction from files
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadRuleDocument, RuleDocumentError } from '@repo/shared-config';
import { ConfigError } from '../utils/errors.js';
import { PatternMatcher, type PatternMatcherOptions } from './pattern-matcher.js';

export const RULE_FILES = {
  formatting: 'formatting.yml',
  dependency: 'dependencies.yml',
} as const;

export type RuleKind = keyof typeof RULE_FILES;

const SOURCE_RULES_DIR = fileURLToPath(new URL('../../rules/', import.meta.url));
const BUNDLED_RULES_DIR = fileURLToPath(new URL('./rules/', import.meta.url));

/**
 * Directory holding the rule documents shipped with this package. A bundled
 * CLI carries them in `rules/` beside its entry point.
 */
export const DEFAULT_RULES_DIR = existsSync(SOURCE_RULES_DIR) ? SOURCE_RULES_DIR : BUNDLED_RULES_DIR;

export function rulesPath(kind: RuleKind, rulesDir: string = DEFAULT_RULES_DIR): string {
  return join(rulesDir, RULE_FILES[kind]);
}

/**
 * Load rule documents and build a matcher over them, in the given order.
 * Unreadable or structurally invalid documents raise ConfigError.
 */
export function loadMatcher(paths: readonly string[], options: PatternMatcherOptions = {}): PatternMatcher {
  const documents = paths.map((path) => {
    try {
      return loadRuleDocument(path);
    } catch (error) {
      if (error instanceof RuleDocumentError) {
        throw new ConfigError(error.message, {
          component: 'Patterns',
          configKey: error.source,
          recoveryHint: 'Fix the rule document or point --rules-dir at a valid one',
          cause: error,
        });
      }
      throw error;
    }
  });

  return new PatternMatcher(documents, options);
}

export type RuleSet = Record<RuleKind, PatternMatcher>;

/**
 * One matcher per built-in rule file. Rule IDs must be unique across the
 * whole set; a repeated ID is reported by the matcher that loads it second.
 */
export function loadRuleSet(rulesDir?: string, options: Omit<PatternMatcherOptions, 'ruleIds'> = {}): RuleSet {
  const ruleIds = new Set<string>();
  return {
    formatting: loadMatcher([rulesPath('formatting', rulesDir)], { ...options, ruleIds }),
    dependency: loadMatcher([rulesPath('dependency', rulesDir)], { ...options, ruleIds }),
  };
}
