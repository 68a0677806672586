/**
 * Configuration Loader
 *
 * Loads rule documents from YAML and runtime settings from the environment.
 */

import { readFileSync } from 'node:fs';
import * as yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import type { PatternRule } from '@repo/shared-types';
import {
  patternRuleSchema,
  ruleDocumentSchema,
  runtimeSettingsSchema,
  type CustomHandlerConfig,
  type EngineConfig,
  type GitConfig,
  type RawPatternRule,
  type RuntimeSettings,
} from './schema.js';

// ============================================================================
// Errors
// ============================================================================

/**
 * Raised when a rule document cannot be read or its overall shape is invalid.
 * Problems confined to a single rule are reported in `LoadedRuleDocument.errors`.
 */
export class RuleDocumentError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly issues: readonly string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RuleDocumentError';
  }
}

// ============================================================================
// Rule Documents
// ============================================================================

export interface RuleGroup {
  name: string;
  rules: PatternRule[];
}

export interface LoadedRuleDocument {
  source: string;
  version: string;
  description: string;
  groups: RuleGroup[];
  handlers: Record<string, CustomHandlerConfig>;
  engine: EngineConfig;
  git: GitConfig;
  /** Per-rule problems; the offending rules are not in `groups` */
  errors: string[];
}

function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.join('.');
    return `  • ${path || 'root'}: ${issue.message}`;
  });
}

function describeRuleIssue(ruleId: string, issue: ZodIssue): string {
  const field = issue.path.join('.') || 'root';

  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return `Pattern ${ruleId} missing field: ${field}`;
  }
  if (issue.code === 'invalid_enum_value' && field === 'severity') {
    return `Invalid severity in pattern ${ruleId}: ${String(issue.received)}`;
  }
  return `Pattern ${ruleId} invalid ${field}: ${issue.message}`;
}

function ruleIdOf(raw: unknown, position: string): string {
  if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string') {
    return raw.id;
  }
  return `<${position}>`;
}

function toPatternRule(raw: RawPatternRule, category: string): PatternRule {
  return {
    id: raw.id,
    name: raw.name,
    description: raw.description,
    category,
    tool: raw.tool,
    pattern: raw.pattern,
    fixCommand: raw.fix_command ?? null,
    severity: raw.severity,
    requiresCommit: raw.requires_git_commit,
    commitMessageTemplate: raw.commit_message_template,
    captureGroups: (raw.capture_groups ?? []).map((group) => ({ index: group.index, name: group.name })),
    customHandler: raw.custom_handler ?? null,
  };
}

/**
 * Validate an already-parsed document.
 *
 * The document shape must be valid or a RuleDocumentError is thrown. Rules
 * that fail validation, and rules whose id repeats an earlier one, are
 * reported and dropped.
 */
export function parseRuleDocument(raw: unknown, source: string): LoadedRuleDocument {
  const parsed = ruleDocumentSchema.safeParse(raw);

  if (!parsed.success) {
    const issues = formatIssues(parsed.error.errors);
    throw new RuleDocumentError(`Invalid rule document ${source}:\n${issues.join('\n')}`, source, issues);
  }

  const document = parsed.data;
  const errors: string[] = [];
  const seen = new Set<string>();
  const groups: RuleGroup[] = [];

  for (const [category, entries] of Object.entries(document.patterns)) {
    const rules: PatternRule[] = [];

    entries.forEach((entry, index) => {
      const ruleId = ruleIdOf(entry, `${category}[${index}]`);
      const result = patternRuleSchema.safeParse(entry);

      if (!result.success) {
        errors.push(...result.error.errors.map((issue) => describeRuleIssue(ruleId, issue)));
        return;
      }
      if (seen.has(result.data.id)) {
        errors.push(`Duplicate pattern ID: ${result.data.id}`);
        return;
      }

      seen.add(result.data.id);
      rules.push(toPatternRule(result.data, category));
    });

    groups.push({ name: category, rules });
  }

  return {
    source,
    version: document.version,
    description: document.description,
    groups,
    handlers: document.custom_handlers,
    engine: document.engine_config,
    git: document.git_config,
    errors,
  };
}

/**
 * Read and validate a YAML rule document from disk
 */
export function loadRuleDocument(filePath: string): LoadedRuleDocument {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new RuleDocumentError(`Rule document not found: ${filePath}`, filePath, [], { cause: error });
    }
    throw new RuleDocumentError(
      `Failed to read rule document ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      [],
      { cause: error }
    );
  }

  let raw: unknown;
  try {
    raw = yaml.load(content, { filename: filePath });
  } catch (error) {
    throw new RuleDocumentError(
      `Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      [],
      { cause: error }
    );
  }

  return parseRuleDocument(raw, filePath);
}

// ============================================================================
// Runtime Settings
// ============================================================================

/**
 * Load and validate runtime settings. Reads `process.env` unless an explicit
 * environment is given.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  const parseResult = runtimeSettingsSchema.safeParse(env);

  if (!parseResult.success) {
    const errors = formatIssues(parseResult.error.errors).join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return parseResult.data;
}
