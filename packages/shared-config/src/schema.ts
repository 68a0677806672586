/**
 * Configuration Schema
 *
 * Rule documents (YAML) and runtime settings (environment), validated with Zod.
 * Rule documents use snake_case keys; parsed values are camelCase.
 */

import { z } from 'zod';
import { RULE_SEVERITIES, HANDLER_ACTIONS } from '@repo/shared-types';

/**
 * Source extensions that are syntax-checked after a fix unless a document
 * overrides the list
 */
export const DEFAULT_SOURCE_EXTENSIONS = [
  '.py',
  '.pyi',
  '.js',
  '.jsx',
  '.mjs',
  '.cjs',
  '.ts',
  '.tsx',
  '.mts',
  '.cts',
  '.json',
  '.yml',
  '.yaml',
] as const;

export const DEFAULT_EXCLUDE_PATHS = ['node_modules/', '.venv/', '.pixi/', 'dist/', 'build/'] as const;

// ============================================================================
// Rules
// ============================================================================

export const captureGroupSchema = z.object({
  index: z.number().int().min(1),
  name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier'),
});

export const patternRuleSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    pattern: z.string().min(1),
    description: z.string(),
    fix_command: z.string().min(1).nullable().optional(),
    tool: z.string().min(1),
    severity: z.enum(RULE_SEVERITIES),
    requires_git_commit: z.boolean(),
    commit_message_template: z.string().min(1),
    capture_groups: z.array(captureGroupSchema).optional(),
    custom_handler: z.string().min(1).nullable().optional(),
  })
  .refine((rule) => Boolean(rule.fix_command) || Boolean(rule.custom_handler), {
    message: 'needs a fix_command or a custom_handler',
    path: ['fix_command'],
  });

export type RawPatternRule = z.infer<typeof patternRuleSchema>;

export const customHandlerSchema = z.object({
  action: z.enum(HANDLER_ACTIONS),
  message_template: z.string().min(1),
  package_aliases: z.record(z.string()).default({}),
});

export type CustomHandlerConfig = z.infer<typeof customHandlerSchema>;

// ============================================================================
// Engine & Git
// ============================================================================

export const engineConfigSchema = z
  .object({
    timeout_seconds: z.number().int().positive().default(300),
    max_output_bytes: z.number().int().positive().default(10 * 1024 * 1024),
    kill_grace_ms: z.number().int().min(0).default(1000),
    max_file_size_mb: z.number().positive().default(50),
    backup_before_fix: z.boolean().default(true),
    verify_syntax_after_fix: z.boolean().default(true),
    allowed_file_extensions: z
      .array(z.string().regex(/^\.[A-Za-z0-9]+$/, 'must look like ".ext"'))
      .default([...DEFAULT_SOURCE_EXTENSIONS]),
    exclude_paths: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDE_PATHS]),
  })
  .transform((config) => ({
    timeoutSeconds: config.timeout_seconds,
    maxOutputBytes: config.max_output_bytes,
    killGraceMs: config.kill_grace_ms,
    maxFileSizeMb: config.max_file_size_mb,
    backupBeforeFix: config.backup_before_fix,
    verifySyntaxAfterFix: config.verify_syntax_after_fix,
    allowedFileExtensions: config.allowed_file_extensions.map((ext) => ext.toLowerCase()),
    excludePaths: config.exclude_paths,
  }));

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export const gitConfigSchema = z
  .object({
    create_commit: z.boolean().default(true),
    commit_author: z.string().min(1).nullable().optional(),
    commit_prefix: z.string().default(''),
    include_file_count: z.boolean().default(true),
  })
  .transform((config) => ({
    createCommit: config.create_commit,
    commitAuthor: config.commit_author ?? null,
    commitPrefix: config.commit_prefix,
    includeFileCount: config.include_file_count,
  }));

export type GitConfig = z.infer<typeof gitConfigSchema>;

// ============================================================================
// Rule Document
// ============================================================================

/**
 * Top-level document shape. Individual rules stay `unknown` here so that a
 * single malformed rule is reported without rejecting the whole document.
 */
export const ruleDocumentSchema = z.object({
  version: z
    .union([z.string(), z.number()])
    .transform(String)
    .refine((version) => /^\d+(\.\d+)*$/.test(version), 'must look like "1.0"'),
  description: z.string().default(''),
  patterns: z.record(z.array(z.unknown())),
  custom_handlers: z.record(customHandlerSchema).default({}),
  engine_config: engineConfigSchema.default({}),
  git_config: gitConfigSchema.default({}),
});

// ============================================================================
// Runtime Settings
// ============================================================================

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Settings read from the environment. They override rule-document defaults.
 */
export const runtimeSettingsSchema = z.object({
  AUTOHEAL_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  AUTOHEAL_LOG_JSON: booleanFlag.default('false'),
  AUTOHEAL_TIMEOUT_SECONDS: z.coerce.number().int().positive().optional(),
  AUTOHEAL_RULES_DIR: z.string().min(1).optional(),
});

export type RuntimeSettings = z.infer<typeof runtimeSettingsSchema>;
