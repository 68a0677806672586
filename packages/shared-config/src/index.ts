/**
 * Centralized Configuration
 *
 * Rule documents (YAML, validated with Zod) and runtime settings from the
 * environment.
 */

export {
  loadRuleDocument,
  parseRuleDocument,
  loadSettings,
  RuleDocumentError,
  type LoadedRuleDocument,
  type RuleGroup,
} from './loader.js';
export {
  captureGroupSchema,
  customHandlerSchema,
  engineConfigSchema,
  gitConfigSchema,
  patternRuleSchema,
  ruleDocumentSchema,
  runtimeSettingsSchema,
  DEFAULT_EXCLUDE_PATHS,
  DEFAULT_SOURCE_EXTENSIONS,
  type CustomHandlerConfig,
  type EngineConfig,
  type GitConfig,
  type RawPatternRule,
  type RuntimeSettings,
} from './schema.js';
