/**
 * Pattern rule and match types
 *
 * Rules are declarative: they are loaded from rule documents and owned by a
 * matcher for its whole lifetime. Matches are produced per attempt and
 * consumed immediately.
 */

// ============================================================================
// Severity
// ============================================================================

export const RULE_SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;
export type RuleSeverity = (typeof RULE_SEVERITIES)[number];

// ============================================================================
// Custom Handlers
// ============================================================================

export const HANDLER_ACTIONS = ['suggest', 'notify'] as const;
export type HandlerAction = (typeof HANDLER_ACTIONS)[number];

/**
 * A custom handler resolved for one match
 */
export interface ResolvedHandler {
  /** Handler name as declared by the rule */
  name: string;
  /** Behavior registered for the handler */
  action: HandlerAction;
  /** Message template with captured fields substituted */
  message: string;
}

// ============================================================================
// Rules
// ============================================================================

export interface CaptureGroupSpec {
  /** 1-based positional group index */
  index: number;
  /** Field name the group is bound to */
  name: string;
}

export interface PatternRule {
  id: string;
  name: string;
  description: string;
  /** Group key the rule was declared under (usually the tool name) */
  category: string;
  tool: string;
  /** Regular expression source */
  pattern: string;
  /** Fix command template, `null` when a custom handler applies */
  fixCommand: string | null;
  severity: RuleSeverity;
  requiresCommit: boolean;
  commitMessageTemplate: string;
  captureGroups: CaptureGroupSpec[];
  customHandler: string | null;
}

// ============================================================================
// Matches
// ============================================================================

export interface MatchOutcome {
  ruleId: string;
  tool: string;
  category: string;
  severity: RuleSeverity;
  /** Fix command with captured fields substituted */
  fixCommand: string | null;
  /** Declared capture groups bound to their names */
  captures: Record<string, string>;
  /** Full match followed by every positional group ('' for unmatched groups) */
  groups: string[];
  /** The text that was matched against */
  input: string;
  rule: PatternRule;
  handler: ResolvedHandler | null;
}
