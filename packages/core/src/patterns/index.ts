export { PatternMatcher, MATCH_FLAGS, type PatternMatcherOptions } from './pattern-matcher.js';
export {
  HandlerRegistry,
  notifyStrategy,
  suggestStrategy,
  type HandlerContext,
  type HandlerStrategy,
} from './handlers.js';
export { renderTemplate, templateFields } from './template.js';
export {
  DEFAULT_RULES_DIR,
  RULE_FILES,
  loadMatcher,
  loadRuleSet,
  rulesPath,
  type RuleKind,
  type RuleSet,
} from './rule-loader.js';
