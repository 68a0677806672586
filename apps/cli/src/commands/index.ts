/**
 * Commands exports
 */

export { healCommand } from './heal.js';
export { analyzeCommand } from './analyze.js';
export { validateRulesCommand } from './validate-rules.js';
