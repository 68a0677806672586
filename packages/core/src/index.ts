/**
 * @autoheal/core - detect, fix, verify and commit recoverable CI failures
 *
 * Pipeline:
 * 1. Patterns - map tool output to a declarative fix rule
 * 2. Executor - run the fix command in a sandboxed child process
 * 3. Verification - syntax-check changed files, then commit atomically
 * 4. Healing - select one fix, supervise it, roll back on any failure
 */

export * from './utils/index.js';
export * from './executor/index.js';
export * from './patterns/index.js';
export * from './verification/index.js';
export * from './workflows/index.js';
export * from './healing/index.js';
