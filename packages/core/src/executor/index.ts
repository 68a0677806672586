export {
  CommandExecutor,
  DEFAULT_KILL_GRACE_MS,
  DEFAULT_MAX_OUTPUT_BYTES,
  DEFAULT_TIMEOUT_MS,
  type CommandExecutorOptions,
  type ExecuteOptions,
} from './command-executor.js';
export { CommandPolicy, DANGEROUS_PATTERNS, DEFAULT_ALLOWED_TOOLS } from './command-policy.js';
export { joinCommand, quoteArgument, tokenizeCommand } from './command-line.js';
export { toDryRunArgv } from './dry-run.js';
export { BoundedOutput } from './output-buffer.js';
