export {
  AtomicCommitter,
  BACKUP_DIR_NAME,
  STATUS_FILE_NAME,
  fileCountSuffix,
  formatTimestamp,
  type AtomicCommitOptions,
  type AtomicCommitterOptions,
} from './atomic-committer.js';
export {
  CliGitClient,
  parsePorcelainStatus,
  summarizeStatus,
  type GitChangeKind,
  type GitClient,
  type GitFileChange,
} from './git-client.js';
export { SyntaxVerifier, type SyntaxVerifierOptions } from './syntax-verifier.js';
export {
  babelChecker,
  createPythonChecker,
  jsonChecker,
  yamlChecker,
  type SyntaxChecker,
} from './syntax-checkers.js';
