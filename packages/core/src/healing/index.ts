export {
  NO_FIX_REASON,
  dependencyFix,
  describeFix,
  fixSummary,
  formattingFix,
  noopFix,
  type DependencyFix,
  type FixDescriptor,
  type FormattingFix,
  type NoopFix,
} from './fix-descriptor.js';
export { SelectionEngine, type SelectionEngineOptions } from './selection-engine.js';
export {
  BACKUP_MARKER_FILE,
  FixApplier,
  type FixApplierOptions,
  type Restorer,
  type SupervisedRun,
  type SupervisorState,
} from './fix-applier.js';
export { flattenError, formatStatus, parseStatus, readStatusFile, statusFilePath, writeStatusFile } from './status-file.js';
export { Healer, type HealResult, type HealerOptions } from './healer.js';
