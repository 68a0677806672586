export {
  FixWorkflow,
  type AppliedFix,
  type FixWorkflowOptions,
  type ProcessOptions,
  type ValidateConfigurationOptions,
  type WorkflowKind,
  type WorkflowState,
  type WorkflowStatus,
} from './base-workflow.js';
export { FormattingWorkflow } from './formatting-workflow.js';
export { DependencyWorkflow } from './dependency-workflow.js';
export { LOCKFILE_SPECS, LockfileVerifier, lockfileSpecFor, type LockfileSpec } from './lockfile-verifier.js';
