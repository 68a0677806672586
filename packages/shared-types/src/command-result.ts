/**
 * Command Result Types
 *
 * Output contract of the sandboxed executor. One result per spawned process.
 *
 * Rules:
 * - A non-zero exit code is a valid result, not an error
 * - stdout and stderr are truncated independently
 * - Results are never mutated after they are produced
 *
 * @module command-result
 */

// ============================================================================
// Truncation Markers
// ============================================================================

/**
 * Appended once, at the end, to stdout that exceeded the byte ceiling
 */
export const STDOUT_TRUNCATION_MARKER = '\n[OUTPUT TRUNCATED - SIZE LIMIT EXCEEDED]';

/**
 * Appended once, at the end, to stderr that exceeded the byte ceiling
 */
export const STDERR_TRUNCATION_MARKER = '\n[ERROR OUTPUT TRUNCATED - SIZE LIMIT EXCEEDED]';

// ============================================================================
// Execution Result
// ============================================================================

/**
 * Result of a single command execution
 */
export interface ExecutionResult {
  /** The literal command string that was run */
  readonly command: string;
  /** Process exit code (signal exits are reported as -1) */
  readonly exitCode: number;
  /** Captured standard output, possibly truncated */
  readonly stdout: string;
  /** Captured standard error, possibly truncated */
  readonly stderr: string;
  /** Whether stdout hit the byte ceiling */
  readonly stdoutTruncated: boolean;
  /** Whether stderr hit the byte ceiling */
  readonly stderrTruncated: boolean;
  /** Wall-clock duration in milliseconds */
  readonly durationMs: number;
  /** Whether the process was killed for exceeding its budget */
  readonly timedOut: boolean;
  /** Absolute working directory the process ran in */
  readonly workingDirectory: string;
}

/**
 * Availability information for an external tool
 */
export interface ToolInfo {
  tool: string;
  available: boolean;
  version?: string;
  error?: string;
}
