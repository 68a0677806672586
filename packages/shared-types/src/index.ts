/**
 * Shared TypeScript types for the monorepo
 *
 * This module provides:
 * - The data model flowing through the healing pipeline
 * - Severity and handler enums with runtime guards
 * - Output markers shared by the executor and its callers
 */

export * from './command-result.js';
export * from './rules.js';
export * from './verification.js';
export * from './workflow.js';
