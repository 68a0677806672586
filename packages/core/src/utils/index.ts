/**
 * Core Utilities Module
 *
 * Shared error classes and logging.
 */

export * from './errors.js';
export * from './logger.js';
