/**
 * CLI version, injected at bundle time
 *
 * @module lib/version
 */

declare const __CLI_VERSION__: string;

export const CLI_VERSION = typeof __CLI_VERSION__ !== 'undefined' ? __CLI_VERSION__ : '0.3.0';
