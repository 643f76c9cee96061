/**
 * IPC Utilities
 *
 * Exports session helpers, error detection, and response validation.
 */

export * from './session.js';
export * from './errors.js';
export * from './responseValidator.js';
