/**
 * Centralized user-facing messages.
 */

export * from './errors.js';
export * from './commands.js';
