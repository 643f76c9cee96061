/**
 * IPC Protocol Layer
 *
 * Exports action schemas, message types and request validation.
 */

export * from './actions.js';
export * from './guards.js';
