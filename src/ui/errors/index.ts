/**
 * Error handling for the widgetd CLI.
 */

// CLI-level errors (user-facing command errors)
export { CommandError, type ErrorMetadata } from './CommandError.js';
