/**
 * IPC Module
 *
 * Public API for communication between the CLI and the daemon.
 *
 * Organized into layers:
 * - Client API (high-level functions for CLI commands)
 * - Protocol (action schemas and request validation)
 * - Transport (low-level socket communication)
 */

// Public client API
export * from './client.js';

// Protocol types and guards
export * from './protocol/index.js';

// Transport errors
export {
  IPCError,
  IPCConnectionError,
  IPCEarlyCloseError,
  IPCParseError,
  IPCTimeoutError,
} from './transport/IPCError.js';
export { JSONLBuffer, parseJSONLFrame, toJSONLFrame } from './transport/jsonl.js';

// Validation utilities
export { validateIPCResponse } from './utils/responseValidator.js';
export { isConnectionError } from './utils/errors.js';
