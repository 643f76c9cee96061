import { IPCError } from '@/ipc/transport/IPCError.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base response interface for validation.
 */
interface BaseResponse {
  status: 'ok' | 'error';
  error?: string;
}

/**
 * Response type with success status.
 * Used for type narrowing after validation.
 */
type SuccessResponse<T extends BaseResponse> = T & { status: 'ok' };

/**
 * Validate a daemon response and throw on error.
 *
 * An error status means the daemon refused the request (unknown window,
 * config parse error, shutting down), so the thrown error carries the
 * generic failure exit code rather than a transport one.
 *
 * @throws IPCError if response.status === 'error'
 *
 * @example
 * ```typescript
 * const response = await reloadConfig(paths.socketPath);
 * validateIPCResponse(response); // Throws if error
 * ```
 */
export function validateIPCResponse<T extends BaseResponse>(
  response: T
): asserts response is SuccessResponse<T> {
  if (response.status === 'error') {
    throw new IPCError(response.error ?? 'Unknown IPC error', EXIT_CODES.GENERIC_FAILURE);
  }
}
