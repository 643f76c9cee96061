/**
 * Response Validation
 *
 * Validates IPC response frames against the request that produced them.
 */

import { getResponseActionName, type ActionResponse } from '@/ipc/protocol/index.js';

import { IPCParseError } from './IPCError.js';

type WithSessionId = { sessionId: string };
type WithType = { type: string };

/**
 * Check the shape of a decoded response frame.
 *
 * @throws IPCParseError if the frame is not an action response
 */
export function assertActionResponse(value: unknown, requestName: string): ActionResponse {
  if (typeof value !== 'object' || value === null) {
    throw new IPCParseError(requestName, 'Response is not a JSON object');
  }

  const type = 'type' in value ? value.type : undefined;
  const sessionId = 'sessionId' in value ? value.sessionId : undefined;
  const status = 'status' in value ? value.status : undefined;
  const output = 'output' in value ? value.output : undefined;
  const error = 'error' in value ? value.error : undefined;

  const action = typeof type === 'string' ? getResponseActionName(type) : null;
  if (action === null) {
    throw new IPCParseError(requestName, `Invalid response type: ${String(type)}`);
  }
  if (typeof sessionId !== 'string') {
    throw new IPCParseError(requestName, 'Response is missing a sessionId');
  }
  if (status !== 'ok' && status !== 'error') {
    throw new IPCParseError(requestName, `Invalid response status: ${String(status)}`);
  }

  const response: ActionResponse = {
    type: `${action}_response`,
    sessionId,
    status,
  };
  if (typeof output === 'string') {
    response.output = output;
  }
  if (typeof error === 'string') {
    response.error = error;
  }
  return response;
}

/**
 * Validate response session ID matches request.
 */
export function validateSessionId<TReq extends WithSessionId, TRes extends WithSessionId>(
  request: TReq,
  response: TRes,
  requestName: string
): void {
  if (response.sessionId !== request.sessionId) {
    throw new IPCParseError(
      requestName,
      `Response sessionId mismatch: expected ${request.sessionId}, got ${response.sessionId}`
    );
  }
}

/**
 * Validate response type matches expected type.
 */
export function validateResponseType<T extends WithType>(
  response: T,
  expectedType: string,
  requestName: string
): void {
  if (response.type !== expectedType) {
    throw new IPCParseError(
      requestName,
      `Unexpected response type: ${response.type} (expected ${expectedType})`
    );
  }
}
