/**
 * Runtime validation for incoming request frames.
 */

import { ACTION_NAMES, type ActionName, type ActionRequestUnion } from './actions.js';

export type ParsedRequest =
  | { ok: true; request: ActionRequestUnion }
  | { ok: false; error: string; sessionId?: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isAssignmentList(value: unknown): value is Array<[string, string]> {
  return (
    Array.isArray(value) &&
    value.every(
      (item) =>
        Array.isArray(item) &&
        item.length === 2 &&
        typeof item[0] === 'string' &&
        typeof item[1] === 'string'
    )
  );
}

function actionFromType(type: string, suffix: '_request' | '_response'): ActionName | null {
  if (!type.endsWith(suffix)) {
    return null;
  }
  const name = type.slice(0, -suffix.length);
  return ACTION_NAMES.find((action) => action === name) ?? null;
}

/**
 * Extract the action name from a request type string.
 *
 * @example
 * ```typescript
 * getActionName('close_all_request') // 'close_all'
 * getActionName('close_all_response') // null
 * getActionName('launch_request')    // null
 * ```
 */
export function getActionName(type: string): ActionName | null {
  return actionFromType(type, '_request');
}

/**
 * Extract the action name from a response type string.
 */
export function getResponseActionName(type: string): ActionName | null {
  return actionFromType(type, '_response');
}

/**
 * Validate a decoded JSON frame as a client request.
 *
 * @returns The typed request, or an error (with the sessionId when one could
 *   be read, so the caller can still answer)
 */
export function parseActionRequest(value: unknown): ParsedRequest {
  if (!isRecord(value)) {
    return { ok: false, error: 'Request must be a JSON object' };
  }

  const sessionId = value['sessionId'];
  if (typeof sessionId !== 'string' || sessionId.length === 0) {
    return { ok: false, error: 'Request is missing a sessionId' };
  }

  const type = value['type'];
  if (typeof type !== 'string') {
    return { ok: false, error: 'Request is missing a type', sessionId };
  }

  const action = getActionName(type);
  if (action === null) {
    return { ok: false, error: `Unknown request type: ${type}`, sessionId };
  }

  switch (action) {
    case 'update': {
      const assignments = value['assignments'];
      if (!isAssignmentList(assignments)) {
        return { ok: false, error: 'update requires [name, value] assignments', sessionId };
      }
      return { ok: true, request: { type: 'update_request', sessionId, assignments } };
    }
    case 'open': {
      const window = value['window'];
      if (typeof window !== 'string' || window.length === 0) {
        return { ok: false, error: 'open requires a window name', sessionId };
      }
      return { ok: true, request: { type: 'open_request', sessionId, window } };
    }
    case 'close': {
      const windows = value['windows'];
      if (!isStringArray(windows) || windows.length === 0) {
        return { ok: false, error: 'close requires at least one window name', sessionId };
      }
      return { ok: true, request: { type: 'close_request', sessionId, windows } };
    }
    case 'ping':
      return { ok: true, request: { type: 'ping_request', sessionId } };
    case 'reload':
      return { ok: true, request: { type: 'reload_request', sessionId } };
    case 'kill':
      return { ok: true, request: { type: 'kill_request', sessionId } };
    case 'close_all':
      return { ok: true, request: { type: 'close_all_request', sessionId } };
    case 'state':
      return { ok: true, request: { type: 'state_request', sessionId } };
    case 'windows':
      return { ok: true, request: { type: 'windows_request', sessionId } };
    case 'debug':
      return { ok: true, request: { type: 'debug_request', sessionId } };
  }
}
