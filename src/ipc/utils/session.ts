/**
 * Session Utilities
 *
 * Helper functions for session ID generation and message enrichment.
 */

import { randomUUID } from 'node:crypto';

/**
 * Generate a unique session ID.
 *
 * @returns Random UUID v4
 */
export function generateSessionId(): string {
  return randomUUID();
}

/**
 * Add a fresh session ID to a payload.
 *
 * @example
 * ```typescript
 * const request = withSession({ type: 'ping_request' as const });
 * // { type: 'ping_request', sessionId: '550e8400-...' }
 * ```
 */
export function withSession<T extends { type: string }>(payload: T): T & { sessionId: string } {
  return { ...payload, sessionId: generateSessionId() };
}
