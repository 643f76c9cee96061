/**
 * assertions - Custom assertion helpers for contract tests
 */

/**
 * Poll a condition until it becomes true or timeout
 * Useful for eventually-consistent assertions
 *
 * @example
 * await assertEventually(() => received.length > 0, 1000);
 */
export async function assertEventually(
  fn: () => boolean,
  timeoutMs: number,
  message?: string
): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (fn()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error(message ?? `Condition not met within ${timeoutMs}ms`);
}

/**
 * Retry an async operation until it resolves or the timeout passes.
 * Resolves with the first successful result.
 *
 * @example
 * const response = await retryUntil(() => pingDaemon(socketPath), 2000);
 */
export async function retryUntil<T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> {
  const start = Date.now();
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (Date.now() - start >= timeoutMs) {
        throw error;
      }
    }
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
}
