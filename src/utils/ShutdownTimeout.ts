/**
 * @fileoverview Timeout wrapper for operations that must not hold up a stop request
 * or process shutdown, such as waiting for the session to finish assembling or for
 * the control server to close its connections.
 */

import { logWarning } from './logging';

/**
 * Custom error thrown when an operation exceeds its timeout
 */
export class TimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`Timeout: ${operation} exceeded ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Wrap a promise with timeout enforcement
 *
 * Races the provided promise against a timeout and rejects with TimeoutError if the
 * timeout fires first. The timer is cleared either way.
 *
 * @example
 * ```typescript
 * await withTimeout(server.close(), { timeoutMs: 5000, operation: 'close control server' });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  options: { timeoutMs: number; operation: string; silent?: boolean }
): Promise<T> {
  const { timeoutMs, operation, silent = false } = options;

  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<T>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      if (!silent) {
        logWarning('Shutdown', `Timeout: ${operation} (${timeoutMs}ms)`);
      }
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
}
