/**
 * Timeout utility for wrapping async operations
 *
 * Time-boxes a unit of work. The wrapped promise is not cancelled; its result
 * is ignored once the timeout fires.
 */

/**
 * Wrap a promise with a timeout
 *
 * @param promise - The promise to wrap
 * @param timeoutMs - Timeout in milliseconds; 0 or less disables the timeout
 * @param onTimeout - Builds the rejection error; defaults to a plain Error naming the operation
 * @returns The promise result or throws the timeout error
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: string | (() => Error) = 'Operation'
): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(typeof onTimeout === 'function' ? onTimeout() : new Error(`${onTimeout} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
