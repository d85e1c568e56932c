/**
 * Bounded waits for external calls.
 *
 * Every network call in the answer pipeline (embedding, vector query, chat
 * completion) goes through `withTimeout` so that a hung service surfaces as
 * the calling stage's error instead of blocking the request forever.
 */

/**
 * Race a promise against a timer.
 *
 * The timer is always cleared once the race settles, so a fast call leaves
 * nothing scheduled on the event loop.
 *
 * @param promise - The operation to wait for
 * @param timeoutMs - Upper bound in milliseconds (0 or less disables the bound)
 * @param onTimeout - Builds the error to reject with when the bound is hit
 *
 * @example
 * ```typescript
 * const vector = await withTimeout(
 *   client.embeddings.create({ model, input }),
 *   30_000,
 *   () => new EmbeddingError('Embedding request timed out after 30000ms')
 * );
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}
