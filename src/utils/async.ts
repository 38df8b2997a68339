/**
 * Async utilities
 */

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wrap a promise with a timeout. The error is built lazily so callers
 * can raise their own timeout type.
 */
export async function timeout<T>(
  promise: Promise<T>,
  ms: number,
  createError: () => Error,
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(createError()), ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Run `body`, then `release` on every exit path.
 *
 * A release failure after a successful body is thrown. After a failing body
 * the body's error wins and the release failure goes to `onReleaseError`.
 */
export async function scoped<T>(
  body: () => Promise<T>,
  release: () => Promise<void>,
  onReleaseError: (error: unknown) => void,
): Promise<T> {
  let result: T;
  try {
    result = await body();
  } catch (error) {
    try {
      await release();
    } catch (releaseError) {
      onReleaseError(releaseError);
    }
    throw error;
  }
  await release();
  return result;
}
