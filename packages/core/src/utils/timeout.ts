import { TimeoutError } from '../errors';

/**
 * Reject with a {@link TimeoutError} when `promise` has not settled within
 * `timeoutMs`.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  message?: string,
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(message ?? `Operation timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Elapsed time for humans: seconds below a minute, minutes above.
 */
export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds > 60) {
    return `${(seconds / 60).toFixed(4)} minutes`;
  }
  return `${seconds.toFixed(4)} seconds`;
}
