import { TimeoutError } from '@fieldwise/shared';

/**
 * Race a promise against a timer. The timer is cleared once the race is
 * decided, so nothing is left pending.
 *
 * @throws TimeoutError when the limit is reached first
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs, { label })),
          timeoutMs,
        );
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}
