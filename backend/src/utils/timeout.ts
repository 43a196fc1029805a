/**
 * Runs `work` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects with `onTimeout()` at that moment even if `work` ignores
 * the signal.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  const timedOut = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), timedOut]);
  } finally {
    clearTimeout(timeoutId);
  }
}
