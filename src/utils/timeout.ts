/**
 * Runs `fn` with an abort signal that fires after `timeoutMs`. Resolves or
 * rejects with `fn`'s result if it settles first; otherwise aborts the
 * signal and rejects with `onTimeout()`. The timer never outlives the call.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    // Defer so a synchronous throw in fn still goes through the race
    const work = Promise.resolve().then(() => fn(controller.signal));
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}
