/**
 * Sleep for `ms`, resolving early when `signal` aborts. Never rejects:
 * loops check the signal themselves after waking up.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Seconds between two instants, rounded to two decimals. */
export function elapsedSeconds(start: Date, end: Date): number {
  return Math.round((end.getTime() - start.getTime()) / 10) / 100;
}
