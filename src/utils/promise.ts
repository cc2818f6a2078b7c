// longer delays overflow setTimeout and fire at once
export const MAX_TIMER_MS = 2 ** 31 - 1;

/** Waits `ms`, in timer-sized chunks, or until `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (ms <= 0 || signal?.aborted) return resolve();

    const deadline = Date.now() + ms;
    let timer: NodeJS.Timeout | undefined;

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const wait = () => {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        signal?.removeEventListener("abort", onAbort);
        resolve();
        return;
      }
      timer = setTimeout(wait, Math.min(remaining, MAX_TIMER_MS));
    };

    signal?.addEventListener("abort", onAbort, { once: true });
    wait();
  });
}

/**
 * Rejects with `onTimeout()` when `promise` has not settled within `ms`.
 * The underlying work is not cancelled.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
