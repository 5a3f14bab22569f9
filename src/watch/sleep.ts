const MAX_TIMER_MS = 2_147_483_647;

/**
 * Waits for `ms` milliseconds or until the signal aborts, whichever comes
 * first. Resolves true when the full delay elapsed, false when cut short.
 * Delays beyond the timer limit are waited out in chunks.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
    let remaining = Math.max(0, ms);
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };

    const arm = () => {
      const chunk = Math.min(remaining, MAX_TIMER_MS);
      remaining -= chunk;
      timer = setTimeout(() => {
        if (remaining > 0) {
          arm();
          return;
        }
        signal?.removeEventListener("abort", onAbort);
        resolve(true);
      }, chunk);
    };

    arm();
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
