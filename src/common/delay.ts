/**
 * Resolves after `ms` milliseconds, or as soon as `signal` aborts.
 *
 * Never rejects: callers check their own cancellation flags after waking up.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timeout);
      resolve();
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Races `promise` against a timeout. Returns true if the promise settled
 * (either way) within `ms`, false otherwise. The timeout is cleared in both
 * cases so nothing keeps the process alive.
 */
export async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  const timeout = new AbortController();
  const settled = promise.then(
    () => true,
    () => true,
  );
  try {
    return await Promise.race([settled, delay(ms, timeout.signal).then(() => false)]);
  } finally {
    timeout.abort();
  }
}
