/**
 * Run an abortable operation under a deadline. The operation's signal is
 * aborted when the deadline passes or the parent signal aborts, and the
 * returned promise settles at that moment even if the operation ignores
 * its signal.
 */
export async function withDeadline<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  parent?: AbortSignal
): Promise<T> {
  parent?.throwIfAborted();
  const controller = new AbortController();
  const forward = (): void => controller.abort(parent?.reason);
  parent?.addEventListener('abort', forward, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });
  const timer = setTimeout(() => controller.abort(onTimeout()), timeoutMs);

  try {
    return await Promise.race([run(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', forward);
  }
}

/**
 * Wait for a shared promise through one caller's signal. Aborting the
 * signal rejects this caller only; the shared promise keeps running.
 */
export function waitFor<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
