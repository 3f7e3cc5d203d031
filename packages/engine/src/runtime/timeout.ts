export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Run `task` with an AbortSignal that fires after `timeoutMs`.
 * The returned promise rejects with `makeTimeoutError()` on expiry even if the
 * task ignores the signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  makeTimeoutError: () => Error = () => new TimeoutError('Operation timed out')
): Promise<T> {
  const controller = new AbortController();
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return task(controller.signal);
  }

  let timeout: NodeJS.Timeout | null = null;
  const timeoutPromise = new Promise<never>((_resolve, reject) => {
    timeout = setTimeout(() => {
      // Reject before aborting so the race settles with the timeout error
      reject(makeTimeoutError());
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeoutPromise]);
  } finally {
    if (timeout) clearTimeout(timeout);
  }
}
