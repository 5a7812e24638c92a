export type DeadlineReason = 'timeout' | 'aborted';

export class DeadlineError extends Error {
  readonly reason: DeadlineReason;

  constructor(reason: DeadlineReason, timeoutMs: number) {
    super(reason === 'timeout' ? `timed out after ${timeoutMs}ms` : 'request aborted');
    this.name = 'DeadlineError';
    this.reason = reason;
  }
}

/**
 * Run one external call under its own timeout, linked to the request signal.
 * The task receives a signal that aborts on either; the returned promise
 * rejects with DeadlineError even if the task ignores its signal.
 */
export async function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: { timeoutMs: number; signal?: AbortSignal },
): Promise<T> {
  const { timeoutMs, signal } = options;
  if (signal?.aborted) throw new DeadlineError('aborted', timeoutMs);

  const controller = new AbortController();
  let reason: DeadlineReason = 'timeout';
  const onParentAbort = () => {
    reason = 'aborted';
    controller.abort();
  };
  signal?.addEventListener('abort', onParentAbort, { once: true });
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  const deadline = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(new DeadlineError(reason, timeoutMs)), {
      once: true,
    });
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onParentAbort);
  }
}
