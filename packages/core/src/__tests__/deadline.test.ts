import { describe, expect, it } from 'vitest';
import { DeadlineError, runWithDeadline } from '../deadline';

const reasonOf = async (pending: Promise<unknown>) => {
  const error = await pending.then(
    () => null,
    (caught: unknown) => caught,
  );
  return error instanceof DeadlineError ? error.reason : error;
};

describe('runWithDeadline', () => {
  it('resolves with the task result', async () => {
    await expect(runWithDeadline(async () => 'done', { timeoutMs: 50 })).resolves.toBe('done');
  });

  it('rejects with a timeout even when the task ignores its signal', async () => {
    const seen: { signal?: AbortSignal } = {};
    const pending = runWithDeadline(
      (signal) => {
        seen.signal = signal;
        return new Promise<string>(() => {});
      },
      { timeoutMs: 10 },
    );

    expect(await reasonOf(pending)).toBe('timeout');
    expect(seen.signal?.aborted).toBe(true);
  });

  it('propagates a request abort to the in-flight call', async () => {
    const controller = new AbortController();
    const seen: { signal?: AbortSignal } = {};
    const pending = runWithDeadline(
      (signal) => {
        seen.signal = signal;
        return new Promise<string>(() => {});
      },
      { timeoutMs: 1_000, signal: controller.signal },
    );
    controller.abort();

    expect(await reasonOf(pending)).toBe('aborted');
    expect(seen.signal?.aborted).toBe(true);
  });

  it('does not start the task when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const seen = { started: false };
    const pending = runWithDeadline(
      async () => {
        seen.started = true;
        return 'x';
      },
      { timeoutMs: 50, signal: controller.signal },
    );

    expect(await reasonOf(pending)).toBe('aborted');
    expect(seen.started).toBe(false);
  });

  it('names the failure in its message', () => {
    expect(String(new DeadlineError('timeout', 20))).toBe('DeadlineError: timed out after 20ms');
  });
});
