import { afterEach, describe, it, expect, vi } from 'vitest';
import { createQueryDeadline, raceAbort, withDeadline } from '@/stability/deadline';
import { DeadlineExceededError } from '@/services/errors';

function never(): Promise<string> {
  return new Promise<string>(() => undefined);
}

describe('withDeadline', () => {
  it('resolves with the callee result', async () => {
    await expect(withDeadline(async () => 'done', 50)).resolves.toBe('done');
  });

  it('propagates the callee error', async () => {
    await expect(
      withDeadline(async () => {
        throw new Error('upstream failed');
      }, 50),
    ).rejects.toThrow('upstream failed');
  });

  it('rejects on timeout and aborts the inner signal', async () => {
    let inner: AbortSignal | undefined;
    const run = withDeadline((signal) => {
      inner = signal;
      return never();
    }, 10);
    await expect(run).rejects.toThrow(new DeadlineExceededError('Operation exceeded 10ms', false));
    expect(inner?.aborted).toBe(true);
  });

  it('uses the caller timeout error when given', async () => {
    await expect(withDeadline(() => never(), 5, { onTimeout: () => new Error('route too slow') })).rejects.toThrow(
      'route too slow',
    );
  });

  it('refuses to start under an aborted parent', async () => {
    const parent = new AbortController();
    parent.abort();
    const fn = vi.fn(async () => 'never runs');
    const err = await withDeadline(fn, 50, { parentSignal: parent.signal }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DeadlineExceededError);
    expect(err instanceof DeadlineExceededError && err.cancelled).toBe(true);
    expect(fn).not.toHaveBeenCalled();
  });

  it('rejects as cancelled when the parent aborts mid-call', async () => {
    const parent = new AbortController();
    const run = withDeadline(() => never(), 1000, { parentSignal: parent.signal });
    parent.abort();
    await expect(run).rejects.toThrow(new DeadlineExceededError('Cancelled', true));
  });
});

describe('createQueryDeadline', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('aborts when the timeout fires', () => {
    vi.useFakeTimers();
    const deadline = createQueryDeadline(100);
    vi.advanceTimersByTime(99);
    expect(deadline.signal.aborted).toBe(false);
    vi.advanceTimersByTime(1);
    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut()).toBe(true);
    expect(deadline.cancelled()).toBe(false);
  });

  it('tells a caller cancellation apart from a timeout', () => {
    vi.useFakeTimers();
    const caller = new AbortController();
    const deadline = createQueryDeadline(100, caller.signal);
    caller.abort();
    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.cancelled()).toBe(true);
    expect(deadline.timedOut()).toBe(false);
    deadline.dispose();
  });

  it('starts aborted under an already aborted caller signal', () => {
    const caller = new AbortController();
    caller.abort();
    const deadline = createQueryDeadline(100, caller.signal);
    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.cancelled()).toBe(true);
    deadline.dispose();
  });

  it('does not fire after dispose', () => {
    vi.useFakeTimers();
    const deadline = createQueryDeadline(100);
    deadline.dispose();
    vi.advanceTimersByTime(500);
    expect(deadline.signal.aborted).toBe(false);
  });
});

describe('raceAbort', () => {
  it('returns the work when no signal is given', async () => {
    await expect(raceAbort(Promise.resolve(3))).resolves.toBe(3);
  });

  it('rejects as cancelled when the signal aborts before the work settles', async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise<number>(() => {}), controller.signal);
    controller.abort();
    const err = await pending.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DeadlineExceededError);
    expect(err).toMatchObject({ message: 'Cancelled', cancelled: true });
  });

  it('rejects at once on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(raceAbort(Promise.resolve(1), controller.signal)).rejects.toMatchObject({
      message: 'Cancelled before start',
    });
  });
});
