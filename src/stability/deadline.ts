// src/stability/deadline.ts: per-call and per-query deadlines built on AbortController
import { DeadlineExceededError } from '@/services/errors';

type TimerHandle = ReturnType<typeof setTimeout>;

/**
 * Runs `fn` with its own AbortSignal and rejects when `timeoutMs` passes or `parentSignal` aborts,
 * whichever comes first. The inner signal is aborted in both cases so the callee can stop work.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: {
    parentSignal?: AbortSignal;
    onTimeout?: () => Error;
  } = {},
): Promise<T> {
  const { parentSignal } = options;
  const makeTimeoutError =
    options.onTimeout ?? (() => new DeadlineExceededError(`Operation exceeded ${timeoutMs}ms`, false));

  if (parentSignal?.aborted) {
    throw new DeadlineExceededError('Cancelled before start', true);
  }

  const controller = new AbortController();
  let timer: TimerHandle | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(makeTimeoutError());
      controller.abort();
    }, timeoutMs);
    if (parentSignal) {
      onParentAbort = () => {
        reject(new DeadlineExceededError('Cancelled', true));
        controller.abort();
      };
      parentSignal.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([fn(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (parentSignal && onParentAbort) parentSignal.removeEventListener('abort', onParentAbort);
  }
}

export interface QueryDeadline {
  readonly signal: AbortSignal;
  /** True once the deadline itself fired (as opposed to a caller cancellation). */
  timedOut(): boolean;
  cancelled(): boolean;
  dispose(): void;
}

/** One AbortController per query: aborted by the query timeout or by the caller's signal. */
export function createQueryDeadline(timeoutMs: number, callerSignal?: AbortSignal): QueryDeadline {
  const controller = new AbortController();
  let fired = false;
  let callerAborted = false;

  const onCallerAbort = () => {
    callerAborted = true;
    controller.abort();
  };

  const timer: TimerHandle = setTimeout(() => {
    fired = true;
    controller.abort();
  }, timeoutMs);

  if (callerSignal) {
    if (callerSignal.aborted) onCallerAbort();
    else callerSignal.addEventListener('abort', onCallerAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => fired,
    cancelled: () => callerAborted,
    dispose: () => {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    },
  };
}

/**
 * Settles with `work` unless `signal` aborts first, in which case it rejects with a cancelled
 * DeadlineExceededError. For callees that may not honour the signal themselves.
 */
export async function raceAbort<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;
  if (signal.aborted) throw new DeadlineExceededError('Cancelled before start', true);

  let onAbort: (() => void) | undefined;
  const guard = new Promise<never>((_, reject) => {
    onAbort = () => reject(new DeadlineExceededError('Cancelled', true));
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([work, guard]);
  } finally {
    if (onAbort) signal.removeEventListener('abort', onAbort);
  }
}
