import { CancelledError, TransportError } from '../errors.js';
import { sleep } from './file.js';

export interface LinkedController {
  signal: AbortSignal;
  abort(reason?: unknown): void;
  /** Detach from the parent signal and clear the timer */
  dispose(): void;
}

/**
 * AbortController that also aborts when `parent` aborts, and, when
 * `timeoutMs` is set, after that many milliseconds with a retryable
 * TransportError as the reason.
 */
export function createLinkedController(parent?: AbortSignal, timeoutMs?: number): LinkedController {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  let timer: NodeJS.Timeout | null = null;
  if (timeoutMs != null && timeoutMs > 0) {
    timer = setTimeout(() => {
      controller.abort(new TransportError(`Timed out after ${timeoutMs}ms`, { retryable: true }));
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    abort: (reason?: unknown) => controller.abort(reason),
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Error to surface for an aborted signal: its reason when that is an Error,
 * otherwise a CancelledError.
 */
export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new CancelledError();
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw abortReason(signal);
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts. The underlying
 * work is not stopped; its late result is dropped.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Run one attempt of `operation` under its own signal, linked to `parent`
 * and limited to `timeoutMs`. Timeouts reject with a retryable TransportError.
 */
export async function runWithTimeout<T>(
  parent: AbortSignal,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const link = createLinkedController(parent, timeoutMs);
  try {
    return await abortable(operation(link.signal), link.signal);
  } finally {
    link.dispose();
  }
}

/**
 * Wait `ms` milliseconds, rejecting with the abort reason as soon as `signal`
 * aborts.
 */
export function sleepUnlessAborted(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) {
    return sleep(ms);
  }
  return new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
