import { cancelledError, errorMessage, LLMError, timeoutError } from './errors.js';

export interface Deadline {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Child signal for one adapter invocation: aborts when the parent aborts
 * (propagating its reason) or when `timeoutMs` elapses (reason: timeout LLMError).
 */
export function createDeadline(parent: AbortSignal, timeoutMs: number): Deadline {
  const controller = new AbortController();

  const onParentAbort = () => controller.abort(abortReason(parent));
  if (parent.aborted) {
    onParentAbort();
  } else {
    parent.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = timeoutMs > 0
    ? setTimeout(() => controller.abort(timeoutError(timeoutMs)), timeoutMs)
    : undefined;

  return {
    signal: controller.signal,
    dispose() {
      if (timer) clearTimeout(timer);
      parent.removeEventListener('abort', onParentAbort);
    },
  };
}

/** The abort reason as an LLMError; anything else becomes `cancelled`. */
export function abortReason(signal: AbortSignal): LLMError {
  const reason: unknown = signal.reason;
  if (reason instanceof LLMError) return reason;
  return cancelledError(reason === undefined ? undefined : errorMessage(reason));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with `promise`. Once `signal` aborts, wait at most `graceMs`
 * for it before rejecting with the abort reason.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal, graceMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let graceTimer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = () => {
      graceTimer = setTimeout(() => reject(abortReason(signal)), Math.max(0, graceMs));
    };
    const cleanup = () => {
      if (graceTimer) clearTimeout(graceTimer);
      signal.removeEventListener('abort', onAbort);
    };

    promise.then(
      value => { cleanup(); resolve(value); },
      (err: unknown) => { cleanup(); reject(err); },
    );

    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
  });
}
