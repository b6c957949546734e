import { CancelledError, TimeoutError } from "../errors.js";

/**
 * Cancellation helpers built on AbortController
 */

/**
 * Controller linked to any number of parent signals, optionally with a timeout.
 * `dispose()` must be called once the guarded work settles.
 */
export interface LinkedController {
  readonly signal: AbortSignal;
  /** True when the timeout (not a parent) aborted the signal */
  readonly timedOut: boolean;
  abort(reason?: unknown): void;
  dispose(): void;
}

/**
 * Create a controller that aborts when any parent aborts or after `timeoutMs`
 */
export function linkSignals(parents: Array<AbortSignal | undefined>, timeoutMs?: number): LinkedController {
  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  let timeoutId: NodeJS.Timeout | undefined;
  let timedOut = false;

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = () => controller.abort(parent.reason);
    parent.addEventListener("abort", onAbort, { once: true });
    listeners.push(() => parent.removeEventListener("abort", onAbort));
  }

  if (timeoutMs !== undefined && timeoutMs > 0 && !controller.signal.aborted) {
    timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort(new TimeoutError(`Timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut;
    },
    abort: (reason?: unknown) => controller.abort(reason),
    dispose: () => {
      if (timeoutId) clearTimeout(timeoutId);
      for (const remove of listeners) remove();
      listeners.length = 0;
    },
  };
}

/**
 * Throw CancelledError if the signal has fired
 */
export function throwIfAborted(signal: AbortSignal | undefined, siteKey?: string): void {
  if (signal?.aborted) {
    throw abortReason(signal, siteKey);
  }
}

/**
 * Turn a signal's abort reason into a VodError
 */
export function abortReason(signal: AbortSignal, siteKey?: string): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof TimeoutError || reason instanceof CancelledError) {
    return reason;
  }
  return new CancelledError(reason instanceof Error ? reason.message : "Operation cancelled", { siteKey });
}

/**
 * Reject as soon as the signal fires; never resolves otherwise
 */
function rejectOnAbort(signal: AbortSignal, siteKey?: string): { promise: Promise<never>; cleanup: () => void } {
  let onAbort: (() => void) | undefined;
  const promise = new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal, siteKey));
      return;
    }
    onAbort = () => reject(abortReason(signal, siteKey));
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return {
    promise,
    cleanup: () => {
      if (onAbort) signal.removeEventListener("abort", onAbort);
    },
  };
}

/**
 * Race a promise against a signal so that a non-cooperative task cannot outlive it
 */
export async function raceSignal<T>(promise: Promise<T>, signal: AbortSignal | undefined, siteKey?: string): Promise<T> {
  if (!signal) return promise;

  // Racing even when already aborted keeps a later rejection of `promise` handled
  const abort = rejectOnAbort(signal, siteKey);
  try {
    return await Promise.race([promise, abort.promise]);
  } finally {
    abort.cleanup();
  }
}

/**
 * Run `task` with a timeout; the task receives a signal that fires on timeout or parent abort
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
  siteKey?: string
): Promise<T> {
  const linked = linkSignals([parent], timeoutMs);
  try {
    return await raceSignal(task(linked.signal), linked.signal, siteKey);
  } finally {
    linked.dispose();
  }
}

/**
 * Sleep that ends early with CancelledError when the signal fires
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  throwIfAborted(signal);
  await new Promise<void>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(signal ? abortReason(signal) : new CancelledError());
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
