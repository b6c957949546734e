import type { RetryOptions } from "../types.js";
import { TimeoutError, TransientNetworkError, type VodError } from "../errors.js";

export type RetryDecision =
  | { retry: true; attempt: number; delayMs: number }
  | { retry: false; reason: "not-retryable" | "exhausted" };

/**
 * Only network hiccups and timeouts are worth another attempt
 */
export function isRetryableError(error: VodError): boolean {
  return error instanceof TransientNetworkError || error instanceof TimeoutError;
}

/**
 * Delay before retry number `retry` (0-based): base * 2^retry, capped
 */
export function backoffDelay(retry: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** retry, maxDelayMs);
}

/**
 * Retry state of one call
 *
 * @example
 * const state = new RetryState({ maxRetries: 3, baseDelayMs: 500, maxDelayMs: 8000 });
 * state.next(new TransientNetworkError("reset")); // { retry: true, attempt: 2, delayMs: 500 }
 */
export class RetryState {
  /** Attempts made so far */
  attempt = 1;
  private retries = 0;

  constructor(private readonly options: Required<RetryOptions>) {}

  /**
   * Decide what to do after the current attempt failed with `error`
   */
  next(error: VodError): RetryDecision {
    if (!isRetryableError(error)) {
      return { retry: false, reason: "not-retryable" };
    }
    if (this.retries >= this.options.maxRetries) {
      return { retry: false, reason: "exhausted" };
    }

    const delayMs = backoffDelay(this.retries, this.options.baseDelayMs, this.options.maxDelayMs);
    this.retries++;
    this.attempt++;
    return { retry: true, attempt: this.attempt, delayMs };
  }
}
