import pLimit from "p-limit";
import { raceSignal, throwIfAborted } from "./abort.js";

type Limit = ReturnType<typeof pLimit>;

/**
 * Per-key concurrency limiter using p-limit
 *
 * Each key (a site) gets its own pool of `concurrency` permits. Waiting for a
 * permit honors the caller's signal: a cancelled waiter leaves immediately and
 * its queued slot runs as a no-op.
 */
export class KeyedLimiter {
  private limits = new Map<string, Limit>();

  constructor(private readonly concurrency: number) {}

  /**
   * Execute a function while holding one of the key's permits
   */
  async run<T>(key: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    throwIfAborted(signal, key);
    const limit = this.limitFor(key);
    return raceSignal(
      limit(async () => {
        throwIfAborted(signal, key);
        return fn();
      }),
      signal,
      key
    );
  }

  private limitFor(key: string): Limit {
    let limit = this.limits.get(key);
    if (!limit) {
      limit = pLimit(this.concurrency);
      this.limits.set(key, limit);
    }
    return limit;
  }
}
