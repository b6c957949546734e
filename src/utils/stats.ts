/**
 * Counters shared by engine, hook and performance statistics
 */

export interface RecordedError {
  message: string;
  code?: string;
  at: number;
}

/**
 * Fixed-size ring of the most recent errors, oldest first when read
 */
export class RecentErrors {
  private entries: RecordedError[] = [];

  constructor(private readonly capacity = 10) {}

  push(error: RecordedError): void {
    this.entries.push(error);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
  }

  toArray(): RecordedError[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}

/**
 * Outcome counters with duration tracking
 */
export class OutcomeCounter {
  success = 0;
  failure = 0;
  skip = 0;
  totalDurationMs = 0;
  lastUsedAt?: number;
  readonly recentErrors = new RecentErrors();

  get total(): number {
    return this.success + this.failure;
  }

  get errorRate(): number {
    return this.total === 0 ? 0 : this.failure / this.total;
  }

  get averageDurationMs(): number {
    return this.total === 0 ? 0 : Math.round(this.totalDurationMs / this.total);
  }

  recordSuccess(durationMs: number): void {
    this.success++;
    this.totalDurationMs += durationMs;
    this.lastUsedAt = Date.now();
  }

  recordFailure(durationMs: number, error: { message: string; code?: string }): void {
    this.failure++;
    this.totalDurationMs += durationMs;
    this.lastUsedAt = Date.now();
    this.recentErrors.push({ message: error.message, code: error.code, at: this.lastUsedAt });
  }

  recordSkip(): void {
    this.skip++;
    this.lastUsedAt = Date.now();
  }

  snapshot(): OutcomeSnapshot {
    return {
      success: this.success,
      failure: this.failure,
      skip: this.skip,
      total: this.total,
      errorRate: this.errorRate,
      totalDurationMs: this.totalDurationMs,
      averageDurationMs: this.averageDurationMs,
      lastUsedAt: this.lastUsedAt,
      recentErrors: this.recentErrors.toArray(),
    };
  }
}

export interface OutcomeSnapshot {
  success: number;
  failure: number;
  skip: number;
  total: number;
  errorRate: number;
  totalDurationMs: number;
  averageDurationMs: number;
  lastUsedAt?: number;
  recentErrors: RecordedError[];
}

/**
 * Map of counters created on first use
 */
export class CounterMap {
  private counters = new Map<string, OutcomeCounter>();

  get(key: string): OutcomeCounter {
    let counter = this.counters.get(key);
    if (!counter) {
      counter = new OutcomeCounter();
      this.counters.set(key, counter);
    }
    return counter;
  }

  peek(key: string): OutcomeCounter | undefined {
    return this.counters.get(key);
  }

  entries(): IterableIterator<[string, OutcomeCounter]> {
    return this.counters.entries();
  }

  snapshot(): Record<string, OutcomeSnapshot> {
    const result: Record<string, OutcomeSnapshot> = {};
    for (const [key, counter] of this.counters) {
      result[key] = counter.snapshot();
    }
    return result;
  }

  clear(): void {
    this.counters.clear();
  }
}
