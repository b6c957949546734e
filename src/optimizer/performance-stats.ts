import type { OperationName } from "../types.js";
import { CounterMap, type OutcomeSnapshot } from "../utils/stats.js";

export interface PerformanceEntry extends OutcomeSnapshot {
  slowCount: number;
}

export interface SitePerformance {
  calls: number;
  failures: number;
  errorRate: number;
  averageDurationMs: number;
  slowCount: number;
}

/**
 * Call statistics per site and operation, keyed "siteKey:operation"
 */
export class PerformanceStats {
  private counters = new CounterMap();
  private slow = new Map<string, number>();

  constructor(private readonly slowCallMs: number) {}

  recordSuccess(siteKey: string, operation: OperationName, durationMs: number): void {
    const key = this.key(siteKey, operation);
    this.counters.get(key).recordSuccess(durationMs);
    this.checkSlow(key, durationMs);
  }

  recordFailure(siteKey: string, operation: OperationName, durationMs: number, error: { message: string; code?: string }): void {
    const key = this.key(siteKey, operation);
    this.counters.get(key).recordFailure(durationMs, error);
    this.checkSlow(key, durationMs);
  }

  /**
   * Calls slower than the threshold, across all sites
   */
  get slowCount(): number {
    let total = 0;
    for (const count of this.slow.values()) total += count;
    return total;
  }

  snapshot(): Record<string, PerformanceEntry> {
    const result: Record<string, PerformanceEntry> = {};
    for (const [key, counter] of this.counters.entries()) {
      result[key] = { ...counter.snapshot(), slowCount: this.slow.get(key) ?? 0 };
    }
    return result;
  }

  /**
   * Totals per site over all operations
   */
  bySite(): Record<string, SitePerformance> {
    const totals = new Map<string, { calls: number; failures: number; duration: number; slowCount: number }>();
    for (const [key, counter] of this.counters.entries()) {
      const siteKey = key.slice(0, key.lastIndexOf(":"));
      const total = totals.get(siteKey) ?? { calls: 0, failures: 0, duration: 0, slowCount: 0 };
      total.calls += counter.total;
      total.failures += counter.failure;
      total.duration += counter.totalDurationMs;
      total.slowCount += this.slow.get(key) ?? 0;
      totals.set(siteKey, total);
    }

    const result: Record<string, SitePerformance> = {};
    for (const [siteKey, total] of totals) {
      result[siteKey] = {
        calls: total.calls,
        failures: total.failures,
        errorRate: total.calls === 0 ? 0 : total.failures / total.calls,
        averageDurationMs: total.calls === 0 ? 0 : Math.round(total.duration / total.calls),
        slowCount: total.slowCount,
      };
    }
    return result;
  }

  clear(): void {
    this.counters.clear();
    this.slow.clear();
  }

  private checkSlow(key: string, durationMs: number): void {
    if (durationMs > this.slowCallMs) {
      this.slow.set(key, (this.slow.get(key) ?? 0) + 1);
    }
  }

  private key(siteKey: string, operation: OperationName): string {
    return `${siteKey}:${operation}`;
  }
}
