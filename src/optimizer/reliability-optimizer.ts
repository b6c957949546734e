/**
 * Reliability Optimizer
 *
 * Wraps the engine selector with caching, per-site permits, retries and
 * health tracking:
 *
 *   cache lookup -> site permit -> selector (attempt timeout) -> stats -> cache write
 *
 * Transient network errors and attempt timeouts are retried with exponential
 * backoff. Any other failure, or exhausted retries, yields an empty envelope
 * carrying the error. Cancellation of the caller is thrown, never cached.
 */

import type { ContentEnvelope, OperationName, ParserOperation, RetryOptions, Site } from "../types.js";
import { DEFAULT_ENGINE_OPTIONS, DEFAULT_TTL } from "../types.js";
import type { EngineSelector } from "../engines/selector.js";
import type { ResultCache, LoadResult } from "../cache/result-cache.js";
import { cacheKey } from "../cache/cache-key.js";
import { failureEnvelope, isCacheable } from "../normalize/envelope.js";
import { RetryState } from "./retry.js";
import { HealthRegistry, type HealthOptions, type SiteHealthSnapshot } from "./site-health.js";
import { PerformanceStats, type PerformanceEntry } from "./performance-stats.js";
import { CancelledError, type VodError, wrapError } from "../errors.js";
import { KeyedLimiter } from "../utils/rate-limiter.js";
import { abortReason, sleep, withTimeout } from "../utils/abort.js";
import type { Logger } from "../utils/logger.js";

/**
 * The part of the selector the optimizer drives
 */
export type OperationExecutor = Pick<EngineSelector, "execute" | "degradedSites">;

export interface ReliabilityOptimizerOptions {
  selector: OperationExecutor;
  cache: ResultCache;
  /** Simultaneous calls allowed on one site (default: 3) */
  perSiteConcurrency?: number;
  retry?: RetryOptions;
  /** TTL per operation in milliseconds */
  ttl?: Partial<Record<OperationName, number>>;
  /** Calls slower than this are counted as slow (default: 5000ms) */
  slowCallMs?: number;
  /** Attempt timeout factor for degraded sites (default: 0.5) */
  degradedTimeoutFactor?: number;
  /** Attempt timeout for sites that declare none (default: 15000ms) */
  defaultTimeoutMs?: number;
  health?: HealthOptions;
  logger?: Logger;
}

export interface OptimizerCallOptions {
  signal?: AbortSignal;
}

export interface OptimizedResult {
  envelope: ContentEnvelope;
  /** Answered from the cache */
  cached: boolean;
}

export type SuggestionType = "error-rate" | "slow-site" | "degraded-site" | "demoted-site" | "cache-hit-rate";

export interface Suggestion {
  type: SuggestionType;
  siteKey?: string;
  message: string;
}

export interface OptimizerStats {
  performance: Record<string, PerformanceEntry>;
  health: Record<string, SiteHealthSnapshot>;
  slowCount: number;
  retries: number;
}

const ERROR_RATE_THRESHOLD = 0.3;
const CACHE_HIT_RATE_THRESHOLD = 0.5;
const CACHE_MIN_LOOKUPS = 20;

export class ReliabilityOptimizer {
  private readonly selector: OperationExecutor;
  private readonly cache: ResultCache;
  private readonly limiter: KeyedLimiter;
  private readonly retryOptions: Required<RetryOptions>;
  private readonly ttl: Record<OperationName, number>;
  private readonly slowCallMs: number;
  private readonly degradedTimeoutFactor: number;
  private readonly defaultTimeoutMs: number;
  private readonly logger?: Logger;

  private readonly performance: PerformanceStats;
  private readonly health: HealthRegistry;
  private retries = 0;

  constructor(options: ReliabilityOptimizerOptions) {
    this.selector = options.selector;
    this.cache = options.cache;
    this.limiter = new KeyedLimiter(options.perSiteConcurrency ?? DEFAULT_ENGINE_OPTIONS.perSiteConcurrency);
    this.retryOptions = { ...DEFAULT_ENGINE_OPTIONS.retry, ...options.retry };
    this.ttl = { ...DEFAULT_TTL, ...options.ttl };
    this.slowCallMs = options.slowCallMs ?? DEFAULT_ENGINE_OPTIONS.slowCallMs;
    this.degradedTimeoutFactor = options.degradedTimeoutFactor ?? DEFAULT_ENGINE_OPTIONS.degradedTimeoutFactor;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_ENGINE_OPTIONS.aggregator.siteTimeoutMs;
    this.logger = options.logger;
    this.performance = new PerformanceStats(this.slowCallMs);
    this.health = new HealthRegistry(options.health);
  }

  /**
   * Resolve an operation through cache, permits and retries
   *
   * @throws CancelledError (or the TimeoutError the caller's signal was aborted with)
   */
  async execute(site: Site, operation: ParserOperation, options: OptimizerCallOptions = {}): Promise<OptimizedResult> {
    const { signal } = options;
    const result: LoadResult = await this.cache.getOrLoad(
      cacheKey(site.key, operation),
      this.ttl[operation.type],
      () => this.load(site, operation, signal),
      { signal, shouldCache: isCacheable }
    );

    if (result.tier) {
      this.logger?.debug(`[optimizer] ${site.key} ${operation.type} served from ${result.tier} cache`);
    }
    return { envelope: result.value, cached: result.tier !== undefined };
  }

  /**
   * Attempt timeout for a site in its current health state
   */
  attemptTimeout(site: Site): number {
    const base = site.timeoutMs ?? this.defaultTimeoutMs;
    if (this.health.stateOf(site.key) === "degraded") {
      return Math.max(1, Math.round(base * this.degradedTimeoutFactor));
    }
    return base;
  }

  /**
   * Tuning hints derived from the collected statistics
   */
  suggestions(): Suggestion[] {
    const suggestions: Suggestion[] = [];

    for (const [siteKey, perf] of Object.entries(this.performance.bySite())) {
      if (perf.calls > 0 && perf.errorRate > ERROR_RATE_THRESHOLD) {
        suggestions.push({
          type: "error-rate",
          siteKey,
          message: `site ${siteKey} failing ${Math.round(perf.errorRate * 100)}% of calls; check its api or disable it`,
        });
      }
      if (perf.averageDurationMs > this.slowCallMs) {
        suggestions.push({
          type: "slow-site",
          siteKey,
          message: `site ${siteKey} averaging ${perf.averageDurationMs}ms; consider raising TTL or investigating upstream`,
        });
      }
    }

    for (const siteKey of this.health.degradedSites()) {
      suggestions.push({
        type: "degraded-site",
        siteKey,
        message: `site ${siteKey} is degraded; its calls run with a shortened timeout`,
      });
    }

    for (const [siteKey, demotion] of Object.entries(this.selector.degradedSites())) {
      suggestions.push({
        type: "demoted-site",
        siteKey,
        message: `site ${siteKey} fell back to default rules after ${demotion.backend} failed: ${demotion.reason}`,
      });
    }

    const cache = this.cache.stats();
    if (cache.lookups >= CACHE_MIN_LOOKUPS && cache.hitRate < CACHE_HIT_RATE_THRESHOLD) {
      suggestions.push({
        type: "cache-hit-rate",
        message: `cache hit rate ${Math.round(cache.hitRate * 100)}% over ${cache.lookups} lookups; consider longer TTLs`,
      });
    }

    return suggestions;
  }

  stats(): OptimizerStats {
    return {
      performance: this.performance.snapshot(),
      health: this.health.snapshot(),
      slowCount: this.performance.slowCount,
      retries: this.retries,
    };
  }

  clearStats(): void {
    this.performance.clear();
    this.health.clear();
    this.retries = 0;
  }

  // ===========================================================================
  // Attempts
  // ===========================================================================

  private async load(site: Site, operation: ParserOperation, signal?: AbortSignal): Promise<ContentEnvelope> {
    const retry = new RetryState(this.retryOptions);

    for (;;) {
      const startTime = Date.now();
      try {
        const attempt = (attemptSignal: AbortSignal) => this.selector.execute(site, operation, { signal: attemptSignal });
        const envelope = await this.limiter.run(
          site.key,
          () => withTimeout(attempt, this.attemptTimeout(site), signal, site.key),
          signal
        );
        this.recordOutcome(site, operation, Date.now() - startTime);
        return envelope;
      } catch (error: unknown) {
        if (signal?.aborted) {
          throw abortReason(signal, site.key);
        }
        const err = wrapError(error, site.key);
        if (err instanceof CancelledError) {
          throw err;
        }

        this.recordOutcome(site, operation, Date.now() - startTime, err);
        const decision = retry.next(err);
        if (!decision.retry) {
          this.logger?.debug(`[optimizer] ${site.key} ${operation.type} failed (${decision.reason}): ${err.message}`);
          return failureEnvelope(site.key, operation, err);
        }

        this.retries++;
        this.logger?.debug(
          `[optimizer] Retry ${decision.attempt - 1}/${this.retryOptions.maxRetries} for ${site.key} ${operation.type} in ${decision.delayMs}ms`
        );
        await sleep(decision.delayMs, signal);
      }
    }
  }

  private recordOutcome(site: Site, operation: ParserOperation, durationMs: number, error?: VodError): void {
    if (error) {
      this.performance.recordFailure(site.key, operation.type, durationMs, { message: error.message, code: error.code });
    } else {
      this.performance.recordSuccess(site.key, operation.type, durationMs);
    }

    if (durationMs > this.slowCallMs) {
      this.logger?.debug(`[optimizer] Slow call: ${site.key} ${operation.type} took ${durationMs}ms`);
    }

    const transition = this.health.record(site.key, !error);
    if (transition?.to === "degraded") {
      this.logger?.warn(
        `[optimizer] ${site.key} degraded (error rate ${Math.round(transition.errorRate * 100)}%), shortening its timeout`
      );
    } else if (transition?.to === "healthy") {
      this.logger?.info(`[optimizer] ${site.key} recovered`);
    }
  }
}
