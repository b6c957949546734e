import type { AggregatorOptions, OperationName, RetryOptions, VodEngineOptions } from "../types.js";
import { DEFAULT_ENGINE_OPTIONS, DEFAULT_TTL, isOperationName } from "../types.js";
import { ConfigError } from "../errors.js";
import { resolveCacheDir } from "../cache/store.js";

export interface ResolvedEngineOptions {
  hookTimeoutMs: number;
  initCooldownMs: number;
  initTimeoutMs: number;
  perSiteConcurrency: number;
  slowCallMs: number;
  degradedTimeoutFactor: number;
  builtInHooks: boolean;
  cache: {
    maxEntries: number;
    maxBytes: number;
    persistent: boolean;
    cacheDir: string;
    ttl: Record<OperationName, number>;
  };
  retry: Required<RetryOptions>;
  aggregator: AggregatorOptions & Omit<Required<AggregatorOptions>, "concurrency">;
}

function positive(value: number | undefined, fallback: number, field: string, allowZero = false): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isFinite(value) || value < 0 || (!allowZero && value === 0)) {
    throw new ConfigError(`${field} must be a ${allowZero ? "non-negative" : "positive"} number, got ${value}`, { field });
  }
  return value;
}

function count(value: number | undefined, fallback: number, field: string, allowZero = false): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isInteger(value) || value < 0 || (!allowZero && value === 0)) {
    throw new ConfigError(`${field} must be a ${allowZero ? "non-negative" : "positive"} integer, got ${value}`, { field });
  }
  return value;
}

function factor(value: number | undefined, fallback: number, field: string): number {
  const resolved = positive(value, fallback, field);
  if (resolved > 1) {
    throw new ConfigError(`${field} must be between 0 and 1, got ${resolved}`, { field });
  }
  return resolved;
}

/**
 * Merge options over the defaults and validate them
 *
 * @throws ConfigError for out-of-range values
 */
export function resolveEngineOptions(options: VodEngineOptions = {}): ResolvedEngineOptions {
  const defaults = DEFAULT_ENGINE_OPTIONS;
  const cache = options.cache ?? {};
  const retry = options.retry ?? {};
  const aggregator = options.aggregator ?? {};

  const ttl: Record<OperationName, number> = { ...DEFAULT_TTL };
  for (const [operation, value] of Object.entries(cache.ttl ?? {})) {
    if (!isOperationName(operation)) {
      throw new ConfigError(`Unknown operation ${operation} in cache.ttl`, { field: "cache.ttl" });
    }
    ttl[operation] = positive(value, DEFAULT_TTL[operation], `cache.ttl.${operation}`, true);
  }

  return {
    hookTimeoutMs: positive(options.hookTimeoutMs, defaults.hookTimeoutMs, "hookTimeoutMs"),
    initCooldownMs: positive(options.initCooldownMs, defaults.initCooldownMs, "initCooldownMs", true),
    initTimeoutMs: positive(options.initTimeoutMs, defaults.initTimeoutMs, "initTimeoutMs"),
    perSiteConcurrency: count(options.perSiteConcurrency, defaults.perSiteConcurrency, "perSiteConcurrency"),
    slowCallMs: positive(options.slowCallMs, defaults.slowCallMs, "slowCallMs"),
    degradedTimeoutFactor: factor(options.degradedTimeoutFactor, defaults.degradedTimeoutFactor, "degradedTimeoutFactor"),
    builtInHooks: options.builtInHooks ?? defaults.builtInHooks,
    cache: {
      maxEntries: count(cache.maxEntries, defaults.cache.maxEntries, "cache.maxEntries"),
      maxBytes: positive(cache.maxBytes, defaults.cache.maxBytes, "cache.maxBytes"),
      persistent: cache.persistent ?? defaults.cache.persistent,
      cacheDir: resolveCacheDir(cache.cacheDir),
      ttl,
    },
    retry: {
      maxRetries: count(retry.maxRetries, defaults.retry.maxRetries, "retry.maxRetries", true),
      baseDelayMs: positive(retry.baseDelayMs, defaults.retry.baseDelayMs, "retry.baseDelayMs", true),
      maxDelayMs: positive(retry.maxDelayMs, defaults.retry.maxDelayMs, "retry.maxDelayMs", true),
    },
    aggregator: {
      concurrency:
        aggregator.concurrency === undefined
          ? undefined
          : count(aggregator.concurrency, 1, "aggregator.concurrency"),
      siteTimeoutMs: positive(aggregator.siteTimeoutMs, defaults.aggregator.siteTimeoutMs, "aggregator.siteTimeoutMs"),
      deadlineMs: positive(aggregator.deadlineMs, defaults.aggregator.deadlineMs, "aggregator.deadlineMs"),
      quickTimeoutFactor: factor(
        aggregator.quickTimeoutFactor,
        defaults.aggregator.quickTimeoutFactor,
        "aggregator.quickTimeoutFactor"
      ),
      quickResultLimit: count(
        aggregator.quickResultLimit,
        defaults.aggregator.quickResultLimit,
        "aggregator.quickResultLimit"
      ),
    },
  };
}
