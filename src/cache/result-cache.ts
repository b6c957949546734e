/**
 * Result cache
 *
 * Two tiers: a memory LRU in front of an optional persistent CacheStore.
 * Disk hits are promoted to memory. Entries expire `ttlMs` after creation and
 * are dropped when next touched. Concurrent loads of one key are collapsed
 * into a single call (singleflight).
 */

import type { ContentEnvelope } from "../types.js";
import type { CacheEntry, CacheStore, CacheTier } from "./types.js";
import { isExpired } from "./types.js";
import { MemoryLru } from "./memory-lru.js";
import { CancelledError, TimeoutError } from "../errors.js";
import { raceSignal, throwIfAborted } from "../utils/abort.js";
import type { Logger } from "../utils/logger.js";

export type CacheLookup = { hit: true; value: ContentEnvelope; tier: CacheTier } | { hit: false };

export interface ResultCacheOptions {
  /** Memory tier entry limit (default: 500) */
  maxEntries?: number;
  /** Memory tier size limit in bytes (default: 16 MiB) */
  maxBytes?: number;
  /** Persistent tier; omit to keep the cache in memory only */
  store?: CacheStore;
  logger?: Logger;
}

export interface LoadOptions {
  signal?: AbortSignal;
  /** Decide whether a loaded value is written (default: always) */
  shouldCache?: (value: ContentEnvelope) => boolean;
}

export interface LoadResult {
  value: ContentEnvelope;
  /** Tier that answered, or undefined when the loader ran */
  tier?: CacheTier;
  /** The value came from another caller's load of the same key */
  shared: boolean;
}

export interface CacheStats {
  lookups: number;
  hits: number;
  memoryHits: number;
  diskHits: number;
  misses: number;
  hitRate: number;
  writes: number;
  evictions: number;
  expirations: number;
  storeErrors: number;
  sharedLoads: number;
  entries: number;
  bytes: number;
}

interface Flight {
  promise: Promise<ContentEnvelope>;
}

export class ResultCache {
  private readonly memory: MemoryLru;
  private readonly store?: CacheStore;
  private readonly logger?: Logger;
  private inflight = new Map<string, Flight>();
  private counters = emptyCounters();

  constructor(options: ResultCacheOptions = {}) {
    this.memory = new MemoryLru(options.maxEntries ?? 500, options.maxBytes ?? 16 * 1024 * 1024);
    this.store = options.store;
    this.logger = options.logger;
  }

  /**
   * Look a key up in memory, then in the persistent tier
   */
  async get(key: string): Promise<CacheLookup> {
    const now = Date.now();

    const cached = this.memory.get(key, now);
    if (cached) {
      if (!isExpired(cached, now)) {
        const value = this.decode(cached);
        if (value) {
          this.counters.memoryHits++;
          return { hit: true, value, tier: "memory" };
        }
      } else {
        this.counters.expirations++;
      }
      this.memory.delete(key);
    }

    const stored = await this.readStore(key);
    if (stored) {
      if (!isExpired(stored, now)) {
        const value = this.decode(stored);
        if (value) {
          this.memory.set({ ...stored, lastAccessAt: now });
          this.counters.diskHits++;
          return { hit: true, value, tier: "disk" };
        }
      } else {
        this.counters.expirations++;
      }
      await this.deleteFromStore(key);
    }

    this.counters.misses++;
    return { hit: false };
  }

  /**
   * Store a value in both tiers
   */
  async put(key: string, value: ContentEnvelope, ttlMs: number): Promise<void> {
    if (ttlMs <= 0) {
      return;
    }

    const serialized = JSON.stringify(value);
    const now = Date.now();
    const entry: CacheEntry = {
      key,
      value: serialized,
      createdAt: now,
      lastAccessAt: now,
      ttlMs,
      tier: "memory",
      sizeBytes: Buffer.byteLength(serialized, "utf8"),
    };

    this.memory.set(entry);
    this.counters.writes++;

    if (this.store) {
      try {
        await this.store.write(entry);
      } catch (error: unknown) {
        this.recordStoreError("write", key, error);
      }
    }
  }

  /**
   * Drop every entry whose key starts with `prefix`
   *
   * @returns number of memory entries removed
   */
  async invalidate(prefix: string): Promise<number> {
    const removed = this.memory.deletePrefix(prefix);
    if (this.store) {
      try {
        await this.store.deletePrefix(prefix);
      } catch (error: unknown) {
        this.recordStoreError("invalidate", prefix, error);
      }
    }
    this.logger?.debug(`[cache] Invalidated ${removed} entries under "${prefix}"`);
    return removed;
  }

  /**
   * Return the cached value or run `loader` once for all concurrent callers
   *
   * When the leading call is cancelled or cut off by its own timeout, waiting
   * callers whose signal is still live start a new load.
   *
   * @throws CancelledError when the caller's signal fires
   */
  async getOrLoad(
    key: string,
    ttlMs: number,
    loader: () => Promise<ContentEnvelope>,
    options: LoadOptions = {}
  ): Promise<LoadResult> {
    const { signal } = options;

    for (;;) {
      throwIfAborted(signal);

      const lookup = await this.get(key);
      if (lookup.hit) {
        return { value: lookup.value, tier: lookup.tier, shared: false };
      }

      const flight = this.inflight.get(key);
      if (flight) {
        this.counters.sharedLoads++;
        try {
          const value = await raceSignal(flight.promise, signal);
          return { value, shared: true };
        } catch (error: unknown) {
          if ((error instanceof CancelledError || error instanceof TimeoutError) && !signal?.aborted) {
            // The leader's call was cut off; take over
            continue;
          }
          throw error;
        }
      }

      return { value: await this.lead(key, ttlMs, loader, options), shared: false };
    }
  }

  stats(): CacheStats {
    const { memoryHits, diskHits, misses } = this.counters;
    const hits = memoryHits + diskHits;
    const lookups = hits + misses;
    return {
      ...this.counters,
      lookups,
      hits,
      hitRate: lookups === 0 ? 0 : hits / lookups,
      evictions: this.memory.evictions,
      entries: this.memory.size,
      bytes: this.memory.bytes,
    };
  }

  clearStats(): void {
    this.counters = emptyCounters();
    this.memory.evictions = 0;
  }

  /**
   * Empty both tiers
   */
  async clear(): Promise<void> {
    this.memory.clear();
    if (this.store) {
      try {
        await this.store.clear();
      } catch (error: unknown) {
        this.recordStoreError("clear", "*", error);
      }
    }
  }

  private async lead(
    key: string,
    ttlMs: number,
    loader: () => Promise<ContentEnvelope>,
    options: LoadOptions
  ): Promise<ContentEnvelope> {
    const promise = loader();
    const flight: Flight = { promise };
    this.inflight.set(key, flight);

    try {
      const value = await promise;
      if (options.shouldCache?.(value) ?? true) {
        await this.put(key, value, ttlMs);
      }
      return value;
    } finally {
      if (this.inflight.get(key) === flight) {
        this.inflight.delete(key);
      }
    }
  }

  private async readStore(key: string): Promise<CacheEntry | undefined> {
    if (!this.store) {
      return undefined;
    }
    try {
      return await this.store.read(key);
    } catch (error: unknown) {
      this.recordStoreError("read", key, error);
      return undefined;
    }
  }

  private async deleteFromStore(key: string): Promise<void> {
    if (!this.store) {
      return;
    }
    try {
      await this.store.delete(key);
    } catch (error: unknown) {
      this.recordStoreError("delete", key, error);
    }
  }

  private decode(entry: CacheEntry): ContentEnvelope | undefined {
    try {
      const parsed: unknown = JSON.parse(entry.value);
      if (isContentEnvelope(parsed)) {
        return parsed;
      }
    } catch (error: unknown) {
      this.recordStoreError("parse", entry.key, error);
      return undefined;
    }
    this.recordStoreError("parse", entry.key, new Error("not an envelope"));
    return undefined;
  }

  private recordStoreError(action: string, key: string, error: unknown): void {
    this.counters.storeErrors++;
    this.logger?.warn(`[cache] Store ${action} failed for ${key}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function emptyCounters() {
  return {
    memoryHits: 0,
    diskHits: 0,
    misses: 0,
    writes: 0,
    expirations: 0,
    storeErrors: 0,
    sharedLoads: 0,
  };
}

function isContentEnvelope(value: unknown): value is ContentEnvelope {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const kind: unknown = Reflect.get(value, "kind");
  return (kind === "listing" || kind === "play") && typeof Reflect.get(value, "status") === "string";
}
