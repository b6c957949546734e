import type { CacheEntry } from "./types.js";

/**
 * In-memory LRU bounded by entry count and total size
 *
 * Map iteration order is insertion order, so re-inserting on access keeps the
 * least recently used entry first.
 */
export class MemoryLru {
  private entries = new Map<string, CacheEntry>();
  private totalBytes = 0;
  evictions = 0;

  constructor(
    private readonly maxEntries: number,
    private readonly maxBytes: number
  ) {}

  get size(): number {
    return this.entries.size;
  }

  get bytes(): number {
    return this.totalBytes;
  }

  /**
   * Read an entry and mark it most recently used
   */
  get(key: string, now = Date.now()): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    this.entries.delete(key);
    entry.lastAccessAt = now;
    this.entries.set(key, entry);
    return entry;
  }

  /**
   * Store an entry, evicting the least recently used ones as needed
   *
   * @returns false when the entry alone exceeds the size limit
   */
  set(entry: CacheEntry): boolean {
    this.delete(entry.key);
    if (entry.sizeBytes > this.maxBytes) {
      return false;
    }

    this.entries.set(entry.key, { ...entry, tier: "memory" });
    this.totalBytes += entry.sizeBytes;

    while (this.entries.size > this.maxEntries || this.totalBytes > this.maxBytes) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.delete(oldest.value);
      this.evictions++;
    }
    return true;
  }

  delete(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    this.entries.delete(key);
    this.totalBytes -= entry.sizeBytes;
    return true;
  }

  deletePrefix(prefix: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix) && this.delete(key)) {
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.totalBytes = 0;
  }
}
