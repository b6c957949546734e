export type CacheTier = "memory" | "disk";

export interface CacheEntry {
  key: string;
  /** Serialized envelope */
  value: string;
  createdAt: number;
  lastAccessAt: number;
  ttlMs: number;
  tier: CacheTier;
  sizeBytes: number;
}

/**
 * Persistent cache tier
 *
 * Implementations may throw; the result cache treats any error as a miss.
 */
export interface CacheStore {
  read(key: string): Promise<CacheEntry | undefined>;
  write(entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
  /** @returns number of entries removed */
  deletePrefix(prefix: string): Promise<number>;
  clear(): Promise<void>;
}

export function isExpired(entry: CacheEntry, now = Date.now()): boolean {
  return now - entry.createdAt > entry.ttlMs;
}

/**
 * Validate a deserialized entry
 */
export function isCacheEntry(value: unknown): value is CacheEntry {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    typeof Reflect.get(value, "key") === "string" &&
    typeof Reflect.get(value, "value") === "string" &&
    typeof Reflect.get(value, "createdAt") === "number" &&
    typeof Reflect.get(value, "ttlMs") === "number"
  );
}
