/**
 * Persistent cache stores
 */

import { createHash } from "node:crypto";
import { mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { type CacheEntry, type CacheStore, isCacheEntry } from "./types.js";

/**
 * Directory of the persistent tier: explicit option, VODHUB_CACHE_DIR, or <tmpdir>/vodhub-cache
 */
export function resolveCacheDir(cacheDir?: string): string {
  return cacheDir ?? process.env.VODHUB_CACHE_DIR ?? path.join(os.tmpdir(), "vodhub-cache");
}

/**
 * One JSON file per key, named by the SHA-1 of the key
 */
export class FileCacheStore implements CacheStore {
  private ready?: Promise<string | undefined>;

  constructor(readonly directory: string = resolveCacheDir()) {}

  async read(key: string): Promise<CacheEntry | undefined> {
    let text: string;
    try {
      text = await readFile(this.fileFor(key), "utf8");
    } catch (error: unknown) {
      if (isNotFound(error)) return undefined;
      throw error;
    }

    const parsed: unknown = JSON.parse(text);
    if (!isCacheEntry(parsed) || parsed.key !== key) {
      throw new Error(`Corrupt cache file for ${key}`);
    }
    return { ...parsed, tier: "disk" };
  }

  async write(entry: CacheEntry): Promise<void> {
    await this.ensureDirectory();
    await writeFile(this.fileFor(entry.key), JSON.stringify({ ...entry, tier: "disk" }), "utf8");
  }

  async delete(key: string): Promise<void> {
    await rm(this.fileFor(key), { force: true });
  }

  async deletePrefix(prefix: string): Promise<number> {
    let removed = 0;
    for (const file of await this.listFiles()) {
      const filePath = path.join(this.directory, file);
      let key: unknown;
      try {
        const parsed: unknown = JSON.parse(await readFile(filePath, "utf8"));
        key = isCacheEntry(parsed) ? parsed.key : undefined;
      } catch (error: unknown) {
        if (isNotFound(error)) continue;
        // Unreadable file: drop it with the rest
        key = undefined;
      }
      if (key === undefined || (typeof key === "string" && key.startsWith(prefix))) {
        await rm(filePath, { force: true });
        removed++;
      }
    }
    return removed;
  }

  async clear(): Promise<void> {
    for (const file of await this.listFiles()) {
      await rm(path.join(this.directory, file), { force: true });
    }
  }

  private fileFor(key: string): string {
    const hash = createHash("sha1").update(key).digest("hex");
    return path.join(this.directory, `${hash}.json`);
  }

  private async listFiles(): Promise<string[]> {
    try {
      const files = await readdir(this.directory);
      return files.filter((file) => file.endsWith(".json"));
    } catch (error: unknown) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  private ensureDirectory(): Promise<string | undefined> {
    this.ready ??= mkdir(this.directory, { recursive: true });
    return this.ready;
  }
}

/**
 * Persistent tier kept in memory, for tests and embedders without a disk
 */
export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();

  async read(key: string): Promise<CacheEntry | undefined> {
    const entry = this.entries.get(key);
    return entry ? { ...entry, tier: "disk" } : undefined;
  }

  async write(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.key, { ...entry, tier: "disk" });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async deletePrefix(prefix: string): Promise<number> {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
