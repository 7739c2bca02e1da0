import type { CacheLookup, CacheStore } from "./types.js";

export interface MemoryCacheStoreOptions {
  now?: () => number;
}

/**
 * In-process store with the same expiry semantics as `FileCacheStore`.
 * Values are kept as JSON text so callers never share mutable references
 * with the cache.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, { expiresAt: number | null; json: string }>();
  private readonly now: () => number;

  public constructor(options: MemoryCacheStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  public async get(key: string): Promise<CacheLookup<unknown>> {
    const entry = this.entries.get(key);
    if (!entry) {
      return { hit: false, reason: "absent" };
    }

    if (entry.expiresAt !== null && this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return { hit: false, reason: "expired" };
    }

    try {
      const value: unknown = JSON.parse(entry.json);
      return { hit: true, value };
    } catch {
      this.entries.delete(key);
      return { hit: false, reason: "corrupt" };
    }
  }

  public async put(key: string, value: unknown, ttlMs: number | null): Promise<void> {
    this.entries.set(key, {
      expiresAt: ttlMs === null ? null : this.now() + ttlMs,
      json: JSON.stringify(value),
    });
  }

  public async invalidate(key: string): Promise<void> {
    this.entries.delete(key);
  }

  public async clear(): Promise<void> {
    this.entries.clear();
  }

  public get size(): number {
    return this.entries.size;
  }
}
