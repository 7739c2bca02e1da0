import type { z } from "zod";

import type { MinerEventBus } from "../core/event-bus.js";

export type CacheMissReason = "absent" | "expired" | "corrupt";

export type CacheLookup<T> = { hit: true; value: T } | { hit: false; reason: CacheMissReason };

/**
 * Key-addressed persistence with expiry. Implementations must treat
 * unreadable entries as misses and never throw from `get`.
 */
export interface CacheStore {
  get(key: string): Promise<CacheLookup<unknown>>;
  /** `ttlMs === null` stores an entry that never expires. */
  put(key: string, value: unknown, ttlMs: number | null): Promise<void>;
  invalidate(key: string): Promise<void>;
  clear(): Promise<void>;
}

export interface CachedEntry {
  version: 1;
  key: string;
  storedAt: number;
  expiresAt: number | null;
  value: unknown;
}

/**
 * Reads `key` and validates it against `schema`. A value that no longer
 * matches the schema is reported as a corrupt miss.
 */
export async function readCached<T>(
  store: CacheStore,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  events?: MinerEventBus,
): Promise<CacheLookup<T>> {
  const lookup = await store.get(key);
  if (!lookup.hit) {
    return lookup;
  }

  const parsed = schema.safeParse(lookup.value);
  if (parsed.success) {
    return { hit: true, value: parsed.data };
  }

  events?.emit("cache:corrupt-entry", { key, reason: "schema mismatch" });
  return { hit: false, reason: "corrupt" };
}
