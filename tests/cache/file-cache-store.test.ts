import { createHash } from "node:crypto";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";

import { FileCacheStore } from "../../src/cache/file-cache-store.js";
import { readCached } from "../../src/cache/types.js";
import { createEventBus } from "../../src/core/event-bus.js";

let tempDir = "";
let nowMs = 1_700_000_000_000;

function createStore(): FileCacheStore {
  return new FileCacheStore({ directory: tempDir, now: () => nowMs });
}

function entryPath(key: string): string {
  return join(tempDir, `${createHash("sha256").update(key).digest("hex")}.json`);
}

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "repo-miner-cache-"));
  nowMs = 1_700_000_000_000;
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe("FileCacheStore", () => {
  it("returns a stored value", async () => {
    const store = createStore();
    await store.put("history:v1:repo:head", { hash: "abc" }, null);

    await expect(store.get("history:v1:repo:head")).resolves.toEqual({
      hit: true,
      value: { hash: "abc" },
    });
  });

  it("reports absent keys as a miss", async () => {
    await expect(createStore().get("missing")).resolves.toEqual({ hit: false, reason: "absent" });
  });

  it("expires entries once the ttl has elapsed and removes them", async () => {
    const store = createStore();
    await store.put("remote:v1:o/r:issues:page:1", [1, 2], 1_000);

    nowMs += 999;
    await expect(store.get("remote:v1:o/r:issues:page:1")).resolves.toEqual({ hit: true, value: [1, 2] });

    nowMs += 1;
    await expect(store.get("remote:v1:o/r:issues:page:1")).resolves.toEqual({
      hit: false,
      reason: "expired",
    });
    expect(await readdir(tempDir)).toEqual([]);
  });

  it("treats unparsable entries as corrupt and reports them", async () => {
    const events = createEventBus();
    const listener = vi.fn();
    events.on("cache:corrupt-entry", listener);
    const store = new FileCacheStore({ directory: tempDir, now: () => nowMs, events });

    await writeFile(entryPath("analysis:v1:abc:a.ts"), "{not json", "utf8");

    await expect(store.get("analysis:v1:abc:a.ts")).resolves.toEqual({ hit: false, reason: "corrupt" });
    expect(listener).toHaveBeenCalledWith({ key: "analysis:v1:abc:a.ts", reason: "unreadable entry" });
    await expect(store.get("analysis:v1:abc:a.ts")).resolves.toEqual({ hit: false, reason: "absent" });
  });

  it("treats an entry stored under a different key as corrupt", async () => {
    const store = createStore();
    await writeFile(
      entryPath("wanted"),
      JSON.stringify({ version: 1, key: "other", storedAt: nowMs, expiresAt: null, value: 1 }),
      "utf8",
    );

    await expect(store.get("wanted")).resolves.toEqual({ hit: false, reason: "corrupt" });
  });

  it("removes entries on invalidate and clear", async () => {
    const store = createStore();
    await store.put("a", 1, null);
    await store.put("b", 2, null);

    await store.invalidate("a");
    await expect(store.get("a")).resolves.toEqual({ hit: false, reason: "absent" });
    await expect(store.get("b")).resolves.toEqual({ hit: true, value: 2 });

    await store.clear();
    await expect(store.get("b")).resolves.toEqual({ hit: false, reason: "absent" });
  });

  it("keeps distinct keys independent under concurrent writes", async () => {
    const store = createStore();
    await Promise.all(Array.from({ length: 20 }, (_, index) => store.put(`key:${index}`, index, null)));

    const names = await readdir(tempDir);
    expect(names).toHaveLength(20);
    expect(names.every((name) => name.endsWith(".json"))).toBe(true);
    await expect(store.get("key:7")).resolves.toEqual({ hit: true, value: 7 });
  });

  it("clears a directory that does not exist yet", async () => {
    const store = new FileCacheStore({ directory: join(tempDir, "nested", "cache") });
    await expect(store.clear()).resolves.toBeUndefined();
  });
});

describe("readCached", () => {
  it("reports values that fail the schema as corrupt", async () => {
    const store = createStore();
    const events = createEventBus();
    const listener = vi.fn();
    events.on("cache:corrupt-entry", listener);
    await store.put("k", { count: "three" }, null);

    const lookup = await readCached(store, "k", z.object({ count: z.number() }), events);

    expect(lookup).toEqual({ hit: false, reason: "corrupt" });
    expect(listener).toHaveBeenCalledWith({ key: "k", reason: "schema mismatch" });
  });

  it("returns parsed values that match the schema", async () => {
    const store = createStore();
    await store.put("k", { count: 3 }, null);

    await expect(readCached(store, "k", z.object({ count: z.number() }))).resolves.toEqual({
      hit: true,
      value: { count: 3 },
    });
  });
});
