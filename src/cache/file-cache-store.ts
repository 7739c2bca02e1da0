import { createHash, randomUUID } from "node:crypto";
import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";

import type { MinerEventBus } from "../core/event-bus.js";
import { isMissingFileError, isRecord } from "../core/utils.js";
import type { CacheLookup, CacheStore, CachedEntry } from "./types.js";

export interface FileCacheStoreOptions {
  directory: string;
  now?: () => number;
  events?: MinerEventBus;
}

const ENTRY_SUFFIX = ".json";

/**
 * One JSON file per key, named by the key's SHA-256. Writes land in a
 * unique temp file and are renamed into place, so concurrent writers of
 * different keys never touch the same file.
 */
export class FileCacheStore implements CacheStore {
  private readonly directory: string;
  private readonly now: () => number;
  private readonly events?: MinerEventBus;

  public constructor(options: FileCacheStoreOptions) {
    this.directory = expandHomePath(options.directory);
    this.now = options.now ?? Date.now;
    this.events = options.events;
  }

  public async get(key: string): Promise<CacheLookup<unknown>> {
    let raw: string;
    try {
      raw = await readFile(this.entryPath(key), "utf8");
    } catch (error) {
      if (isMissingFileError(error)) return { hit: false, reason: "absent" };
      throw error;
    }

    const entry = parseEntry(raw);
    if (!entry || entry.key !== key) {
      this.events?.emit("cache:corrupt-entry", { key, reason: "unreadable entry" });
      await this.invalidate(key);
      return { hit: false, reason: "corrupt" };
    }

    if (entry.expiresAt !== null && this.now() >= entry.expiresAt) {
      await this.invalidate(key);
      return { hit: false, reason: "expired" };
    }

    return { hit: true, value: entry.value };
  }

  public async put(key: string, value: unknown, ttlMs: number | null): Promise<void> {
    const storedAt = this.now();
    const entry: CachedEntry = {
      version: 1,
      key,
      storedAt,
      expiresAt: ttlMs === null ? null : storedAt + ttlMs,
      value,
    };

    await mkdir(this.directory, { recursive: true });
    await writeFileAtomically(this.entryPath(key), JSON.stringify(entry));
  }

  public async invalidate(key: string): Promise<void> {
    await rm(this.entryPath(key), { force: true });
  }

  public async clear(): Promise<void> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isMissingFileError(error)) return;
      throw error;
    }

    await Promise.all(
      names
        .filter((name) => name.endsWith(ENTRY_SUFFIX))
        .map((name) => rm(join(this.directory, name), { force: true })),
    );
  }

  private entryPath(key: string): string {
    const digest = createHash("sha256").update(key).digest("hex");
    return join(this.directory, `${digest}${ENTRY_SUFFIX}`);
  }
}

function parseEntry(raw: string): CachedEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  if (!isRecord(parsed) || parsed.version !== 1 || !("value" in parsed)) {
    return null;
  }

  const { key, storedAt, expiresAt } = parsed;
  if (typeof key !== "string" || typeof storedAt !== "number") {
    return null;
  }
  if (expiresAt === null || typeof expiresAt === "number") {
    return { version: 1, key, storedAt, expiresAt, value: parsed.value };
  }

  return null;
}

async function writeFileAtomically(destinationPath: string, content: string): Promise<void> {
  const tempPath = `${destinationPath}.${process.pid}.${randomUUID()}.tmp`;

  try {
    await writeFile(tempPath, content, { encoding: "utf8", flag: "wx" });
    await rename(tempPath, destinationPath);
  } finally {
    await rm(tempPath, { force: true });
  }
}

function expandHomePath(path: string): string {
  if (path === "~") {
    return homedir();
  }

  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }

  return path;
}
