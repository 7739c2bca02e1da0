import { historyCommitsKey, historyHeadKey } from "../cache/keys.js";
import { type CacheStore, readCached } from "../cache/types.js";
import { MinerError, historyError } from "../core/errors.js";
import type { MinerEventBus } from "../core/event-bus.js";
import type { CommitRecord, HistoryResult, SkippedCommit } from "../core/types.js";
import { toErrorMessage } from "../core/utils.js";
import type { GitRepository } from "./git-repository.js";
import { type CachedHistory, CachedHistorySchema } from "./schema.js";
import { z } from "zod";

export interface ExtractOptions {
  onSkip?: (skipped: SkippedCommit) => void;
}

/**
 * Walks the log of a repository and yields commit records oldest first.
 * Each call re-walks git; nothing is held between invocations.
 */
export class HistoryExtractor {
  public constructor(
    private readonly repository: GitRepository,
    private readonly events?: MinerEventBus,
  ) {}

  public resolveHead(): Promise<string | null> {
    return this.repository.resolveHead();
  }

  public isAncestor(candidate: string, head: string): Promise<boolean> {
    return this.repository.isAncestor(candidate, head);
  }

  /**
   * With `sinceHash` reachable from HEAD, yields only the commits after it.
   * Otherwise (absent or rewritten away) the whole log is walked.
   * Throws `REPOSITORY_UNAVAILABLE` when the log cannot be opened.
   */
  public async *extractCommits(
    sinceHash?: string,
    options: ExtractOptions = {},
  ): AsyncGenerator<CommitRecord, void, undefined> {
    const head = await this.repository.resolveHead();
    if (!head) {
      return;
    }

    const resumable =
      sinceHash !== undefined && (await this.repository.isAncestor(sinceHash, head));
    const hashes = await this.repository.listCommitHashes(head, resumable ? sinceHash : undefined);

    for (const hash of hashes) {
      try {
        yield await this.repository.readCommit(hash);
      } catch (error) {
        if (error instanceof MinerError && error.severity === "fatal") {
          throw error;
        }

        const skipped: SkippedCommit = { hash, reason: toErrorMessage(error) };
        options.onSkip?.(skipped);
        this.events?.emit("history:commit-skipped", { skipped });
        this.events?.emit("warning", {
          error: historyError("COMMIT_UNREADABLE", `Skipped unreadable commit ${hash}.`, {
            context: { hash, reason: skipped.reason },
            cause: error,
          }),
        });
      }
    }
  }
}

export interface CollectHistoryOptions {
  extractor: HistoryExtractor;
  /** Stable identity of the repository inside the cache (e.g. its resolved path). */
  repoId: string;
  cache?: CacheStore;
  ttlMs?: number | null;
  events?: MinerEventBus;
}

/**
 * Incremental history: reuses the cached prefix, extracts only what follows
 * the cached head and writes the merged result back. A cached head that is
 * no longer an ancestor of HEAD (rewritten history) discards the cache.
 */
export async function collectHistory(options: CollectHistoryOptions): Promise<HistoryResult> {
  const { extractor, repoId, cache, events } = options;
  const ttlMs = options.ttlMs ?? null;

  const head = await extractor.resolveHead();
  if (!head) {
    events?.emit("history:extracted", { count: 0, reusedFromCache: 0, headHash: null });
    return { commits: [], skipped: [], headHash: null, reusedFromCache: 0 };
  }

  const cached = cache ? await loadCachedHistory(cache, repoId, events) : null;
  let base: CachedHistory | null = null;

  if (cached) {
    if (cached.headHash === head || (await extractor.isAncestor(cached.headHash, head))) {
      base = cached;
    } else {
      events?.emit("history:cache-discarded", {
        cachedHead: cached.headHash,
        reason: "cached head is not an ancestor of the current head",
      });
    }
  }

  const commits: CommitRecord[] = base ? [...base.commits] : [];
  const skipped: SkippedCommit[] = base ? [...base.skipped] : [];
  const seen = new Set(commits.map((commit) => commit.hash));
  const reusedFromCache = commits.length;

  if (!base || base.headHash !== head) {
    const since = base?.headHash;
    for await (const commit of extractor.extractCommits(since, {
      onSkip: (entry) => skipped.push(entry),
    })) {
      if (seen.has(commit.hash)) continue;
      seen.add(commit.hash);
      commits.push(commit);
    }
  }

  if (cache && (!base || base.headHash !== head)) {
    const entry: CachedHistory = { headHash: head, commits, skipped };
    await cache.put(historyCommitsKey(repoId, head), entry, ttlMs);
    await cache.put(historyHeadKey(repoId), head, ttlMs);
    if (cached && cached.headHash !== head) {
      await cache.invalidate(historyCommitsKey(repoId, cached.headHash));
    }
  }

  events?.emit("history:extracted", { count: commits.length, reusedFromCache, headHash: head });
  return { commits, skipped, headHash: head, reusedFromCache };
}

async function loadCachedHistory(
  cache: CacheStore,
  repoId: string,
  events?: MinerEventBus,
): Promise<CachedHistory | null> {
  const headLookup = await readCached(cache, historyHeadKey(repoId), z.string().min(1), events);
  if (!headLookup.hit) {
    return null;
  }

  const entryLookup = await readCached(
    cache,
    historyCommitsKey(repoId, headLookup.value),
    CachedHistorySchema,
    events,
  );
  if (!entryLookup.hit || entryLookup.value.headHash !== headLookup.value) {
    return null;
  }

  return entryLookup.value;
}
